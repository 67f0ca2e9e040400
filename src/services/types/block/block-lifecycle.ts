/**
 * Block Lifecycle
 *
 * The analysis product for one block. Records are built once by the
 * lifecycle assembler and never mutated; every optional value is null
 * (not undefined) so JSON round-trips are lossless.
 */

export interface TimingMetrics {
  /** Seconds since the previous block, 0 when no predecessor is known */
  readonly blockTime: number;
  readonly timestamp: number;
  /** No network-level timing source exists, always null */
  readonly propagationDelay: number | null;
}

export interface GasMetrics {
  readonly gasUsed: number;
  readonly gasLimit: number;
  /** gasUsed / gasLimit × 100, not clamped; 0 when gasLimit is 0 */
  readonly utilization: number;
  readonly baseFeeGwei: number;
  readonly avgPriorityFeeGwei: number;
  readonly feesBurnedEth: number;
  /** Sum of declared priority fees, in ether */
  readonly priorityFeesEth: number;
}

export interface TypeBreakdown {
  readonly legacy: number;
  readonly eip2930: number;
  readonly eip1559: number;
  readonly eip4844Blob: number;
}

export interface OrderingMetrics {
  readonly sortedByPriority: boolean;
  readonly anomalies: number;
  readonly avgDeviation: number;
}

export interface TransactionMetrics {
  readonly totalCount: number;
  readonly typeBreakdown: TypeBreakdown;
  readonly ordering: OrderingMetrics;
  readonly failedCount: number;
}

export interface SandwichAttack {
  readonly frontrunTx: string;
  readonly victimTx: string;
  readonly backrunTx: string;
  readonly estimatedProfitEth: number;
  /** Contract the three transactions call */
  readonly dex: string;
}

export interface ArbitrageOp {
  readonly txHash: string;
  readonly path: readonly string[];
  readonly estimatedProfitEth: number;
  readonly dexesInvolved: readonly string[];
}

export interface MevIndicators {
  readonly sandwichAttacks: readonly SandwichAttack[];
  readonly arbitrageOps: readonly ArbitrageOp[];
  readonly liquidations: number;
  readonly estimatedMevEth: number;
  /** Lower-case addresses of registered actors sending 2+ transactions */
  readonly mevBotAddresses: readonly string[];
}

export interface PbsMetrics {
  readonly isPbsBlock: boolean;
  /** Full decoded extraData when a builder fragment matched */
  readonly builderAddress: string | null;
  /** Not computed, always null */
  readonly builderPaymentEth: number | null;
  /** extraData decoded as UTF-8 (lossy) */
  readonly extraData: string;
}

export interface BlockLifecycle {
  readonly blockNumber: number;
  readonly blockHash: string;
  readonly timestamp: number;
  readonly proposer: string;
  readonly builder: string | null;
  readonly timing: TimingMetrics;
  readonly gas: GasMetrics;
  readonly transactions: TransactionMetrics;
  readonly mev: MevIndicators;
  readonly pbs: PbsMetrics;
}
