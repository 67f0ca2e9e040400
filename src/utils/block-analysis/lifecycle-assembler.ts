/**
 * Lifecycle Assembler
 *
 * Runs every analyzer once against a block and combines the results into
 * an immutable BlockLifecycle. Performs no I/O: the block, its predecessor
 * and any receipt statuses are fetched beforehand.
 */

import type {
  BlockLifecycle,
  InspectedBlock,
  TimingMetrics,
  TransactionStatus,
} from '../../services/types/block/index.js';
import { calculateGasMetrics } from './gas-metrics.js';
import { analyzeTransactions } from './transaction-ordering.js';
import { MevDetector } from './mev-detector.js';
import { PbsAnalyzer } from './pbs-analyzer.js';

/**
 * Dependencies for BlockLifecycleAssembler
 * All dependencies are optional and will use defaults if not provided
 */
export interface BlockLifecycleAssemblerDependencies {
  mevDetector?: MevDetector;
  pbsAnalyzer?: PbsAnalyzer;
}

export interface AssembleOptions {
  /** Receipt outcomes in block order, used for failedCount */
  receiptStatuses?: readonly TransactionStatus[] | null;
}

/**
 * Seconds between the predecessor and this block; 0 without a predecessor
 */
export function calculateBlockTime(
  block: Pick<InspectedBlock, 'timestamp'>,
  previousBlock: Pick<InspectedBlock, 'timestamp'> | null
): number {
  if (!previousBlock) {
    return 0;
  }
  return Number(block.timestamp - previousBlock.timestamp);
}

export function calculateTimingMetrics(
  block: Pick<InspectedBlock, 'timestamp'>,
  previousBlock: Pick<InspectedBlock, 'timestamp'> | null
): TimingMetrics {
  return {
    blockTime: calculateBlockTime(block, previousBlock),
    timestamp: Number(block.timestamp),
    propagationDelay: null,
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export class BlockLifecycleAssembler {
  private readonly mevDetector: MevDetector;
  private readonly pbsAnalyzer: PbsAnalyzer;

  constructor(dependencies: BlockLifecycleAssemblerDependencies = {}) {
    this.mevDetector = dependencies.mevDetector ?? new MevDetector();
    this.pbsAnalyzer = dependencies.pbsAnalyzer ?? new PbsAnalyzer();
  }

  /**
   * Build the lifecycle record for `block`
   *
   * @param previousBlock - Immediate predecessor, null for genesis or when it could not be fetched
   * @returns a frozen BlockLifecycle
   */
  assemble(
    block: InspectedBlock,
    previousBlock: InspectedBlock | null,
    options: AssembleOptions = {}
  ): BlockLifecycle {
    const timing = calculateTimingMetrics(block, previousBlock);
    const gas = calculateGasMetrics(block);
    const transactions = analyzeTransactions(
      block.transactions,
      options.receiptStatuses ?? null
    );
    const mev = this.mevDetector.detect(block.transactions);
    const pbs = this.pbsAnalyzer.analyze(block.extraData);

    return deepFreeze({
      blockNumber: Number(block.number),
      blockHash: block.hash,
      timestamp: Number(block.timestamp),
      proposer: block.miner,
      builder: pbs.builderAddress,
      timing,
      gas,
      transactions,
      mev,
      pbs,
    });
  }
}

/**
 * Assemble with default analyzers
 */
export function assembleBlockLifecycle(
  block: InspectedBlock,
  previousBlock: InspectedBlock | null,
  options: AssembleOptions = {}
): BlockLifecycle {
  return new BlockLifecycleAssembler().assemble(block, previousBlock, options);
}
