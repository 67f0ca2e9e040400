/**
 * Gas Metrics Calculator
 *
 * Derives utilization and fee-market figures for a single block.
 * Sums stay in bigint wei; conversion to display units happens last.
 */

import type { InspectedBlock } from '../../services/types/block/index.js';
import type { GasMetrics } from '../../services/types/block/index.js';
import { weiToEth, weiToGwei } from '../units/index.js';

export type GasMetricsInput = Pick<
  InspectedBlock,
  'gasUsed' | 'gasLimit' | 'baseFeePerGas' | 'transactions'
>;

/**
 * gasUsed / gasLimit × 100
 *
 * Not clamped above 100. A zero gas limit yields 0 rather than NaN/Infinity.
 */
export function calculateUtilization(gasUsed: bigint, gasLimit: bigint): number {
  if (gasLimit === 0n) {
    return 0;
  }
  return (Number(gasUsed) / Number(gasLimit)) * 100;
}

/**
 * Sum and count of the priority fees declared by the given transactions
 */
export function sumPriorityFees(
  transactions: GasMetricsInput['transactions']
): { total: bigint; count: number } {
  let total = 0n;
  let count = 0;

  for (const tx of transactions) {
    if (tx.maxPriorityFeePerGas !== null) {
      total += tx.maxPriorityFeePerGas;
      count++;
    }
  }

  return { total, count };
}

/**
 * Calculate gas metrics for one block
 *
 * The average priority fee divides the summed wei integer by the count
 * before converting, so it truncates to whole wei.
 *
 * @example
 * ```typescript
 * const gas = calculateGasMetrics(block);
 * // { gasUsed: 15000000, gasLimit: 30000000, utilization: 50, baseFeeGwei: 30, ... }
 * ```
 */
export function calculateGasMetrics(block: GasMetricsInput): GasMetrics {
  const { gasUsed, gasLimit, baseFeePerGas } = block;
  const priority = sumPriorityFees(block.transactions);

  return {
    gasUsed: Number(gasUsed),
    gasLimit: Number(gasLimit),
    utilization: calculateUtilization(gasUsed, gasLimit),
    baseFeeGwei: baseFeePerGas !== null ? weiToGwei(baseFeePerGas) : 0,
    avgPriorityFeeGwei:
      priority.count > 0 ? weiToGwei(priority.total / BigInt(priority.count)) : 0,
    feesBurnedEth: baseFeePerGas !== null ? weiToEth(baseFeePerGas * gasUsed) : 0,
    priorityFeesEth: weiToEth(priority.total),
  };
}
