/**
 * Lifecycle Formatter
 *
 * Plain-text reports for terminal output.
 */

import type { BlockLifecycle, InspectedBlock } from '../../services/types/block/index.js';
import { weiToEth, weiToGwei } from '../units/index.js';

const RULE = '═'.repeat(51);
const THIN_RULE = '─'.repeat(50);

export const TRANSACTION_DETAIL_LIMIT = 10;

/**
 * Multi-line report with header, timing, gas, transaction, MEV and PBS sections
 */
export function formatBlockLifecycle(lifecycle: BlockLifecycle): string {
  const { timing, gas, transactions, mev, pbs } = lifecycle;
  const types = transactions.typeBreakdown;

  const lines = [
    '',
    RULE,
    `Block Number: ${lifecycle.blockNumber}`,
    `Block Hash: ${lifecycle.blockHash}`,
    `Timestamp: ${lifecycle.timestamp}`,
    RULE,
    '',
    'TIMING METRICS',
    `  Block Time: ${timing.blockTime.toFixed(2)}s`,
    '',
    'GAS METRICS',
    `  Gas Used: ${gas.gasUsed} / ${gas.gasLimit} (${gas.utilization.toFixed(1)}%)`,
    `  Base Fee: ${gas.baseFeeGwei.toFixed(2)} gwei`,
    `  Avg Priority Fee: ${gas.avgPriorityFeeGwei.toFixed(2)} gwei`,
    `  Fees Burned: ${gas.feesBurnedEth.toFixed(4)} ETH`,
    `  Priority Fees: ${gas.priorityFeesEth.toFixed(4)} ETH`,
    '',
    'TRANSACTIONS',
    `  Total: ${transactions.totalCount}`,
    `  Failed: ${transactions.failedCount}`,
    `  Types: Legacy(${types.legacy}), EIP-2930(${types.eip2930}), EIP-1559(${types.eip1559}), EIP-4844(${types.eip4844Blob})`,
    `  Priority Ordering: ${transactions.ordering.sortedByPriority ? 'sorted' : `${transactions.ordering.anomalies} anomalies`}`,
    '',
    'MEV INDICATORS',
    `  Sandwich Attacks: ${mev.sandwichAttacks.length}`,
    `  Arbitrage Ops: ${mev.arbitrageOps.length}`,
    `  Liquidations: ${mev.liquidations}`,
    `  Estimated MEV: ${mev.estimatedMevEth.toFixed(4)} ETH`,
    '',
    'PBS METRICS',
    `  PBS Block: ${pbs.isPbsBlock ? 'Yes' : 'No'}`,
  ];

  if (pbs.builderAddress !== null) {
    lines.push(`  Builder: ${pbs.builderAddress}`);
  }

  return lines.join('\n');
}

/**
 * Per-transaction listing of the first ten transactions of `block`
 */
export function formatTransactionDetails(block: InspectedBlock): string {
  const lines = ['', 'TRANSACTION DETAILS', THIN_RULE];

  block.transactions.slice(0, TRANSACTION_DETAIL_LIMIT).forEach((tx, i) => {
    lines.push('', `Tx #${i + 1}: ${tx.hash}`);
    lines.push(`  From: ${tx.from}`);
    lines.push(`  To: ${tx.to ?? '(contract creation)'}`);
    lines.push(`  Value: ${weiToEth(tx.value)} ETH`);
    if (tx.maxFeePerGas !== null) {
      lines.push(`  Max Fee: ${weiToGwei(tx.maxFeePerGas)} gwei`);
    }
    if (tx.maxPriorityFeePerGas !== null) {
      lines.push(`  Priority Fee: ${weiToGwei(tx.maxPriorityFeePerGas)} gwei`);
    }
  });

  const remaining = block.transactions.length - TRANSACTION_DETAIL_LIMIT;
  if (remaining > 0) {
    lines.push('', `... and ${remaining} more transactions`);
  }

  return lines.join('\n');
}
