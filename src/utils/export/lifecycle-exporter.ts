/**
 * Lifecycle Exporter
 *
 * Flattens BlockLifecycle records into a table with one row per block and
 * writes it as CSV for offline analysis.
 */

import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import type { BlockLifecycle } from '../../services/types/block/index.js';
import { createServiceLogger, log } from '../../logging/index.js';

const logger = createServiceLogger('LifecycleExporter');

type Cell = string | number | boolean | null;

/**
 * Column names paired with the value each row takes for them
 */
const COLUMNS: ReadonlyArray<readonly [string, (record: BlockLifecycle) => Cell]> = [
  ['block_number', (r) => r.blockNumber],
  ['block_hash', (r) => r.blockHash],
  ['timestamp', (r) => r.timestamp],
  ['proposer', (r) => r.proposer],
  ['builder', (r) => r.builder],
  ['block_time', (r) => r.timing.blockTime],
  ['propagation_delay', (r) => r.timing.propagationDelay],
  ['gas_used', (r) => r.gas.gasUsed],
  ['gas_limit', (r) => r.gas.gasLimit],
  ['gas_utilization', (r) => r.gas.utilization],
  ['base_fee_gwei', (r) => r.gas.baseFeeGwei],
  ['avg_priority_fee_gwei', (r) => r.gas.avgPriorityFeeGwei],
  ['fees_burned_eth', (r) => r.gas.feesBurnedEth],
  ['priority_fees_eth', (r) => r.gas.priorityFeesEth],
  ['tx_count', (r) => r.transactions.totalCount],
  ['tx_legacy', (r) => r.transactions.typeBreakdown.legacy],
  ['tx_eip2930', (r) => r.transactions.typeBreakdown.eip2930],
  ['tx_eip1559', (r) => r.transactions.typeBreakdown.eip1559],
  ['tx_eip4844', (r) => r.transactions.typeBreakdown.eip4844Blob],
  ['tx_failed', (r) => r.transactions.failedCount],
  ['tx_sorted_by_priority', (r) => r.transactions.ordering.sortedByPriority],
  ['tx_ordering_anomalies', (r) => r.transactions.ordering.anomalies],
  ['tx_avg_deviation', (r) => r.transactions.ordering.avgDeviation],
  ['mev_sandwich_attacks', (r) => r.mev.sandwichAttacks.length],
  ['mev_arbitrage_ops', (r) => r.mev.arbitrageOps.length],
  ['mev_liquidations', (r) => r.mev.liquidations],
  ['mev_estimated_eth', (r) => r.mev.estimatedMevEth],
  ['mev_bot_count', (r) => r.mev.mevBotAddresses.length],
  ['is_pbs_block', (r) => r.pbs.isPbsBlock],
  ['builder_address', (r) => r.pbs.builderAddress],
  ['builder_payment_eth', (r) => r.pbs.builderPaymentEth],
  ['extra_data', (r) => r.pbs.extraData],
];

export const LIFECYCLE_CSV_COLUMNS: readonly string[] = COLUMNS.map(([name]) => name);

function toCell(value: Cell): string {
  return value === null ? '' : String(value);
}

/**
 * Header row followed by one row per record, in input order
 *
 * @example
 * ```typescript
 * const [header, ...rows] = toLifecycleTable(records);
 * header[0]; // 'block_number'
 * ```
 */
export function toLifecycleTable(records: readonly BlockLifecycle[]): string[][] {
  const rows = records.map((record) =>
    COLUMNS.map(([, select]) => toCell(select(record)))
  );
  return [[...LIFECYCLE_CSV_COLUMNS], ...rows];
}

/**
 * Render records as CSV text (RFC 4180 quoting, trailing newline)
 */
export function toLifecycleCsv(records: readonly BlockLifecycle[]): string {
  return stringify(toLifecycleTable(records));
}

/**
 * Write records as CSV to `path`, replacing any existing file
 */
export async function exportLifecyclesToCsv(
  records: readonly BlockLifecycle[],
  path: string
): Promise<void> {
  log.methodEntry(logger, 'exportLifecyclesToCsv', { path, records: records.length });

  try {
    await writeFile(path, toLifecycleCsv(records), 'utf8');
    log.methodExit(logger, 'exportLifecyclesToCsv', { path });
  } catch (error) {
    log.methodError(logger, 'exportLifecyclesToCsv', error as Error, { path });
    throw error;
  }
}
