/**
 * Transaction Ordering Analyzer
 *
 * Buckets transactions by protocol type and checks whether the block is
 * ordered by descending priority fee.
 */

import type {
  InspectedTransaction,
  TransactionStatus,
  TransactionTypeBucket,
  OrderingMetrics,
  TransactionMetrics,
  TypeBreakdown,
} from '../../services/types/block/index.js';

const TYPE_BUCKETS: ReadonlyMap<string, TransactionTypeBucket> = new Map<
  string,
  TransactionTypeBucket
>([
  ['legacy', 'legacy'],
  ['eip2930', 'eip2930'],
  ['eip1559', 'eip1559'],
  ['eip4844', 'eip4844'],
  ['0x0', 'legacy'],
  ['0x1', 'eip2930'],
  ['0x2', 'eip1559'],
  ['0x3', 'eip4844'],
]);

/**
 * Map a raw type discriminant to its bucket; unknown or missing types are legacy
 */
export function classifyTransactionType(
  type: InspectedTransaction['type']
): TransactionTypeBucket {
  if (type === null) {
    return 'legacy';
  }
  return TYPE_BUCKETS.get(type.toLowerCase()) ?? 'legacy';
}

export function countTransactionTypes(
  transactions: readonly Pick<InspectedTransaction, 'type'>[]
): TypeBreakdown {
  let legacy = 0;
  let eip2930 = 0;
  let eip1559 = 0;
  let eip4844Blob = 0;

  for (const tx of transactions) {
    switch (classifyTransactionType(tx.type)) {
      case 'eip2930':
        eip2930++;
        break;
      case 'eip1559':
        eip1559++;
        break;
      case 'eip4844':
        eip4844Blob++;
        break;
      default:
        legacy++;
    }
  }

  return { legacy, eip2930, eip1559, eip4844Blob };
}

/**
 * Count adjacent pairs where the later transaction pays a strictly higher
 * priority fee than the earlier one. Pairs where either side declares no
 * priority fee are skipped.
 *
 * avgDeviation is reported as 0; no position-deviation metric is computed.
 */
export function analyzeTransactionOrdering(
  transactions: readonly Pick<InspectedTransaction, 'maxPriorityFeePerGas'>[]
): OrderingMetrics {
  let anomalies = 0;

  for (let i = 1; i < transactions.length; i++) {
    const previousFee = transactions[i - 1]?.maxPriorityFeePerGas ?? null;
    const currentFee = transactions[i]?.maxPriorityFeePerGas ?? null;

    if (previousFee !== null && currentFee !== null && currentFee > previousFee) {
      anomalies++;
    }
  }

  return {
    sortedByPriority: anomalies === 0,
    anomalies,
    avgDeviation: 0,
  };
}

/**
 * Transaction composition and ordering for one block
 *
 * @param statuses - Receipt outcomes in block order; failedCount stays 0 without them
 */
export function analyzeTransactions(
  transactions: readonly InspectedTransaction[],
  statuses: readonly TransactionStatus[] | null = null
): TransactionMetrics {
  return {
    totalCount: transactions.length,
    typeBreakdown: countTransactionTypes(transactions),
    ordering: analyzeTransactionOrdering(transactions),
    failedCount: statuses
      ? statuses.filter((status) => status === 'reverted').length
      : 0,
  };
}
