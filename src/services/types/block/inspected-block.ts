/**
 * Inspected Block
 *
 * Block data as handed to the analysis pipeline: header fields, gas
 * accounting and the full ordered transaction list.
 * All integer quantities are bigint to preserve precision.
 */

import type { Hash, Hex } from 'viem';

/**
 * Protocol type discriminants the ordering analyzer buckets on.
 * Anything else (including null) is counted as legacy.
 */
export type TransactionTypeBucket = 'legacy' | 'eip2930' | 'eip1559' | 'eip4844';

export interface InspectedTransaction {
  /** Transaction hash */
  hash: Hash;

  /** Sender address */
  from: string;

  /** Recipient address, null for contract creation */
  to: string | null;

  /** Value transferred in wei */
  value: bigint;

  /** Gas limit of the transaction */
  gas: bigint;

  /** EIP-1559 fee cap, null for legacy and access-list transactions */
  maxFeePerGas: bigint | null;

  /** EIP-1559 tip cap, null for legacy and access-list transactions */
  maxPriorityFeePerGas: bigint | null;

  /**
   * Protocol type as reported upstream: a bucket name, its numeric form
   * ('0x0'..'0x3'), an unknown type, or null when absent
   */
  type: TransactionTypeBucket | string | null;
}

export interface InspectedBlock {
  /** Block number */
  number: bigint;

  /** Block hash (0x-prefixed hex string) */
  hash: string;

  /** Block timestamp (Unix seconds) */
  timestamp: bigint;

  /** Total gas used in the block */
  gasUsed: bigint;

  /** Maximum gas allowed in the block */
  gasLimit: bigint;

  /** Base fee per gas (EIP-1559), null for pre-London blocks */
  baseFeePerGas: bigint | null;

  /** Fee recipient / block producer address */
  miner: string;

  /** Raw extraData bytes */
  extraData: Hex;

  /** Transactions in block order */
  transactions: readonly InspectedTransaction[];
}

/**
 * Receipt outcome of one transaction, in block order
 */
export type TransactionStatus = 'success' | 'reverted';
