/**
 * Block Source
 *
 * The three RPC reads the inspector needs, typed on the fields it consumes.
 * createBlockSource() binds them to a viem PublicClient.
 */

import type { Address, Hash, Hex, PublicClient } from 'viem';
import type { TransactionStatus } from '../../services/types/block/index.js';

/**
 * Transaction fields read from a full block
 */
export interface RawTransaction {
  hash: Hash;
  from: Address;
  to: Address | null;
  value: bigint;
  gas: bigint;
  maxFeePerGas?: bigint | undefined;
  maxPriorityFeePerGas?: bigint | undefined;
  type?: string | undefined;
}

/**
 * Block fields read from eth_getBlockByNumber with transactions included
 *
 * `number` and `hash` are null for pending blocks.
 */
export interface RawBlock {
  number: bigint | null;
  hash: Hash | null;
  timestamp: bigint;
  gasUsed: bigint;
  gasLimit: bigint;
  baseFeePerGas?: bigint | null | undefined;
  miner: Address;
  extraData: Hex;
  transactions: readonly RawTransaction[];
}

export type BlockSelector = bigint | 'latest';

export interface BlockSource {
  /** @throws viem BlockNotFoundError when the node has no such block */
  getBlock(selector: BlockSelector): Promise<RawBlock>;
  getBlockNumber(): Promise<bigint>;
  getReceiptStatus(hash: Hash): Promise<TransactionStatus>;
}

export function createBlockSource(client: PublicClient): BlockSource {
  return {
    async getBlock(selector) {
      if (selector === 'latest') {
        return client.getBlock({ blockTag: 'latest', includeTransactions: true });
      }
      return client.getBlock({ blockNumber: selector, includeTransactions: true });
    },
    getBlockNumber() {
      return client.getBlockNumber();
    },
    async getReceiptStatus(hash) {
      const receipt = await client.getTransactionReceipt({ hash });
      return receipt.status;
    },
  };
}
