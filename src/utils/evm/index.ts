/**
 * EVM Utilities
 *
 * Block and receipt reading on top of a viem PublicClient
 */

export {
  createBlockSource,
  type BlockSource,
  type BlockSelector,
  type RawBlock,
  type RawTransaction,
} from './block-source.js';

export {
  getBlockWithTransactions,
  getLatestBlockNumber,
  getTransactionStatuses,
  toInspectedBlock,
  parseBlockIdentifier,
  InvalidBlockIdentifierError,
  BlockFetchError,
  PendingBlockError,
} from './block-reader.js';
