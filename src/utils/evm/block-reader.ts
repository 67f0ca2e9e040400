/**
 * EVM Block Reader Utilities
 *
 * Low-level utilities for reading full blocks and receipts from an EVM chain.
 * These are plain functions that take the InspectorConfig explicitly for testability.
 */

import { BaseError, BlockNotFoundError, isHex, type Hash } from 'viem';
import type { InspectorConfig } from '../../config/inspector.js';
import type {
  InspectedBlock,
  InspectedTransaction,
  TransactionStatus,
} from '../../services/types/block/index.js';
import type { BlockSelector, RawBlock, RawTransaction } from './block-source.js';

/**
 * Error thrown when a block identifier is neither "latest" nor a non-negative integer
 */
export class InvalidBlockIdentifierError extends Error {
  constructor(public readonly identifier: string) {
    super(
      `Invalid block identifier: '${identifier}'. Expected 'latest' or a non-negative integer`
    );
    this.name = 'InvalidBlockIdentifierError';
  }
}

/**
 * Error thrown when an RPC read fails for a reason other than a missing block
 */
export class BlockFetchError extends Error {
  constructor(
    message: string,
    public readonly identifier: string,
    public readonly chainName: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'BlockFetchError';
  }
}

/**
 * Error thrown when a node returns a block without number or hash
 */
export class PendingBlockError extends Error {
  constructor() {
    super('Received a pending block without number or hash');
    this.name = 'PendingBlockError';
  }
}

function isBlockNotFound(error: unknown): boolean {
  if (error instanceof BlockNotFoundError) {
    return true;
  }
  return (
    error instanceof BaseError &&
    error.walk((e) => e instanceof BlockNotFoundError) !== null
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a user-supplied block identifier
 *
 * @example
 * ```typescript
 * parseBlockIdentifier('latest');   // 'latest'
 * parseBlockIdentifier('19000000'); // 19000000n
 * ```
 * @throws InvalidBlockIdentifierError
 */
export function parseBlockIdentifier(input: string): BlockSelector {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'latest') {
    return 'latest';
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidBlockIdentifierError(input);
  }
  return BigInt(trimmed);
}

function toInspectedTransaction(tx: RawTransaction): InspectedTransaction {
  return {
    hash: tx.hash,
    from: tx.from,
    to: tx.to,
    value: tx.value,
    gas: tx.gas,
    maxFeePerGas: tx.maxFeePerGas ?? null,
    maxPriorityFeePerGas: tx.maxPriorityFeePerGas ?? null,
    type: tx.type ?? null,
  };
}

/**
 * Map a viem block (transactions included) to the inspector's block model
 *
 * @throws PendingBlockError when number or hash is missing
 */
export function toInspectedBlock(block: RawBlock): InspectedBlock {
  if (block.number === null || block.hash === null) {
    throw new PendingBlockError();
  }

  return {
    number: block.number,
    hash: block.hash,
    timestamp: block.timestamp,
    gasUsed: block.gasUsed,
    gasLimit: block.gasLimit,
    baseFeePerGas: block.baseFeePerGas ?? null,
    miner: block.miner,
    extraData: isHex(block.extraData) ? block.extraData : '0x',
    transactions: block.transactions.map(toInspectedTransaction),
  };
}

/**
 * Get a block with its full transaction list
 *
 * @param identifier - Block height or 'latest'
 * @param config - Inspector configuration instance
 * @returns The block, or null when the node reports it does not exist
 * @throws BlockFetchError if the RPC call fails
 */
export async function getBlockWithTransactions(
  identifier: BlockSelector,
  config: InspectorConfig
): Promise<InspectedBlock | null> {
  const source = config.getBlockSource();
  const chainConfig = config.getChainConfig();

  try {
    const block = await source.getBlock(identifier);
    return toInspectedBlock(block);
  } catch (error) {
    if (isBlockNotFound(error)) {
      return null;
    }
    throw new BlockFetchError(
      `Failed to get block ${identifier} on ${chainConfig.name} (Chain ID: ${chainConfig.chainId}): ${describeError(error)}`,
      String(identifier),
      chainConfig.name,
      error
    );
  }
}

/**
 * Get current (latest) block number
 *
 * @throws BlockFetchError if the RPC call fails
 */
export async function getLatestBlockNumber(config: InspectorConfig): Promise<bigint> {
  const source = config.getBlockSource();
  const chainConfig = config.getChainConfig();

  try {
    return await source.getBlockNumber();
  } catch (error) {
    throw new BlockFetchError(
      `Failed to get current block number on ${chainConfig.name} (Chain ID: ${chainConfig.chainId}): ${describeError(error)}`,
      'latest',
      chainConfig.name,
      error
    );
  }
}

/**
 * Get receipt outcomes for transactions, in the order given
 *
 * Receipts are requested one at a time.
 *
 * @throws BlockFetchError naming the first receipt that could not be read
 */
export async function getTransactionStatuses(
  hashes: readonly Hash[],
  config: InspectorConfig
): Promise<TransactionStatus[]> {
  const source = config.getBlockSource();
  const chainConfig = config.getChainConfig();
  const statuses: TransactionStatus[] = [];

  for (const hash of hashes) {
    try {
      statuses.push(await source.getReceiptStatus(hash));
    } catch (error) {
      throw new BlockFetchError(
        `Failed to get receipt ${hash} on ${chainConfig.name} (Chain ID: ${chainConfig.chainId}): ${describeError(error)}`,
        hash,
        chainConfig.name,
        error
      );
    }
  }

  return statuses;
}
