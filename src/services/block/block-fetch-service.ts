/**
 * Block Fetch Service
 *
 * Reads blocks, chain height and receipt outcomes from the configured chain.
 * Every RPC read goes through the retry policy; a missing block is reported
 * as null rather than an error.
 */

import type { InspectorConfig } from '../../config/inspector.js';
import { getInspectorConfig } from '../../config/inspector.js';
import type { InspectedBlock, TransactionStatus } from '../types/block/index.js';
import {
  getBlockWithTransactions,
  getLatestBlockNumber,
  getTransactionStatuses,
} from '../../utils/evm/block-reader.js';
import type { BlockSelector } from '../../utils/evm/block-source.js';
import { withRetries } from '../../utils/retry/index.js';
import { createServiceLogger, log } from '../../logging/logger-factory.js';

/**
 * Dependencies for BlockFetchService
 * All dependencies are optional and will use defaults if not provided
 */
export interface BlockFetchServiceDependencies {
  /**
   * Inspector configuration for RPC access and retry policy
   * If not provided, the singleton InspectorConfig instance will be used
   */
  config?: InspectorConfig;
}

export class BlockFetchService {
  private readonly config: InspectorConfig;
  private readonly logger = createServiceLogger('BlockFetchService');

  /**
   * Creates a new BlockFetchService instance
   *
   * @param dependencies - Optional dependencies object
   * @param dependencies.config - Inspector configuration (uses singleton if not provided)
   */
  constructor(dependencies: BlockFetchServiceDependencies = {}) {
    this.config = dependencies.config ?? getInspectorConfig();
  }

  private retrying<T>(call: () => Promise<T>): Promise<T> {
    return withRetries(call, { ...this.config.retry, name: 'BlockFetchService' });
  }

  /**
   * Fetch a block with its transactions
   *
   * @param identifier - Block height or 'latest'
   * @returns The block, or null if the chain has no block at that height
   * @throws BlockFetchError once retries are exhausted
   */
  async fetchBlock(identifier: BlockSelector): Promise<InspectedBlock | null> {
    const params = { identifier: String(identifier) };
    log.methodEntry(this.logger, 'fetchBlock', params);

    try {
      log.externalApiCall(this.logger, 'JSON-RPC', 'eth_getBlockByNumber', params);
      const block = await this.retrying(() =>
        getBlockWithTransactions(identifier, this.config)
      );

      if (block) {
        log.methodExit(this.logger, 'fetchBlock', {
          blockNumber: block.number.toString(),
          transactionCount: block.transactions.length,
        });
      } else {
        this.logger.info(params, 'Block not found');
      }

      return block;
    } catch (error) {
      log.methodError(this.logger, 'fetchBlock', error as Error, params);
      throw error;
    }
  }

  /**
   * Fetch the predecessor of the block at `height`
   *
   * @returns null at height 0, or when the predecessor is not available
   */
  async fetchPreviousBlock(height: bigint): Promise<InspectedBlock | null> {
    if (height <= 0n) {
      return null;
    }
    return this.fetchBlock(height - 1n);
  }

  /**
   * Fetch the current chain head height
   *
   * @throws BlockFetchError once retries are exhausted
   */
  async fetchLatestHeight(): Promise<bigint> {
    log.methodEntry(this.logger, 'fetchLatestHeight');

    try {
      log.externalApiCall(this.logger, 'JSON-RPC', 'eth_blockNumber');
      const height = await this.retrying(() => getLatestBlockNumber(this.config));

      log.methodExit(this.logger, 'fetchLatestHeight', {
        height: height.toString(),
      });
      return height;
    } catch (error) {
      log.methodError(this.logger, 'fetchLatestHeight', error as Error);
      throw error;
    }
  }

  /**
   * Fetch receipt outcomes for every transaction of `block`, in block order
   *
   * Each receipt is retried on its own.
   *
   * @throws BlockFetchError once retries are exhausted
   */
  async fetchReceiptStatuses(block: InspectedBlock): Promise<TransactionStatus[]> {
    const params = {
      blockNumber: block.number.toString(),
      transactionCount: block.transactions.length,
    };
    log.methodEntry(this.logger, 'fetchReceiptStatuses', params);

    try {
      const statuses: TransactionStatus[] = [];
      for (const tx of block.transactions) {
        const [status] = await this.retrying(() =>
          getTransactionStatuses([tx.hash], this.config)
        );
        if (status !== undefined) {
          statuses.push(status);
        }
      }

      log.methodExit(this.logger, 'fetchReceiptStatuses', {
        ...params,
        reverted: statuses.filter((s) => s === 'reverted').length,
      });
      return statuses;
    } catch (error) {
      log.methodError(this.logger, 'fetchReceiptStatuses', error as Error, params);
      throw error;
    }
  }
}
