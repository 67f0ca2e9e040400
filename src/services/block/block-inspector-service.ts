/**
 * Block Inspector Service
 *
 * Fetches blocks and turns them into BlockLifecycle records: single blocks,
 * height ranges, a live feed of new blocks, and MEV scans over recent history.
 * Blocks are fetched sequentially.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { InspectorConfig } from '../../config/inspector.js';
import { getInspectorConfig } from '../../config/inspector.js';
import type {
  BlockLifecycle,
  InspectedBlock,
  MevFlaggedBlock,
  MevScanSummary,
} from '../types/block/index.js';
import { BlockLifecycleAssembler } from '../../utils/block-analysis/index.js';
import type { BlockSelector } from '../../utils/evm/block-source.js';
import { BlockFetchService } from './block-fetch-service.js';
import { createServiceLogger, log } from '../../logging/logger-factory.js';

/**
 * Dependencies for BlockInspectorService
 * All dependencies are optional and will use defaults if not provided
 */
export interface BlockInspectorServiceDependencies {
  /**
   * Inspector configuration (poll interval, RPC access)
   * If not provided, the singleton InspectorConfig instance will be used
   */
  config?: InspectorConfig;

  /**
   * Block fetch service
   * If not provided, a new BlockFetchService instance will be created
   */
  fetchService?: BlockFetchService;

  /**
   * Lifecycle assembler carrying the MEV and PBS analyzers
   * If not provided, an assembler with the default registry will be created
   */
  assembler?: BlockLifecycleAssembler;
}

export interface InspectBlockOptions {
  /** Load receipts so failedCount reflects reverted transactions */
  includeReceipts?: boolean;
}

export interface InspectedBlockResult {
  block: InspectedBlock;
  lifecycle: BlockLifecycle;
}

export interface InspectRangeOptions extends InspectBlockOptions {
  /** Called for every inspected block, in height order */
  onBlock?: (lifecycle: BlockLifecycle) => void;
  /** Called for heights the node has no block for */
  onMissing?: (height: bigint) => void;
}

export interface MonitorLiveOptions {
  /** Number of polls; 0 polls until aborted */
  count?: number;
  /** Delay between polls, defaults to the configured interval */
  pollIntervalMs?: number;
  signal?: AbortSignal;
  onBlock?: (lifecycle: BlockLifecycle) => void;
}

/**
 * Error thrown when a range's start lies above its end
 */
export class InvalidBlockRangeError extends Error {
  constructor(
    public readonly start: bigint,
    public readonly end: bigint
  ) {
    super(`Invalid block range: start ${start} is greater than end ${end}`);
    this.name = 'InvalidBlockRangeError';
  }
}

export class BlockInspectorService {
  private readonly config: InspectorConfig;
  private readonly fetchService: BlockFetchService;
  private readonly assembler: BlockLifecycleAssembler;
  private readonly logger = createServiceLogger('BlockInspectorService');

  /**
   * Creates a new BlockInspectorService instance
   *
   * @param dependencies - Optional dependencies object
   * @param dependencies.config - Inspector configuration (uses singleton if not provided)
   * @param dependencies.fetchService - Block fetch service (creates default if not provided)
   * @param dependencies.assembler - Lifecycle assembler (creates default if not provided)
   */
  constructor(dependencies: BlockInspectorServiceDependencies = {}) {
    this.config = dependencies.config ?? getInspectorConfig();
    this.fetchService =
      dependencies.fetchService ?? new BlockFetchService({ config: this.config });
    this.assembler = dependencies.assembler ?? new BlockLifecycleAssembler();
  }

  /**
   * Inspect a single block
   *
   * @param identifier - Block height or 'latest'
   * @returns The lifecycle record, or null if the block does not exist
   * @throws BlockFetchError when the block or its predecessor cannot be read
   */
  async inspectBlock(
    identifier: BlockSelector,
    options: InspectBlockOptions = {}
  ): Promise<BlockLifecycle | null> {
    const inspected = await this.inspectBlockDetailed(identifier, options);
    return inspected ? inspected.lifecycle : null;
  }

  /**
   * Inspect a single block and return the fetched block alongside its record
   */
  async inspectBlockDetailed(
    identifier: BlockSelector,
    options: InspectBlockOptions = {}
  ): Promise<InspectedBlockResult | null> {
    const params = {
      identifier: String(identifier),
      includeReceipts: options.includeReceipts ?? false,
    };
    log.methodEntry(this.logger, 'inspectBlock', params);

    try {
      const block = await this.fetchService.fetchBlock(identifier);
      if (!block) {
        log.methodExit(this.logger, 'inspectBlock', { ...params, found: false });
        return null;
      }

      const lifecycle = await this.analyze(block, null, options);

      log.methodExit(this.logger, 'inspectBlock', {
        blockNumber: lifecycle.blockNumber,
        transactionCount: lifecycle.transactions.totalCount,
      });
      return { block, lifecycle };
    } catch (error) {
      log.methodError(this.logger, 'inspectBlock', error as Error, params);
      throw error;
    }
  }

  /**
   * Inspect every block in [start, end]
   *
   * Heights without a block are skipped.
   *
   * @throws InvalidBlockRangeError if start > end
   */
  async inspectRange(
    start: bigint,
    end: bigint,
    options: InspectRangeOptions = {}
  ): Promise<BlockLifecycle[]> {
    const params = { start: start.toString(), end: end.toString() };
    log.methodEntry(this.logger, 'inspectRange', params);

    try {
      if (start > end) {
        throw new InvalidBlockRangeError(start, end);
      }

      const results: BlockLifecycle[] = [];
      let previous: InspectedBlock | null = null;

      for (let height = start; height <= end; height++) {
        const block = await this.fetchService.fetchBlock(height);
        if (!block) {
          options.onMissing?.(height);
          previous = null;
          continue;
        }

        const lifecycle = await this.analyze(block, previous, options);
        results.push(lifecycle);
        options.onBlock?.(lifecycle);
        previous = block;
      }

      log.methodExit(this.logger, 'inspectRange', {
        ...params,
        inspected: results.length,
      });
      return results;
    } catch (error) {
      log.methodError(this.logger, 'inspectRange', error as Error, params);
      throw error;
    }
  }

  /**
   * Poll the chain head and inspect every new block
   *
   * The head at call time is the starting point; blocks above it are
   * inspected as they appear. Stops after `count` polls or when `signal`
   * aborts, and returns everything inspected so far.
   */
  async monitorLive(options: MonitorLiveOptions = {}): Promise<BlockLifecycle[]> {
    const count = options.count ?? 0;
    const pollIntervalMs = options.pollIntervalMs ?? this.config.livePollIntervalMs;
    const { signal } = options;
    log.methodEntry(this.logger, 'monitorLive', { count, pollIntervalMs });

    const results: BlockLifecycle[] = [];

    try {
      let lastSeen = await this.fetchService.fetchLatestHeight();
      let previous: InspectedBlock | null = null;

      for (let poll = 0; count === 0 || poll < count; poll++) {
        if (signal?.aborted) {
          break;
        }

        const current = await this.fetchService.fetchLatestHeight();
        for (let height = lastSeen + 1n; height <= current; height++) {
          if (signal?.aborted) {
            break;
          }
          const block = await this.fetchService.fetchBlock(height);
          if (!block) {
            previous = null;
            continue;
          }
          const lifecycle = await this.analyze(block, previous, {});
          results.push(lifecycle);
          options.onBlock?.(lifecycle);
          previous = block;
        }
        if (current > lastSeen) {
          lastSeen = current;
        }

        const isLastPoll = count !== 0 && poll === count - 1;
        if (!isLastPoll && !(await this.wait(pollIntervalMs, signal))) {
          break;
        }
      }

      log.methodExit(this.logger, 'monitorLive', {
        inspected: results.length,
        aborted: signal?.aborted ?? false,
      });
      return results;
    } catch (error) {
      log.methodError(this.logger, 'monitorLive', error as Error, {
        inspected: results.length,
      });
      throw error;
    }
  }

  /**
   * Scan the blocks [latest - blockCount, latest] for MEV at or above `thresholdEth`
   *
   * The average divides the flagged total by `blockCount`.
   */
  async scanForMev(blockCount: number, thresholdEth: number): Promise<MevScanSummary> {
    const params = { blockCount, thresholdEth };
    log.methodEntry(this.logger, 'scanForMev', params);

    try {
      const latest = await this.fetchService.fetchLatestHeight();
      const span = BigInt(blockCount);
      const start = latest > span ? latest - span : 0n;

      const flaggedBlocks: MevFlaggedBlock[] = [];
      let totalMevEth = 0;

      await this.inspectRange(start, latest, {
        onBlock: (lifecycle) => {
          if (lifecycle.mev.estimatedMevEth >= thresholdEth) {
            totalMevEth += lifecycle.mev.estimatedMevEth;
            flaggedBlocks.push({
              blockNumber: lifecycle.blockNumber,
              estimatedMevEth: lifecycle.mev.estimatedMevEth,
              sandwichAttackCount: lifecycle.mev.sandwichAttacks.length,
              arbitrageOpCount: lifecycle.mev.arbitrageOps.length,
            });
          }
        },
      });

      const summary: MevScanSummary = {
        blocksAnalyzed: blockCount,
        blocksWithMev: flaggedBlocks.length,
        totalMevEth,
        averageMevPerBlockEth: blockCount === 0 ? 0 : totalMevEth / blockCount,
        flaggedBlocks,
      };

      log.methodExit(this.logger, 'scanForMev', {
        blocksWithMev: summary.blocksWithMev,
        totalMevEth,
      });
      return summary;
    } catch (error) {
      log.methodError(this.logger, 'scanForMev', error as Error, params);
      throw error;
    }
  }

  private async analyze(
    block: InspectedBlock,
    knownPrevious: InspectedBlock | null,
    options: InspectBlockOptions
  ): Promise<BlockLifecycle> {
    const previous =
      knownPrevious && knownPrevious.number === block.number - 1n
        ? knownPrevious
        : await this.fetchService.fetchPreviousBlock(block.number);

    const receiptStatuses = options.includeReceipts
      ? await this.fetchService.fetchReceiptStatuses(block)
      : null;

    return this.assembler.assemble(block, previous, { receiptStatuses });
  }

  /**
   * @returns false when the wait was cut short by `signal`
   */
  private async wait(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }
    try {
      await sleep(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
  }
}
