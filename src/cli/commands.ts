/**
 * Command-line front end
 *
 * block-inspector [--rpc URL] <command> [options]
 *
 *   block  --number <n|latest> [--verbose] [--receipts]
 *   range  --start <n> --end <n> [--output file.csv]
 *   live   [--count 10] [--output file.csv]
 *   mev    [--blocks 100] [--threshold 0.1]
 *
 * Reports go to stdout, errors to stderr. runCli() resolves to the process
 * exit code and never rejects for user or RPC errors.
 */

import { parseArgs } from 'node:util';
import { InspectorConfig, RpcUrlMissingError } from '../config/inspector.js';
import {
  BlockInspectorService,
  InvalidBlockRangeError,
} from '../services/block/index.js';
import type { BlockLifecycle } from '../services/types/block/index.js';
import {
  InvalidBlockIdentifierError,
  parseBlockIdentifier,
  type BlockSelector,
} from '../utils/evm/index.js';
import { exportLifecyclesToCsv } from '../utils/export/index.js';
import { formatBlockLifecycle, formatTransactionDetails } from '../utils/format/index.js';
import { createServiceLogger, log } from '../logging/index.js';

const logger = createServiceLogger('Cli');

export const USAGE = `Usage: block-inspector [--rpc URL] <command> [options]

Commands:
  block   Analyze a single block
            --number <n|latest>   Block to analyze (default: latest)
            --verbose             List the first transactions
            --receipts            Load receipts to count failed transactions
  range   Analyze a range of blocks
            --start <n>           First block (required)
            --end <n>             Last block (required)
            --output <file>       Write results as CSV
  live    Follow new blocks as they are produced (Ctrl-C to stop)
            --count <n>           Number of polls, 0 = until stopped (default: 10)
            --output <file>       Write results as CSV
  mev     Scan recent blocks for MEV activity
            --blocks <n>          Blocks to scan back from the head (default: 100)
            --threshold <eth>     Minimum estimated MEV in ETH (default: 0.1)

Options:
  --rpc <url>   JSON-RPC endpoint (default: RPC_URL, ALCHEMY_RPC_URL or ALCHEMY_API_KEY)
  --help        Show this message`;

export const COMMANDS = ['block', 'range', 'live', 'mev'] as const;
export type CommandName = (typeof COMMANDS)[number];

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliContext {
  io: CliIo;
  env: NodeJS.ProcessEnv;
  /** Aborts live monitoring, wired to SIGINT by the entry point */
  signal?: AbortSignal;
  createInspector: (config: InspectorConfig) => BlockInspectorService;
}

/**
 * Error thrown for malformed command lines; reported together with the usage text
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const OPTIONS = {
  rpc: { type: 'string' },
  number: { type: 'string' },
  verbose: { type: 'boolean' },
  receipts: { type: 'boolean' },
  start: { type: 'string' },
  end: { type: 'string' },
  output: { type: 'string' },
  count: { type: 'string' },
  blocks: { type: 'string' },
  threshold: { type: 'string' },
  help: { type: 'boolean' },
} as const;

interface ParsedOptions {
  number?: string;
  verbose?: boolean;
  receipts?: boolean;
  start?: string;
  end?: string;
  output?: string;
  count?: string;
  blocks?: string;
  threshold?: string;
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseNonNegativeInteger(name: string, raw: string): bigint {
  if (!/^\d+$/.test(raw.trim())) {
    throw new CliUsageError(`--${name} must be a non-negative integer, got '${raw}'`);
  }
  return BigInt(raw.trim());
}

function parseCount(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = parseNonNegativeInteger(name, raw);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CliUsageError(`--${name} is too large: ${raw}`);
  }
  return Number(value);
}

function parseEth(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new CliUsageError(`--${name} must be a non-negative number, got '${raw}'`);
  }
  return value;
}

function requireOption(name: string, value: string | undefined): string {
  if (value === undefined) {
    throw new CliUsageError(`--${name} is required`);
  }
  return value;
}

async function runBlock(
  inspector: BlockInspectorService,
  values: ParsedOptions,
  io: CliIo
): Promise<number> {
  let identifier: BlockSelector;
  try {
    identifier = parseBlockIdentifier(values.number ?? 'latest');
  } catch (error) {
    if (error instanceof InvalidBlockIdentifierError) {
      throw new CliUsageError(error.message);
    }
    throw error;
  }

  const result = await inspector.inspectBlockDetailed(identifier, {
    includeReceipts: values.receipts ?? false,
  });
  if (!result) {
    io.stderr(`Block not found: ${String(identifier)}`);
    return 1;
  }

  io.stdout(formatBlockLifecycle(result.lifecycle));
  if (values.verbose) {
    io.stdout(formatTransactionDetails(result.block));
  }
  return 0;
}

async function writeCsv(
  records: readonly BlockLifecycle[],
  output: string | undefined,
  io: CliIo
): Promise<void> {
  if (output === undefined) {
    return;
  }
  await exportLifecyclesToCsv(records, output);
  io.stdout(`\nExported ${records.length} blocks to ${output}`);
}

async function runRange(
  inspector: BlockInspectorService,
  values: ParsedOptions,
  io: CliIo
): Promise<number> {
  const start = parseNonNegativeInteger('start', requireOption('start', values.start));
  const end = parseNonNegativeInteger('end', requireOption('end', values.end));
  if (start > end) {
    throw new CliUsageError(new InvalidBlockRangeError(start, end).message);
  }

  io.stdout(`Analyzing blocks ${start} to ${end} (${end - start + 1n} blocks)...\n`);

  const records = await inspector.inspectRange(start, end, {
    onBlock: (lifecycle) =>
      io.stdout(
        `  Block ${lifecycle.blockNumber}: ${lifecycle.transactions.totalCount} txs, ` +
          `${lifecycle.gas.baseFeeGwei.toFixed(2)} gwei base fee`
      ),
    onMissing: (height) => io.stdout(`  Block ${height}: not found`),
  });

  io.stdout(`\nAnalysis complete: ${records.length} blocks`);
  await writeCsv(records, values.output, io);
  return 0;
}

async function runLive(
  inspector: BlockInspectorService,
  values: ParsedOptions,
  io: CliIo,
  signal: AbortSignal | undefined
): Promise<number> {
  const count = parseCount('count', values.count, 10);

  io.stdout('Monitoring live blocks...');

  const records = await inspector.monitorLive({
    count,
    signal,
    onBlock: (lifecycle) => io.stdout(formatBlockLifecycle(lifecycle)),
  });

  if (signal?.aborted) {
    io.stdout(`\nStopped after ${records.length} blocks`);
  }
  await writeCsv(records, values.output, io);
  return 0;
}

async function runMev(
  inspector: BlockInspectorService,
  values: ParsedOptions,
  io: CliIo
): Promise<number> {
  const blocks = parseCount('blocks', values.blocks, 100);
  const threshold = parseEth('threshold', values.threshold, 0.1);

  io.stdout(`Analyzing ${blocks} blocks for MEV (threshold: ${threshold} ETH)...\n`);

  const summary = await inspector.scanForMev(blocks, threshold);

  for (const flagged of summary.flaggedBlocks) {
    io.stdout(
      `Block ${flagged.blockNumber}: ${flagged.estimatedMevEth.toFixed(4)} ETH MEV detected`
    );
    if (flagged.sandwichAttackCount > 0) {
      io.stdout(`   - ${flagged.sandwichAttackCount} sandwich attacks`);
    }
    if (flagged.arbitrageOpCount > 0) {
      io.stdout(`   - ${flagged.arbitrageOpCount} arbitrage opportunities`);
    }
  }

  io.stdout(
    [
      '',
      '═'.repeat(39),
      `Blocks analyzed: ${summary.blocksAnalyzed}`,
      `Blocks with MEV: ${summary.blocksWithMev}`,
      `Total MEV extracted: ${summary.totalMevEth.toFixed(4)} ETH`,
      `Average MEV per block: ${summary.averageMevPerBlockEth.toFixed(4)} ETH`,
      '═'.repeat(39),
    ].join('\n')
  );
  return 0;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Run one command line
 *
 * @param argv - Arguments without the node executable and script path
 * @returns the exit code: 0 on success, 1 for usage, configuration and RPC errors
 */
export async function runCli(
  argv: readonly string[],
  context: Partial<CliContext> = {}
): Promise<number> {
  const io = context.io ?? defaultIo;
  const env = context.env ?? process.env;
  const createInspector =
    context.createInspector ??
    ((config: InspectorConfig) => new BlockInspectorService({ config }));

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });

    if (values.help) {
      io.stdout(USAGE);
      return 0;
    }

    const [command, ...extra] = positionals;
    if (command === undefined) {
      throw new CliUsageError('No command given');
    }
    if (!isCommandName(command)) {
      throw new CliUsageError(`Unknown command: ${command}`);
    }
    if (extra.length > 0) {
      throw new CliUsageError(`Unexpected argument: ${extra.join(' ')}`);
    }

    log.methodEntry(logger, 'runCli', { command });

    const config = new InspectorConfig({ rpcUrl: values.rpc, env });
    if (!config.hasRpcUrl()) {
      throw new RpcUrlMissingError();
    }
    const inspector = createInspector(config);

    const handlers: Record<CommandName, () => Promise<number>> = {
      block: () => runBlock(inspector, values, io),
      range: () => runRange(inspector, values, io),
      live: () => runLive(inspector, values, io, context.signal),
      mev: () => runMev(inspector, values, io),
    };
    return await handlers[command]();
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`Error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    // node:util parseArgs reports unknown or malformed flags as TypeError
    if (
      error instanceof TypeError &&
      'code' in error &&
      String(error.code).startsWith('ERR_PARSE_ARGS')
    ) {
      io.stderr(`Error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    if (error instanceof Error) {
      log.methodError(logger, 'runCli', error);
      io.stderr(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
