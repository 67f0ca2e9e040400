/**
 * Inspector Configuration
 *
 * Centralized configuration for the block inspector: RPC endpoint, target chain,
 * polling cadence and retry policy. Manages a cached viem public client.
 *
 * Environment Variables:
 * - RPC_URL                  - JSON-RPC endpoint (takes priority)
 * - ALCHEMY_RPC_URL          - Full Alchemy endpoint URL
 * - ALCHEMY_API_KEY          - Alchemy key, expanded to the Ethereum mainnet endpoint
 * - CHAIN_ID                 - Chain to inspect (default: 1)
 * - LIVE_POLL_INTERVAL_MS    - Poll interval for live monitoring (default: 3000)
 * - RPC_MAX_RETRIES          - Retry attempts for transient RPC failures (default: 3)
 * - RPC_RETRY_BASE_DELAY_MS  - Base backoff delay (default: 500)
 *
 * Note: getRpcUrl() and getPublicClient() throw RpcUrlMissingError when no
 * endpoint can be resolved.
 */

import { createPublicClient, http, type PublicClient } from 'viem';
import {
  mainnet,
  arbitrum,
  base,
  bsc,
  polygon,
  optimism,
  type Chain,
} from 'viem/chains';
import { createBlockSource, type BlockSource } from '../utils/evm/block-source.js';

/**
 * Supported chain identifiers
 */
export enum SupportedChainId {
  ETHEREUM = 1,
  ARBITRUM = 42161,
  BASE = 8453,
  BSC = 56,
  POLYGON = 137,
  OPTIMISM = 10,
}

/**
 * Chain metadata the inspector needs
 */
export interface ChainConfig {
  /** Chain ID (e.g., 1 for Ethereum) */
  chainId: number;
  /** Human-readable chain name */
  name: string;
  /** Viem chain definition */
  viemChain: Chain;
}

const CHAINS: Record<SupportedChainId, ChainConfig> = {
  [SupportedChainId.ETHEREUM]: { chainId: 1, name: 'Ethereum', viemChain: mainnet },
  [SupportedChainId.ARBITRUM]: { chainId: 42161, name: 'Arbitrum One', viemChain: arbitrum },
  [SupportedChainId.BASE]: { chainId: 8453, name: 'Base', viemChain: base },
  [SupportedChainId.BSC]: { chainId: 56, name: 'BNB Smart Chain', viemChain: bsc },
  [SupportedChainId.POLYGON]: { chainId: 137, name: 'Polygon', viemChain: polygon },
  [SupportedChainId.OPTIMISM]: { chainId: 10, name: 'Optimism', viemChain: optimism },
};

/**
 * Retry policy for RPC calls at the fetch boundary
 */
export interface RpcRetryConfig {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Explicit overrides, typically coming from CLI flags
 */
export interface InspectorConfigOverrides {
  rpcUrl?: string;
  chainId?: number;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_LIVE_POLL_INTERVAL_MS = 3000;
export const DEFAULT_RPC_MAX_RETRIES = 3;
export const DEFAULT_RPC_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RPC_RETRY_MAX_DELAY_MS = 8000;

const ALCHEMY_MAINNET_URL = 'https://eth-mainnet.g.alchemy.com/v2';

/**
 * Error thrown when no RPC endpoint could be resolved
 */
export class RpcUrlMissingError extends Error {
  constructor() {
    super(
      'No RPC endpoint configured.\n\n' +
        'To fix this, do one of the following:\n' +
        '1. Pass --rpc https://your-rpc-provider.com/...\n' +
        '2. Set RPC_URL (or ALCHEMY_RPC_URL) to your endpoint\n' +
        '3. Set ALCHEMY_API_KEY to use the Alchemy Ethereum mainnet endpoint'
    );
    this.name = 'RpcUrlMissingError';
  }
}

/**
 * Error thrown when a configuration value cannot be parsed
 */
export class InvalidConfigValueError extends Error {
  constructor(
    public readonly variable: string,
    public readonly value: string,
    expected: string
  ) {
    super(`Invalid value for ${variable}: '${value}' (expected ${expected})`);
    this.name = 'InvalidConfigValueError';
  }
}

function readNonNegativeInt(
  env: NodeJS.ProcessEnv,
  variable: string,
  fallback: number
): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidConfigValueError(variable, raw, 'a non-negative integer');
  }
  return parsed;
}

/**
 * Inspector Configuration Manager
 *
 * Uses singleton pattern for convenient default access; tests and the CLI
 * construct their own instances with explicit overrides.
 */
export class InspectorConfig {
  private static instance: InspectorConfig | null = null;

  private readonly rpcUrl: string | null;
  private readonly chain: ChainConfig;
  private client: PublicClient | null = null;
  private blockSource: BlockSource | null = null;

  readonly livePollIntervalMs: number;
  readonly retry: RpcRetryConfig;

  /**
   * Resolves the RPC endpoint in priority order:
   * explicit override, RPC_URL, ALCHEMY_RPC_URL, ALCHEMY_API_KEY.
   *
   * @throws InvalidConfigValueError for malformed numeric variables or an unsupported CHAIN_ID
   */
  constructor(overrides: InspectorConfigOverrides = {}) {
    const env = overrides.env ?? process.env;

    this.rpcUrl = InspectorConfig.resolveRpcUrl(overrides.rpcUrl, env);

    const chainId =
      overrides.chainId ??
      readNonNegativeInt(env, 'CHAIN_ID', SupportedChainId.ETHEREUM);
    if (!isSupportedChainId(chainId)) {
      throw new InvalidConfigValueError(
        'CHAIN_ID',
        String(chainId),
        `one of ${Object.keys(CHAINS).join(', ')}`
      );
    }
    this.chain = CHAINS[chainId];

    this.livePollIntervalMs = readNonNegativeInt(
      env,
      'LIVE_POLL_INTERVAL_MS',
      DEFAULT_LIVE_POLL_INTERVAL_MS
    );
    this.retry = {
      retries: readNonNegativeInt(env, 'RPC_MAX_RETRIES', DEFAULT_RPC_MAX_RETRIES),
      baseDelayMs: readNonNegativeInt(
        env,
        'RPC_RETRY_BASE_DELAY_MS',
        DEFAULT_RPC_RETRY_BASE_DELAY_MS
      ),
      maxDelayMs: DEFAULT_RPC_RETRY_MAX_DELAY_MS,
    };
  }

  /**
   * Get singleton instance of InspectorConfig
   * Lazily creates instance from process.env on first access
   */
  static getInstance(): InspectorConfig {
    if (!InspectorConfig.instance) {
      InspectorConfig.instance = new InspectorConfig();
    }
    return InspectorConfig.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    InspectorConfig.instance = null;
  }

  private static resolveRpcUrl(
    override: string | undefined,
    env: NodeJS.ProcessEnv
  ): string | null {
    const candidates = [override, env['RPC_URL'], env['ALCHEMY_RPC_URL']];
    for (const candidate of candidates) {
      if (candidate && candidate.trim() !== '') {
        return candidate.trim();
      }
    }

    const apiKey = env['ALCHEMY_API_KEY'];
    if (apiKey && apiKey.trim() !== '') {
      return `${ALCHEMY_MAINNET_URL}/${apiKey.trim()}`;
    }

    return null;
  }

  /**
   * @throws RpcUrlMissingError if no endpoint was configured
   */
  getRpcUrl(): string {
    if (this.rpcUrl === null) {
      throw new RpcUrlMissingError();
    }
    return this.rpcUrl;
  }

  hasRpcUrl(): boolean {
    return this.rpcUrl !== null;
  }

  getChainConfig(): ChainConfig {
    return this.chain;
  }

  /**
   * Get the viem PublicClient for the configured chain
   *
   * Created on first use and reused afterwards.
   *
   * @throws RpcUrlMissingError if no endpoint was configured
   */
  getPublicClient(): PublicClient {
    if (this.client) {
      return this.client;
    }

    const client = createPublicClient({
      chain: this.chain.viemChain,
      // Retries are handled by withRetries at the fetch boundary
      transport: http(this.getRpcUrl(), { retryCount: 0 }),
    });

    this.client = client;
    return client;
  }

  /**
   * Block and receipt reads bound to the configured PublicClient
   *
   * @throws RpcUrlMissingError if no endpoint was configured
   */
  getBlockSource(): BlockSource {
    if (!this.blockSource) {
      this.blockSource = createBlockSource(this.getPublicClient());
    }
    return this.blockSource;
  }
}

/**
 * Check if a chain ID is supported by the inspector
 */
export function isSupportedChainId(chainId: number): chainId is SupportedChainId {
  return Object.prototype.hasOwnProperty.call(CHAINS, chainId);
}

/**
 * Get the default InspectorConfig singleton instance
 */
export function getInspectorConfig(): InspectorConfig {
  return InspectorConfig.getInstance();
}
