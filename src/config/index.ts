/**
 * Configuration exports for the block inspector
 */

export {
  InspectorConfig,
  getInspectorConfig,
  isSupportedChainId,
  SupportedChainId,
  RpcUrlMissingError,
  InvalidConfigValueError,
  DEFAULT_LIVE_POLL_INTERVAL_MS,
  DEFAULT_RPC_MAX_RETRIES,
  DEFAULT_RPC_RETRY_BASE_DELAY_MS,
  DEFAULT_RPC_RETRY_MAX_DELAY_MS,
  type ChainConfig,
  type RpcRetryConfig,
  type InspectorConfigOverrides,
} from './inspector.js';

export {
  AnalysisRegistry,
  getDefaultAnalysisRegistry,
  DEFAULT_KNOWN_MEV_BOTS,
  DEFAULT_BUILDER_FRAGMENTS,
  type KnownActorRegistry,
  type AnalysisRegistryInput,
} from './analysis-registry.js';
