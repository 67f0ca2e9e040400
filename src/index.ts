/**
 * Block Lifecycle Inspector
 *
 * Fetches Ethereum blocks over JSON-RPC and derives per-block lifecycle
 * records: timing, gas economics, transaction mix and ordering, MEV
 * heuristics and builder attribution.
 */

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export services
export * from './services/block/index.js';

// Export service types
export type * from './services/types/index.js';

export const version = '0.1.0';
