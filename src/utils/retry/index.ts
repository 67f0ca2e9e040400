/**
 * Retry Handler Module
 *
 * Backoff and retry for transient failures at the RPC boundary.
 */

export {
  withRetries,
  isTransientRpcError,
  backoffDelay,
} from './retry-handler.js';
export type { RetryOptions } from './retry-handler.js';
