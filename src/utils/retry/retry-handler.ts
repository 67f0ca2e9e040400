/**
 * RetryHandler
 *
 * Retry logic with exponential backoff for transient RPC failures.
 * Applied at the fetch boundary only; the analysis pipeline never retries.
 *
 * Features:
 * - Exponential backoff with jitter
 * - Only retries errors the predicate accepts (default: rate limits,
 *   5xx responses, timeouts and connection failures)
 * - Never retries BlockNotFoundError
 *
 * @example
 * ```typescript
 * const block = await withRetries(
 *   () => client.getBlock({ blockNumber, includeTransactions: true }),
 *   { retries: 3, baseDelayMs: 500, name: 'BlockFetchService' }
 * );
 * ```
 */

import {
  BaseError,
  BlockNotFoundError,
  HttpRequestError,
  LimitExceededRpcError,
  TimeoutError,
} from 'viem';
import { createServiceLogger, log } from '../../logging/index.js';

export interface RetryOptions {
  /**
   * Maximum number of retry attempts
   * @default 3
   */
  retries?: number;

  /**
   * Base delay in milliseconds for exponential backoff
   * @default 500
   */
  baseDelayMs?: number;

  /**
   * Maximum delay in milliseconds
   * @default 8000
   */
  maxDelayMs?: number;

  /**
   * Optional name for logging purposes
   * @default 'RetryHandler'
   */
  name?: string;

  /**
   * Function to determine if an error is retryable
   * @default isTransientRpcError
   */
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Default retry predicate
 *
 * Walks viem's error chain looking for an HTTP 429/5xx, a connection-level
 * HTTP failure (no status), a timeout, or a provider rate-limit error.
 * Non-viem errors are judged by their `cause`.
 */
export function isTransientRpcError(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    // Wrapped boundary errors (e.g. BlockFetchError) carry the viem error as cause
    return error instanceof Error && error.cause !== undefined
      ? isTransientRpcError(error.cause)
      : false;
  }
  if (error.walk((e) => e instanceof BlockNotFoundError) !== null) {
    return false;
  }

  const cause = error.walk(
    (e) =>
      e instanceof HttpRequestError ||
      e instanceof TimeoutError ||
      e instanceof LimitExceededRpcError
  );
  if (cause === null) {
    return false;
  }
  if (cause instanceof HttpRequestError) {
    const status = cause.status;
    return status === undefined || status === 429 || (status >= 500 && status < 600);
  }
  return true;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff before retry number `attempt + 1`, without jitter
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
}

/**
 * Execute an async call with retry logic and exponential backoff
 *
 * @returns the call's result
 * @throws the last error once retries are exhausted, or immediately for non-retryable errors
 */
export async function withRetries<T>(
  call: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    retries = 3,
    baseDelayMs = 500,
    maxDelayMs = 8000,
    name = 'RetryHandler',
    isRetryable = isTransientRpcError,
  } = options;

  const logger = createServiceLogger(name);
  let attempt = 0;

  while (true) {
    try {
      return await call();
    } catch (error) {
      const retryable = isRetryable(error);

      if (!retryable || attempt >= retries) {
        if (error instanceof Error) {
          log.methodError(logger, 'withRetries', error, { attempt, retryable });
        }
        if (retryable) {
          logger.error({ attempt, maxRetries: retries }, 'All retry attempts exhausted');
        }
        throw error;
      }

      const jitter = Math.floor(Math.random() * 200);
      const totalDelay = backoffDelay(attempt, baseDelayMs, maxDelayMs) + jitter;

      logger.warn(
        { attempt: attempt + 1, maxRetries: retries, delay: totalDelay },
        'Retryable error, backing off'
      );

      await sleep(totalDelay);
      attempt++;
    }
  }
}
