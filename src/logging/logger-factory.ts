/**
 * Logger Factory
 *
 * Creates service-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger interface
 * Extends Pino logger with service-specific context
 */
export interface ServiceLogger extends pino.Logger {}

/**
 * Create a service-specific logger with structured context
 *
 * @param serviceName - Name of the service (e.g., 'BlockFetchService', 'MevDetector')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('BlockFetchService');
 * logger.info('Fetching block 19000000');
 * // Output: {"level":"info","service":"BlockFetchService","msg":"Fetching block 19000000"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns for services
 *
 * Use these patterns to keep a uniform log format across fetchers and analyzers.
 */
export const LogPatterns = {
  /**
   * Log service method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'fetchBlock', { identifier: 'latest' });
   * // Output: {"level":"debug","service":"...","method":"fetchBlock","params":{"identifier":"latest"},"msg":"Entering fetchBlock"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log service method exit (debug level)
   *
   * Keep `result` to a summary; never log whole blocks.
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log service method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'fetchBlock', error, { identifier: '19000000' });
   * // Output: {"level":"error","service":"...","method":"fetchBlock","error":"RPC timeout","stack":"...","identifier":"19000000","msg":"Error in fetchBlock"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log external API call (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.externalApiCall(logger, 'Ethereum RPC', 'eth_getBlockByNumber', { blockNumber: '19000000' });
   * ```
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },

  /**
   * Log a best-effort fallback value being substituted (warn level)
   *
   * @example
   * ```typescript
   * LogPatterns.fallback(logger, 'weiToEth', 0, { input: '0xzz' });
   * // Output: {"level":"warn","service":"...","method":"weiToEth","fallback":0,"input":"0xzz","msg":"Falling back in weiToEth"}
   * ```
   */
  fallback: (
    logger: ServiceLogger,
    method: string,
    fallback: unknown,
    context: Record<string, unknown> = {}
  ) => {
    logger.warn({ method, fallback, ...context }, `Falling back in ${method}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'inspectRange', { start: '100', end: '110' });
 * log.methodExit(logger, 'inspectRange');
 * ```
 */
export const log = LogPatterns;
