/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration for the block inspector.
 * Emits structured JSON so that analysis runs can be piped into log tooling
 * separately from the human-readable CLI output on stdout.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  LOG_LEVELS[NODE_ENV as keyof typeof LOG_LEVELS] ||
  'info';

const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance
 *
 * Logs go to stderr so CLI reports on stdout stay clean.
 * Service-specific loggers are created via createServiceLogger()
 * in logger-factory.ts
 */
export const logger = pino(loggerConfig, pino.destination(2));

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
