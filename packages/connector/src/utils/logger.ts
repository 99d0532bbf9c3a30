/**
 * Logger Configuration Module - Pino structured logging for LAN Link peers
 * @packageDocumentation
 * @remarks
 * Provides structured JSON logging with the local peer ID on every entry so
 * that logs from several processes on one network can be told apart.
 */

import pino from 'pino';

/**
 * Logger type interface - wraps Pino logger
 * @remarks
 * Supports DEBUG, INFO, WARN, ERROR log levels with structured field logging.
 * Usage: logger.info({ field1, field2 }, 'message')
 */
export type Logger = pino.Logger;

/**
 * Valid log levels for the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Default log level when LOG_LEVEL environment variable not set
 */
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Type guard for supported log levels
 */
export function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate and normalize a log level
 * @param envLevel - Log level, case-insensitive
 * @returns Normalized log level, or 'info' when missing or invalid
 */
export function getValidLogLevel(envLevel?: string): LogLevel {
  if (!envLevel) {
    return DEFAULT_LOG_LEVEL;
  }

  const normalized = envLevel.toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

/**
 * Create configured Pino logger instance with peer ID context
 * @param peerId - Local peer ID to include in all log entries
 * @param logLevel - Optional log level override (defaults to LOG_LEVEL env var or 'info')
 * @returns Configured Pino logger instance with peerId as base context
 *
 * @example
 * ```typescript
 * const logger = createLogger(identity.peerId);
 * logger.info({ event: 'peer_admitted', remotePeerId }, 'Peer admitted');
 * // Output: {"level":30,"time":1703620800000,"peerId":"0b6c...","event":"peer_admitted",...}
 * ```
 *
 * @remarks
 * - Outputs JSON to stdout
 * - Log level configurable via LOG_LEVEL environment variable (DEBUG, INFO, WARN, ERROR)
 * - Uses child logger pattern to inject peerId context
 */
export function createLogger(peerId: string, logLevel?: string): Logger {
  const level = logLevel ? getValidLogLevel(logLevel) : getValidLogLevel(process.env.LOG_LEVEL);

  const baseLogger = pino({ level });

  return baseLogger.child({ peerId });
}
