/**
 * Logger utility
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger for library use; the CLI
 * switches to a console logger at the requested level.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels in increasing severity. `silent` disables all output.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Create a logger that forwards to `base` only for messages at or above `level`
 *
 * @example
 * ```typescript
 * setLogger(createConsoleLogger('debug'))
 * ```
 */
export function createConsoleLogger(level: LogLevel, base: Logger = consoleLogger): Logger {
  const enabled = (l: LogLevel): boolean => LEVEL_RANK[l] >= LEVEL_RANK[level]
  return {
    debug(message, ...args) {
      if (enabled('debug')) base.debug(message, ...args)
    },
    info(message, ...args) {
      if (enabled('info')) base.info(message, ...args)
    },
    warn(message, ...args) {
      if (enabled('warn')) base.warn(message, ...args)
    },
    error(message, error, ...args) {
      if (enabled('error')) base.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @param l - Logger implementation to use
 */
export function setLogger(l: Logger): void {
  logger = l
}
