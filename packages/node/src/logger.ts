/**
 * @beta99/node - Logger
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to a noop logger so library use stays silent;
 * the CLI installs a console logger.
 */

/**
 * Logger interface for consistent logging across the packer
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Console logger that drops messages below `level`.
 * Info goes to stdout; everything else to stderr.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= LEVEL_ORDER[level]
  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(message, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger at info level
 */
export const consoleLogger: Logger = createConsoleLogger('info')

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, createConsoleLogger } from '@beta99/node'
 *
 * setLogger(createConsoleLogger('debug'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
