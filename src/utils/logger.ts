/**
 * Logger utility for csvq
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to the noop logger; the CLI switches to a
 * stderr logger when CSVQ_LOG_LEVEL is set, so stdout only ever
 * carries query results.
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

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

export type LogLevel = typeof LOG_LEVELS[number]

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

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
 * Logger that writes every level to stderr, dropping messages below `level`.
 *
 * Extra arguments are appended as JSON so a log line stays on one line.
 */
export function createStderrLogger(
  level: LogLevel,
  write: (line: string) => void = line => { process.stderr.write(line) }
): Logger {
  const threshold = LEVEL_RANK[level]

  const emit = (lineLevel: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void => {
    if (LEVEL_RANK[lineLevel] > threshold) return
    const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : ''
    write(`[${lineLevel.toUpperCase()}] ${message}${extra}\n`)
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      emit('debug', message, args)
    },
    info(message: string, ...args: unknown[]): void {
      emit('info', message, args)
    },
    warn(message: string, ...args: unknown[]): void {
      emit('warn', message, args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      emit('error', message, error !== undefined ? [error, ...args] : args)
    },
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message
  if (typeof arg === 'string') return arg
  try {
    return JSON.stringify(arg) ?? String(arg)
  } catch {
    // Circular structures fall back to the default conversion
    return String(arg)
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
 * @example
 * ```typescript
 * import { setLogger, createStderrLogger } from './utils/logger'
 *
 * setLogger(createStderrLogger('debug'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
