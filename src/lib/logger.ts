/**
 * Leveled console logger with a `[context]` prefix on every line.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/**
 * Creates a logger that writes to the console, dropping messages below `level`.
 *
 * @example
 * const log = createLogger('Generator', 'info')
 * log.info('accepted level 12', { optimalMoves: 9 })
 * // [Generator] accepted level 12 { optimalMoves: 9 }
 */
export function createLogger(context: string, level: LogLevel = 'warn'): Logger {
  const prefix = `[${context}]`
  const enabled = (messageLevel: LogLevel) => LEVEL_RANK[messageLevel] >= LEVEL_RANK[level]

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
  }
}
