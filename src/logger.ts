/**
 * Console logger with level filtering
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface LoggerOptions {
  level?: LogLevel
  prefix?: string
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const prefix = options.prefix ? `[${options.prefix}] ` : ''

  const shouldLog = (target: LogLevel): boolean => LOG_LEVELS[target] >= LOG_LEVELS[level]

  return {
    debug(message, ...args) {
      if (shouldLog('debug')) console.debug(`${prefix}${message}`, ...args)
    },
    info(message, ...args) {
      if (shouldLog('info')) console.info(`${prefix}${message}`, ...args)
    },
    warn(message, ...args) {
      if (shouldLog('warn')) console.warn(`${prefix}${message}`, ...args)
    },
    error(message, ...args) {
      if (shouldLog('error')) console.error(`${prefix}${message}`, ...args)
    },
  }
}

export function createSilentLogger(): Logger {
  const noop = (): void => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}
