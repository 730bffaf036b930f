import { getConfig, type LogLevel } from './config'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[getConfig().logLevel]
}

/**
 * Console logger whose lines read `[fieldwise:<scope>] message`.
 * The level is checked on every call, so `configure()` applies immediately.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[fieldwise:${scope}]`
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    }
  }
}
