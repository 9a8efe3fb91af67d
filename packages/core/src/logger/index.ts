import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

/**
 * Root logger for the process. Pretty output is used whenever asked for,
 * and always outside production.
 */
export function createLogger(config: LoggingConfig, name = 'cliparchive'): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name,
    level: config.level,
    ...(usePretty ? { transport: { target: 'pino-pretty' } } : {}),
  })
}
