import { type Logger, pino } from 'pino'
import { getConfig } from './config.js'

/**
 * Named logger for one module, at the configured level.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: getConfig().logLevel })
}
