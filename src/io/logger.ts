import pino, { type Logger } from 'pino'
import {
  LoggingConfigSchema,
  type LoggingConfigInput,
} from '../config/schema.js'

export type { Logger }

/**
 * Create a logger from a logging configuration. The default level is
 * "silent" so a library caller sees nothing unless it asks for it.
 */
export function createLogger(
  config: LoggingConfigInput = {},
  destination?: pino.DestinationStream
): Logger {
  const { level, name } = LoggingConfigSchema.parse(config)
  // base carries the name; pid and hostname are left out
  const options = { level, base: name === undefined ? null : { name } }
  return destination ? pino(options, destination) : pino(options)
}

let silent: Logger | null = null

/**
 * Shared logger that discards everything.
 */
export function silentLogger(): Logger {
  if (!silent) {
    silent = pino({ level: 'silent' })
  }
  return silent
}
