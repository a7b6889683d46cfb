import {
  LoggingConfigSchema,
  ParserOptionsSchema,
  type LoggingConfig,
  type ParserOptions,
} from './schema.js'

/**
 * Get the default parser options: environment variables off, prefix derived
 * from the program name, no logger.
 */
export function getDefaults(): ParserOptions {
  return ParserOptionsSchema.parse({})
}

/**
 * Get the default logging configuration.
 */
export function getLoggingDefaults(): LoggingConfig {
  return LoggingConfigSchema.parse({})
}
