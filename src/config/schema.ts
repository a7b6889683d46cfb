import { z } from 'zod'
import type { Logger } from 'pino'

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('silent'),
  name: z.string().optional(),
})

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'debug') === 'function' &&
    typeof Reflect.get(value, 'child') === 'function'
  )
}

// Parser configuration
export const ParserOptionsSchema = z.object({
  envVars: z.boolean().default(false),
  envPrefix: z.string().optional(),
  env: z.record(z.string().optional()).optional(),
  logger: z.custom<Logger>(isLogger, { message: 'expected a pino logger' }).optional(),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
export type LoggingConfigInput = z.input<typeof LoggingConfigSchema>
export type ParserOptions = z.infer<typeof ParserOptionsSchema>
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>
