import { ConfigurationError } from '../flags/errors.js'
import {
  ParserOptionsSchema,
  type ParserOptions,
  type ParserOptionsInput,
} from './schema.js'

/**
 * Validate parser options and fill in defaults.
 */
export function resolveOptions(input: ParserOptionsInput = {}): ParserOptions {
  const result = ParserOptionsSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`invalid parser options: ${issues}`)
  }
  return result.data
}
