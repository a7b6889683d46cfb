/**
 * Error thrown for mistakes in how a target or its schema is declared.
 *
 * These are programming errors: they are raised before any argument is read
 * and callers are expected to fix the declaration, not to recover.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error codes for parse errors.
 */
export type ParseErrorCode =
  | 'unknown_flag'
  | 'invalid_value'
  | 'missing_argument'
  | 'bad_syntax'

/**
 * Recoverable error caused by the arguments or environment being parsed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCode
  ) {
    super(message)
    this.name = 'ParseError'
  }
}

/**
 * A flag-like token matched no declared flag.
 */
export class UnknownFlagError extends ParseError {
  /** True when the unknown flag is -h or -help. */
  public readonly help: boolean

  constructor(public readonly flag: string) {
    super(`flag provided but not defined: -${flag}`, 'unknown_flag')
    this.name = 'UnknownFlagError'
    this.help = flag === 'h' || flag === 'help'
  }
}

/**
 * Where a rejected value came from.
 */
export type CoercionSource =
  | { kind: 'flag'; flag: string; boolean: boolean }
  | { kind: 'env'; variable: string }

/**
 * A textual value could not be converted to its field's type.
 */
export class CoercionError extends ParseError {
  public readonly flag?: string
  public readonly variable?: string

  constructor(
    source: CoercionSource,
    public readonly field: string,
    public readonly value: string,
    public readonly reason: string
  ) {
    super(describe(source, field, value, reason), 'invalid_value')
    this.name = 'CoercionError'
    if (source.kind === 'flag') {
      this.flag = source.flag
    } else {
      this.variable = source.variable
    }
  }
}

function describe(
  source: CoercionSource,
  field: string,
  value: string,
  reason: string
): string {
  const literal = JSON.stringify(value)
  if (source.kind === 'env') {
    return `env: invalid value ${literal} for variable ${source.variable} (field ${field}): ${reason}`
  }
  if (source.boolean) {
    return `invalid boolean value ${literal} for -${source.flag}: ${reason}`
  }
  return `invalid value ${literal} for flag -${source.flag}: ${reason}`
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
