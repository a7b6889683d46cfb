import { ConfigurationError } from './errors.js'
import { formatDuration, parseDuration, type Duration } from './duration.js'
import type {
  AnyValueType,
  ListType,
  ScalarType,
  TextCodec,
  TextValue,
  TextValueConstructor,
} from './types.js'

const PARSE_ERROR = 'parse error'
const RANGE_ERROR = 'value out of range'

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True'])
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False'])

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n
const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER)
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER)

// underscores only between digits, or right after a base prefix
const SEPARATED_PATTERN =
  /^(?:0[xX]_?[0-9a-fA-F]+(?:_[0-9a-fA-F]+)*|0[oObB]_?\d+(?:_\d+)*|\d+(?:_\d+)*)$/

function stripSeparators(digits: string): string {
  if (!digits.includes('_')) return digits
  if (!SEPARATED_PATTERN.test(digits)) {
    throw new Error(PARSE_ERROR)
  }
  return digits.replace(/_/g, '')
}

/**
 * Parse an integer literal with an optional base prefix (0x, 0o, 0b, or a
 * leading 0 for octal) and optional "_" digit separators. Unsigned literals
 * may not carry a sign.
 */
export function parseInteger(text: string, signed: boolean): bigint {
  let digits = text
  let negative = false
  if (signed && (digits.startsWith('-') || digits.startsWith('+'))) {
    negative = digits[0] === '-'
    digits = digits.slice(1)
  }
  digits = stripSeparators(digits)

  let value: bigint
  if (/^0[xX][0-9a-fA-F]+$/.test(digits) || /^0[oO][0-7]+$/.test(digits) || /^0[bB][01]+$/.test(digits)) {
    value = BigInt(digits)
  } else if (/^0[0-7]+$/.test(digits)) {
    value = BigInt(`0o${digits.slice(1)}`)
  } else if (/^(?:0|[1-9]\d*)$/.test(digits)) {
    value = BigInt(digits)
  } else {
    throw new Error(PARSE_ERROR)
  }

  return negative ? -value : value
}

function inRange(value: bigint, min: bigint, max: bigint): bigint {
  if (value < min || value > max) {
    throw new Error(RANGE_ERROR)
  }
  return value
}

function parseBool(text: string): boolean {
  if (TRUE_VALUES.has(text)) return true
  if (FALSE_VALUES.has(text)) return false
  throw new Error(PARSE_ERROR)
}

function parseFloat64(text: string): number {
  const special = SPECIAL_FLOAT_PATTERN.exec(text)
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN
    return special[1] === '-' ? -Infinity : Infinity
  }
  if (!FLOAT_PATTERN.test(text)) {
    throw new Error(PARSE_ERROR)
  }
  const value = Number(text)
  if (!Number.isFinite(value)) {
    throw new Error(RANGE_ERROR)
  }
  return value
}

function scalar<V>(
  name: string,
  parse: (text: string) => V,
  format: (value: V) => string = String,
  boolean = false
): ScalarType<V> {
  return { kind: 'scalar', name, boolean, parse, format }
}

function hasMethod(value: unknown, name: string): boolean {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, name) === 'function'
  )
}

/**
 * True if value can both render itself as text and load itself from text.
 */
export function isTextValue(value: unknown): value is TextValue {
  return hasMethod(value, 'marshalText') && hasMethod(value, 'unmarshalText')
}

function isTextCodec(source: unknown): source is TextCodec<unknown> {
  return hasMethod(source, 'parse') && hasMethod(source, 'format')
}

function isTextValueConstructor(
  source: unknown
): source is TextValueConstructor<TextValue> {
  return typeof source === 'function' && isTextValue(source.prototype)
}

function describeSource(source: unknown): string {
  if (typeof source === 'function' && source.name) return source.name
  return describeType(source)
}

function text<V>(codec: TextCodec<V>): ScalarType<V>
function text<V extends TextValue>(ctor: TextValueConstructor<V>): ScalarType<V>
function text(source: unknown): ScalarType<unknown> {
  // value form: the source converts text itself
  if (isTextCodec(source)) {
    const codec = source
    return scalar(
      describeSource(codec),
      (value) => codec.parse(value),
      (value) => codec.format(value)
    )
  }

  // pointer form: every value is a fresh instance that loads itself
  if (isTextValueConstructor(source)) {
    const Ctor = source
    return scalar<TextValue>(
      Ctor.name || 'text',
      (value) => {
        const instance = new Ctor()
        instance.unmarshalText(value)
        return instance
      },
      (value) => value.marshalText()
    )
  }

  if (hasMethod(source, 'parse') || hasMethod(source, 'format')) {
    throw new ConfigurationError(
      `text codec ${describeSource(source)} must implement both parse and format`
    )
  }
  throw new ConfigurationError(
    `text codec ${describeSource(source)} must implement both marshalText and unmarshalText`
  )
}

function list<E>(element: ScalarType<E>): ListType<E> {
  if (element.kind !== 'scalar') {
    throw new ConfigurationError(`unsupported list element type: ${element.name}`)
  }
  return { kind: 'list', name: `[]${element.name}`, element }
}

/**
 * Built-in coercion strategies.
 */
export const types = {
  bool: scalar<boolean>('bool', parseBool, String, true),
  string: scalar<string>('string', (value) => value, (value) => value),
  int: scalar<number>('int', (value) =>
    Number(inRange(parseInteger(value, true), SAFE_MIN, SAFE_MAX))
  ),
  int64: scalar<bigint>('int64', (value) =>
    inRange(parseInteger(value, true), INT64_MIN, INT64_MAX)
  ),
  uint: scalar<number>('uint', (value) =>
    Number(inRange(parseInteger(value, false), 0n, SAFE_MAX))
  ),
  uint64: scalar<bigint>('uint64', (value) =>
    inRange(parseInteger(value, false), 0n, UINT64_MAX)
  ),
  float64: scalar<number>('float64', parseFloat64),
  duration: scalar<Duration>('duration', parseDuration, formatDuration),
  text,
  list,
} as const

/**
 * Short runtime description of a value's type.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') {
    const name = Object.getPrototypeOf(value)?.constructor?.name
    return typeof name === 'string' && name !== '' ? name : 'object'
  }
  return typeof value
}

function inPlaceText(current: TextValue): ScalarType<TextValue> {
  return scalar<TextValue>(
    describeType(current),
    (value) => {
      current.unmarshalText(value)
      return current
    },
    (value) => value.marshalText()
  )
}

/**
 * Resolve the coercion strategy of a field: the declared type if any, or one
 * inferred from the field's current value.
 *
 * Text values are checked before primitive kinds so that a user type always
 * parses itself.
 */
export function resolveType(
  field: string,
  declared: AnyValueType | undefined,
  current: unknown
): AnyValueType {
  if (declared) return declared

  if (isTextValue(current)) return inPlaceText(current)

  switch (typeof current) {
    case 'boolean':
      return types.bool
    case 'string':
      return types.string
    case 'bigint':
      return types.int64
    case 'number':
      return types.float64
    default:
      throw new ConfigurationError(
        `unsupported field type: ${describeType(current)} (${field})`,
        field
      )
  }
}
