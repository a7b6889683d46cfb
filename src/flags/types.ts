/**
 * Strategy for reading a single textual value into a typed value.
 */
export interface ScalarType<V> {
  readonly kind: 'scalar'
  /** Type name used in diagnostics (e.g. "int64"). */
  readonly name: string
  /** Boolean flags are set by their bare presence and never take the next token. */
  readonly boolean: boolean
  parse(text: string): V
  format(value: V): string
}

/**
 * Strategy for a repeatable field: every occurrence appends one element.
 */
export interface ListType<E> {
  readonly kind: 'list'
  readonly name: string
  readonly element: ScalarType<E>
}

export type ValueType<V> =
  | ScalarType<V>
  | (V extends readonly (infer E)[] ? ListType<E> : never)

/**
 * A coercion strategy with its value type erased.
 */
export type AnyValueType = ScalarType<unknown> | ListType<unknown>

/**
 * Anything that can render itself as text.
 */
export interface TextMarshaler {
  marshalText(): string
}

/**
 * Anything that can load its state from text.
 */
export interface TextUnmarshaler {
  unmarshalText(text: string): void
}

export type TextValue = TextMarshaler & TextUnmarshaler

/**
 * Value-form text codec: converts text to and from V without owning state.
 */
export interface TextCodec<V> {
  parse(text: string): V
  format(value: V): string
}

/**
 * Pointer-form text codec: a class whose fresh instances load themselves from text.
 */
export type TextValueConstructor<V extends TextValue> = new () => V

/**
 * Declaration of one field of a target.
 */
export interface FieldSpec<V> {
  /** Comma-separated flag aliases; the first non-empty one is canonical. */
  flag?: string
  /** Environment variable name, appended to the parser's prefix. */
  env?: string
  /** Coercion strategy; inferred from the field's current value when omitted. */
  type?: ValueType<V>
  /** Separator for list values read from the environment. Defaults to ",". */
  envSeparator?: string
}

/**
 * Declarative binding table for a target of type T.
 */
export type FieldSchema<T> = {
  [K in keyof T]?: FieldSpec<T[K]>
}

/**
 * Receives the positional arguments, in command-line order.
 */
export interface ArgsReceiver {
  setArgs(args: string[]): void
}

/**
 * Receives the canonical names of the flags given on the command line.
 */
export interface FlagsReceiver {
  setFlags(flags: Set<string>): void
}

/**
 * Receives how many times each canonical flag was given, or undefined if none was.
 */
export interface FlagsCountReceiver {
  setFlagsCount(counts: Map<string, number> | undefined): void
}

/**
 * Checks the populated target. A returned or thrown error fails the parse.
 */
export interface Validator {
  validate(): Error | null | undefined | void
}

/**
 * Outcome of a successful parse.
 */
export interface ParseResult {
  /** Positional arguments in the order encountered. */
  args: string[]
  /** Canonical names of flags set on the command line. */
  flags: Set<string>
  /** Occurrences per canonical name; only tracked for targets with setFlagsCount. */
  counts?: Map<string, number>
}

export type SafeParseResult =
  | { success: true; data: ParseResult }
  | { success: false; error: Error }
