// Parser
export { Parser, parse } from './parser.js'

// Coercion
export { types, resolveType, parseInteger, isTextValue } from './coercion.js'
export { parseDuration, formatDuration, type Duration } from './duration.js'

// Bindings
export { splitAliases, bindFlags, readSchema } from './bindings.js'
export type { FieldBinding, BindingTable, FieldEntry } from './bindings.js'
export { FlagSet, looksLikeFlag, TERMINATOR, type Acceptor } from './flag-set.js'
export { scanArguments } from './scanner.js'
export { CountingAcceptor, OccurrenceTracker } from './counter.js'

// Errors
export {
  ConfigurationError,
  ParseError,
  UnknownFlagError,
  CoercionError,
  type ParseErrorCode,
  type CoercionSource,
} from './errors.js'

// Types
export type {
  ScalarType,
  ListType,
  ValueType,
  AnyValueType,
  TextMarshaler,
  TextUnmarshaler,
  TextValue,
  TextCodec,
  TextValueConstructor,
  FieldSpec,
  FieldSchema,
  ArgsReceiver,
  FlagsReceiver,
  FlagsCountReceiver,
  Validator,
  ParseResult,
  SafeParseResult,
} from './types.js'
