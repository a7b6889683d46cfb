import type { Logger } from 'pino'
import { applyEnv, resolveEnvPrefix, type EnvSource } from '../config/env.js'
import { resolveOptions } from '../config/options.js'
import type { ParserOptionsInput } from '../config/schema.js'
import { silentLogger } from '../io/logger.js'
import { assertTarget, bindFlags, readSchema } from './bindings.js'
import { OccurrenceTracker } from './counter.js'
import { ConfigurationError } from './errors.js'
import { scanArguments } from './scanner.js'
import type {
  ArgsReceiver,
  FieldSchema,
  FlagsCountReceiver,
  FlagsReceiver,
  ParseResult,
  SafeParseResult,
  Validator,
} from './types.js'

function hasMethod(target: object, name: string): boolean {
  return typeof Reflect.get(target, name) === 'function'
}

function acceptsArgs(target: object): target is ArgsReceiver {
  return hasMethod(target, 'setArgs')
}

function acceptsFlags(target: object): target is FlagsReceiver {
  return hasMethod(target, 'setFlags')
}

function acceptsFlagsCount(target: object): target is FlagsCountReceiver {
  return hasMethod(target, 'setFlagsCount')
}

function isValidator(target: object): target is Validator {
  return hasMethod(target, 'validate')
}

/**
 * Command-line flags parser driven by a field schema.
 *
 * It returns or throws any error it encounters and never prints anything.
 * Optionally, flag values are first read from environment variables, with the
 * command-line flags overriding them.
 *
 * Flags and positional arguments may be interleaved; flag parsing stops at
 * "--" and every later argument is positional.
 *
 * After parsing, the target's optional hooks are called when present:
 * setArgs with the positional arguments, setFlags with the canonical names of
 * the flags set on the command line, setFlagsCount with how many times each
 * was given, and finally validate. Environment values never show up in
 * setFlags or setFlagsCount.
 */
export class Parser {
  private readonly envVars: boolean
  private readonly envPrefix?: string
  private readonly env?: EnvSource
  private readonly logger: Logger

  constructor(options: ParserOptionsInput = {}) {
    const resolved = resolveOptions(options)
    this.envVars = resolved.envVars
    this.envPrefix = resolved.envPrefix
    this.env = resolved.env
    this.logger = resolved.logger ?? silentLogger()
  }

  /**
   * Parse argv into target. argv[0] is the program name or path, as in
   * process.argv.slice(1).
   *
   * Throws ConfigurationError if target or schema is malformed, and the first
   * parse or validation error otherwise.
   */
  parse<T extends object>(
    argv: readonly string[],
    target: T,
    schema: FieldSchema<T>
  ): ParseResult {
    assertTarget(target)
    const entries = readSchema(schema)
    const logger = this.logger.child({ program: argv[0] ?? '' })

    if (this.envVars) {
      const prefix = resolveEnvPrefix(argv, this.envPrefix)
      applyEnv(target, entries, this.env ?? process.env, prefix, logger)
    }

    const result: ParseResult = { args: [], flags: new Set() }
    if (argv.length > 0) {
      const { canonical, flags } = bindFlags(target, entries, logger)

      let tracker: OccurrenceTracker | undefined
      if (acceptsFlagsCount(target)) {
        const counting = new OccurrenceTracker(canonical)
        flags.wrapAll((name, acceptor) => counting.wrap(name, acceptor))
        tracker = counting
      }

      result.args = scanArguments(flags, argv.slice(1))
      for (const name of flags.setNames()) {
        result.flags.add(canonical.get(name) ?? name)
      }
      result.counts = tracker?.report()
      logger.debug(
        { positionals: result.args.length, flags: result.flags.size },
        'arguments parsed'
      )

      if (acceptsArgs(target)) target.setArgs([...result.args])
      if (acceptsFlags(target)) target.setFlags(new Set(result.flags))
      if (acceptsFlagsCount(target)) {
        target.setFlagsCount(result.counts && new Map(result.counts))
      }
    }

    if (isValidator(target)) {
      const error = target.validate()
      if (error) throw error
    }
    return result
  }

  /**
   * Like parse, but parse and validation errors are returned instead of
   * thrown. ConfigurationError is still thrown.
   */
  safeParse<T extends object>(
    argv: readonly string[],
    target: T,
    schema: FieldSchema<T>
  ): SafeParseResult {
    try {
      return { success: true, data: this.parse(argv, target, schema) }
    } catch (error) {
      if (error instanceof ConfigurationError || !(error instanceof Error)) {
        throw error
      }
      return { success: false, error }
    }
  }
}

/**
 * Parse argv into target with a parser built from options.
 */
export function parse<T extends object>(
  argv: readonly string[],
  target: T,
  schema: FieldSchema<T>,
  options?: ParserOptionsInput
): ParseResult {
  return new Parser(options).parse(argv, target, schema)
}
