import {
  CoercionError,
  ConfigurationError,
  ParseError,
  UnknownFlagError,
  errorMessage,
} from './errors.js'

/**
 * Receives the textual value of a flag each time it is set.
 */
export interface Acceptor {
  /** Field the acceptor writes to, for diagnostics. */
  readonly field: string
  /** Boolean acceptors are satisfied by the flag's bare presence. */
  readonly boolean: boolean
  set(text: string): void
}

export const TERMINATOR = '--'

/**
 * True if token has flag syntax: one or two dashes followed by at least one
 * character. Tokens with three or more leading dashes are not flags.
 */
export function looksLikeFlag(token: string): boolean {
  return (
    ((token.startsWith('-') && token.length > 1) ||
      (token.startsWith('--') && token.length > 2)) &&
    !token.startsWith('---')
  )
}

/**
 * Table of named flags and the parser for a contiguous run of them.
 */
export class FlagSet {
  private readonly flags = new Map<string, Acceptor>()
  private readonly actual = new Set<string>()

  /**
   * Register an acceptor under a flag name. Names may not begin with "-" or
   * contain "=", since no token could ever reach them.
   */
  define(name: string, acceptor: Acceptor): void {
    if (name.startsWith('-')) {
      throw new ConfigurationError(`flag ${JSON.stringify(name)} begins with -`, acceptor.field)
    }
    if (name.includes('=')) {
      throw new ConfigurationError(`flag ${JSON.stringify(name)} contains =`, acceptor.field)
    }

    const existing = this.flags.get(name)
    if (existing) {
      throw new ConfigurationError(
        `flag redefined: ${name} (${existing.field}, ${acceptor.field})`,
        acceptor.field
      )
    }
    this.flags.set(name, acceptor)
  }

  lookup(name: string): Acceptor | undefined {
    return this.flags.get(name)
  }

  has(name: string): boolean {
    return this.flags.has(name)
  }

  /**
   * Replace every registered acceptor with wrap's result.
   */
  wrapAll(wrap: (name: string, acceptor: Acceptor) => Acceptor): void {
    for (const [name, acceptor] of this.flags) {
      this.flags.set(name, wrap(name, acceptor))
    }
  }

  /**
   * Names of the flags set so far, in the order they were first set.
   */
  setNames(): string[] {
    return Array.from(this.actual)
  }

  /**
   * Parse flags from the start of args until a token that is not a flag or
   * is the terminator. Returns the index of the first unconsumed token.
   */
  parseRun(args: readonly string[]): number {
    let index = 0
    while (index < args.length) {
      const token = args[index]
      if (token === TERMINATOR || !looksLikeFlag(token)) {
        return index
      }
      index = this.parseOne(args, index)
    }
    return index
  }

  private parseOne(args: readonly string[], index: number): number {
    const token = args[index]
    const body = token.slice(token.startsWith('--') ? 2 : 1)
    if (body.startsWith('=')) {
      throw new ParseError(`bad flag syntax: ${token}`, 'bad_syntax')
    }

    const eq = body.indexOf('=')
    const name = eq === -1 ? body : body.slice(0, eq)
    let value = eq === -1 ? undefined : body.slice(eq + 1)

    const acceptor = this.flags.get(name)
    if (!acceptor) {
      throw new UnknownFlagError(name)
    }

    let next = index + 1
    if (acceptor.boolean) {
      value ??= 'true'
    } else if (value === undefined) {
      if (next >= args.length) {
        throw new ParseError(`flag needs an argument: -${name}`, 'missing_argument')
      }
      value = args[next]
      next++
    }

    try {
      acceptor.set(value)
    } catch (error) {
      if (error instanceof ConfigurationError) throw error
      throw new CoercionError(
        { kind: 'flag', flag: name, boolean: acceptor.boolean },
        acceptor.field,
        value,
        errorMessage(error)
      )
    }

    this.actual.add(name)
    return next
  }
}
