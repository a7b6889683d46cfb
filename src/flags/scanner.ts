import { FlagSet, TERMINATOR, looksLikeFlag } from './flag-set.js'

/**
 * Apply every flag in args to the flag set and return the positional
 * arguments in the order they appear. Flags and positionals may be
 * interleaved; everything after the terminator "--" is positional.
 */
export function scanArguments(flags: FlagSet, args: readonly string[]): string[] {
  const positionals: string[] = []
  let rest = args

  while (rest.length > 0) {
    rest = rest.slice(flags.parseRun(rest))

    let resumeAt = rest.length
    for (let i = 0; i < rest.length; i++) {
      const token = rest[i]
      if (token === TERMINATOR) {
        positionals.push(...rest.slice(i + 1))
        return positionals
      }
      if (looksLikeFlag(token)) {
        resumeAt = i
        break
      }
      positionals.push(token)
    }
    rest = rest.slice(resumeAt)
  }

  return positionals
}
