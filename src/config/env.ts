import path from 'path'
import type { Logger } from 'pino'
import { fieldRef, type FieldEntry } from '../flags/bindings.js'
import { resolveType } from '../flags/coercion.js'
import { CoercionError, ConfigurationError, errorMessage } from '../flags/errors.js'

// Prefix value that disables prefixing
export const NO_PREFIX = '-'

const DEFAULT_SEPARATOR = ','

export type EnvSource = Record<string, string | undefined>

/**
 * Derive the environment variable prefix from a program path.
 *
 * /usr/local/bin/my-tool.js -> MY_TOOL_
 */
export function prefixFromProgramName(program: string): string {
  const base = path.basename(program)
  // the extension runs from the last dot, so a dotfile name is all extension
  const dot = base.lastIndexOf('.')
  const name = dot === -1 ? base : base.slice(0, dot)
  return `${name.replace(/-/g, '_').toUpperCase()}_`
}

/**
 * Resolve the prefix in front of every environment variable name.
 *
 * An explicit override wins; otherwise the prefix comes from argv[0]. The
 * override "-" disables prefixing.
 */
export function resolveEnvPrefix(
  argv: readonly string[],
  override?: string
): string {
  let prefix = override ?? ''
  if (prefix === '' && argv.length > 0) {
    prefix = prefixFromProgramName(argv[0])
  }
  return prefix === NO_PREFIX ? '' : prefix
}

/**
 * Assign environment values to the fields that declare a variable.
 *
 * Unset and empty variables leave the field untouched. List fields are
 * split on their separator and replaced.
 */
export function applyEnv(
  target: object,
  entries: readonly FieldEntry[],
  env: EnvSource,
  prefix: string,
  logger: Logger
): void {
  for (const { field, spec } of entries) {
    if (spec.env === undefined) continue

    const variable = `${prefix}${spec.env}`
    const raw = env[variable]
    if (raw === undefined || raw === '') continue

    const ref = fieldRef(target, field)
    const type = resolveType(field, spec.type, ref.get())

    try {
      if (type.kind === 'list') {
        const separator = spec.envSeparator ?? DEFAULT_SEPARATOR
        ref.set(raw.split(separator).map((item) => type.element.parse(item)))
      } else {
        ref.set(type.parse(raw))
      }
    } catch (error) {
      if (error instanceof ConfigurationError) throw error
      throw new CoercionError(
        { kind: 'env', variable },
        field,
        raw,
        errorMessage(error)
      )
    }

    logger.debug({ variable, field }, 'environment value applied')
  }
}
