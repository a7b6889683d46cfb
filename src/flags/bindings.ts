import { z } from 'zod'
import type { Logger } from 'pino'
import { ConfigurationError } from './errors.js'
import { describeType, resolveType } from './coercion.js'
import { FlagSet, type Acceptor } from './flag-set.js'
import type { AnyValueType, FieldSchema } from './types.js'

function isValueType(value: unknown): value is AnyValueType {
  if (typeof value !== 'object' || value === null) return false
  const kind = Reflect.get(value, 'kind')
  if (kind === 'list') return isValueType(Reflect.get(value, 'element'))
  return (
    kind === 'scalar' &&
    typeof Reflect.get(value, 'parse') === 'function' &&
    typeof Reflect.get(value, 'format') === 'function'
  )
}

const FieldSpecSchema = z
  .object({
    flag: z.string().optional(),
    env: z.string().min(1).optional(),
    type: z
      .custom<AnyValueType>(isValueType, { message: 'expected a value type' })
      .optional(),
    envSeparator: z.string().min(1).optional(),
  })
  .strict()

export type ResolvedFieldSpec = z.infer<typeof FieldSpecSchema>

/**
 * A schema entry after validation.
 */
export interface FieldEntry {
  field: string
  spec: ResolvedFieldSpec
}

/**
 * Read and validate the entries of a field schema, in declaration order.
 */
export function readSchema<T>(schema: FieldSchema<T>): FieldEntry[] {
  const entries: FieldEntry[] = []

  for (const [field, value] of Object.entries(schema)) {
    if (value === undefined) continue

    const result = FieldSpecSchema.safeParse(value)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')
      throw new ConfigurationError(`invalid schema for field ${field}: ${issues}`, field)
    }
    entries.push({ field, spec: result.data })
  }

  return entries
}

/**
 * Throw unless target is an object whose fields can be bound.
 */
export function assertTarget(target: unknown): asserts target is object {
  if (typeof target !== 'object' || target === null || Array.isArray(target)) {
    throw new ConfigurationError(`target must be an object, got ${describeType(target)}`)
  }
}

/**
 * Accessor for one field of a target.
 */
export interface FieldRef {
  readonly name: string
  get(): unknown
  set(value: unknown): void
}

export function fieldRef(target: object, name: string): FieldRef {
  return {
    name,
    get: () => Reflect.get(target, name),
    set: (value) => {
      if (!Reflect.set(target, name, value)) {
        throw new ConfigurationError(`field ${name} is not writable`, name)
      }
    },
  }
}

/**
 * Split a comma-separated alias list, trimming each alias and dropping empty ones.
 */
export function splitAliases(flag: string): string[] {
  return flag
    .split(',')
    .map((alias) => alias.trim())
    .filter((alias) => alias !== '')
}

export interface FieldBinding {
  field: string
  /** Declared aliases; the first is canonical. */
  aliases: string[]
  canonical: string
  type: AnyValueType
  ref: FieldRef
}

/**
 * Bindings of one target together with the flag table they were registered in.
 */
export interface BindingTable {
  bindings: FieldBinding[]
  /** Every alias mapped to its field's canonical name. */
  canonical: Map<string, string>
  flags: FlagSet
}

/**
 * Build an acceptor that coerces text with the binding's type and stores it
 * in the field. List fields get a new array with the element appended.
 */
export function createAcceptor(binding: FieldBinding, logger: Logger): Acceptor {
  const { type, ref, canonical } = binding

  if (type.kind === 'list') {
    const element = type.element
    return {
      field: binding.field,
      boolean: element.boolean,
      set(text) {
        const value = element.parse(text)
        const current = ref.get()
        ref.set(Array.isArray(current) ? [...current, value] : [value])
        logger.debug({ flag: canonical, field: ref.name, value: element.format(value) }, 'flag value appended')
      },
    }
  }

  return {
    field: binding.field,
    boolean: type.boolean,
    set(text) {
      const value = type.parse(text)
      ref.set(value)
      logger.debug({ flag: canonical, field: ref.name, value: type.format(value) }, 'flag value set')
    },
  }
}

/**
 * Build the flag bindings of target and register their acceptors.
 *
 * Aliases must be unique across all fields; a repeated alias throws before
 * any argument is read.
 */
export function bindFlags(
  target: object,
  entries: readonly FieldEntry[],
  logger: Logger
): BindingTable {
  const flags = new FlagSet()
  const canonical = new Map<string, string>()
  const bindings: FieldBinding[] = []

  for (const { field, spec } of entries) {
    if (spec.flag === undefined) continue

    const aliases = splitAliases(spec.flag)
    if (aliases.length === 0) continue

    const ref = fieldRef(target, field)
    const binding: FieldBinding = {
      field,
      aliases,
      canonical: aliases[0],
      type: resolveType(field, spec.type, ref.get()),
      ref,
    }

    const acceptor = createAcceptor(binding, logger)
    for (const alias of aliases) {
      flags.define(alias, acceptor)
      canonical.set(alias, binding.canonical)
    }
    bindings.push(binding)
  }

  return { bindings, canonical, flags }
}
