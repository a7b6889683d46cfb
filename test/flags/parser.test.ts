import { describe, it, expect } from 'vitest'
import { Parser, parse } from '../../src/flags/parser.js'
import { types } from '../../src/flags/coercion.js'
import {
  CoercionError,
  ConfigurationError,
  UnknownFlagError,
} from '../../src/flags/errors.js'
import type { FieldSchema } from '../../src/flags/types.js'

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected an error')
}

class F {
  s = ''
  i = 0
  b = false
  h = false
  t = 0
  n = 0
  args?: string[]
  flags?: Set<string>

  setArgs(args: string[]): void {
    this.args = args
  }

  setFlags(flags: Set<string>): void {
    this.flags = flags
  }
}

const fSchema: FieldSchema<F> = {
  s: { flag: 's,string,long-string' },
  i: { flag: 'i,int', type: types.int },
  b: { flag: 'b' },
  h: { flag: 'h,help' },
  t: { flag: 't', type: types.duration },
}

const parseF = (...args: string[]): F => {
  const f = new F()
  new Parser().parse(['prog', ...args], f, fSchema)
  return f
}

describe('Parser', () => {
  describe('flags', () => {
    it('reports no args and no flags for a bare program name', () => {
      const f = parseF()
      expect(f.args).toEqual([])
      expect(f.flags).toEqual(new Set())
    })

    it('collects a positional argument', () => {
      expect(parseF('toto').args).toEqual(['toto'])
    })

    it('binds a declared help flag', () => {
      const f = parseF('-h')
      expect(f.h).toBe(true)
      expect(f.flags).toEqual(new Set(['h']))
    })

    it('keeps the last value of a repeated scalar flag', () => {
      const f = parseF('-i', '10', '--int', '20')
      expect(f.i).toBe(20)
      expect(f.flags).toEqual(new Set(['i']))
    })

    it('canonicalizes aliases in the flag set', () => {
      const f = parseF('-s', 'a', '--string', 'b', '-b')
      expect(f.s).toBe('b')
      expect(f.b).toBe(true)
      expect(f.flags).toEqual(new Set(['s', 'b']))
    })

    it('reports every alias of a field under the first one', () => {
      const f = parseF('-s', 'a', '--string', 'b', '-long-string', 'c')
      expect(f.s).toBe('c')
      expect(f.flags).toEqual(new Set(['s']))
    })

    it('accepts repeated boolean flags', () => {
      const f = parseF('-b', '--b', '-b')
      expect(f.b).toBe(true)
      expect(f.flags).toEqual(new Set(['b']))
    })

    it('parses flags before positionals', () => {
      const f = parseF('-b', '-int', '1', '-string', 'a', 'arg1', 'arg2')
      expect(f).toMatchObject({ b: true, i: 1, s: 'a', args: ['arg1', 'arg2'] })
      expect(f.flags).toEqual(new Set(['b', 'i', 's']))
    })

    it('parses durations', () => {
      expect(parseF('-t', '3s').t).toBe(3000)
    })

    it('rejects invalid durations', () => {
      expect(() => parseF('-t', 'nope')).toThrow(
        'invalid value "nope" for flag -t: time: invalid duration "nope"'
      )
    })

    it('parses flags interleaved with positionals', () => {
      const f = parseF('arg1', '-i', '1', 'arg2', '-b')
      expect(f).toMatchObject({ i: 1, b: true, args: ['arg1', 'arg2'] })
      expect(f.flags).toEqual(new Set(['i', 'b']))
    })

    it('treats arguments after the terminator as positionals', () => {
      const f = parseF('arg1', '--', '-i', '2')
      expect(f.args).toEqual(['arg1', '-i', '2'])
      expect(f.i).toBe(0)
      expect(f.flags).toEqual(new Set())
    })

    it('rejects fields without flag', () => {
      expect(() => parseF('-n', '1')).toThrow('flag provided but not defined: -n')
    })

    it('rejects undeclared flags without touching the target', () => {
      const f = new F()
      expect(() => new Parser().parse(['prog', '-z'], f, fSchema)).toThrow(
        'flag provided but not defined: -z'
      )
      expect(f.args).toBeUndefined()
      expect(f.flags).toBeUndefined()
    })

    it('rejects undeclared flags between positionals', () => {
      expect(() => parseF('arg1', '-z', 'arg2')).toThrow('not defined: -z')
    })

    it('returns the parse result', () => {
      const result = new Parser().parse(['prog', 'a', '-string', 'x', 'b'], new F(), fSchema)
      expect(result).toEqual({ args: ['a', 'b'], flags: new Set(['s']), counts: undefined })
    })

    it('does nothing for an empty argument vector', () => {
      const f = new F()
      const result = new Parser().parse([], f, fSchema)
      expect(result).toEqual({ args: [], flags: new Set() })
      expect(f.args).toBeUndefined()
      expect(f.flags).toBeUndefined()
    })
  })

  describe('help flags', () => {
    class NoHelp {
      x = false
    }

    it('reports an undeclared -h as unknown', () => {
      const error = thrown(() => parse(['prog', '-h'], new NoHelp(), { x: { flag: 'x' } }))
      expect(error).toBeInstanceOf(UnknownFlagError)
      expect(error).toMatchObject({ message: 'flag provided but not defined: -h', help: true })
    })

    it('reports an undeclared --help under its own name', () => {
      expect(() => parse(['prog', '--help'], new NoHelp(), { x: { flag: 'x' } })).toThrow(
        'flag provided but not defined: -help'
      )
    })
  })

  describe('repeatable flags', () => {
    class L {
      ints: number[] = []
      counts?: Map<string, number>
      countCalls = 0

      setFlagsCount(counts: Map<string, number> | undefined): void {
        this.counts = counts
        this.countCalls++
      }
    }

    const lSchema: FieldSchema<L> = {
      ints: { flag: 'i,int', type: types.list(types.int) },
    }

    it('appends every occurrence and counts it', () => {
      const l = new L()
      parse(['prog', '-i', '1', '-i', '2', '-i', '3'], l, lSchema)
      expect(l.ints).toEqual([1, 2, 3])
      expect(l.counts).toEqual(new Map([['i', 3]]))
    })

    it('counts every alias under the canonical name', () => {
      const l = new L()
      const result = parse(['prog', '--int', '1', 'x', '-i', '2'], l, lSchema)
      expect(l.ints).toEqual([1, 2])
      expect(l.counts).toEqual(new Map([['i', 2]]))
      expect(result.counts).toEqual(new Map([['i', 2]]))
    })

    it('reports undefined counts when no flag was set', () => {
      const l = new L()
      parse(['prog', 'x'], l, lSchema)
      expect(l.countCalls).toBe(1)
      expect(l.counts).toBeUndefined()
    })

    it('does not count for targets without setFlagsCount', () => {
      const target: { ints: number[] } = { ints: [] }
      const result = parse(['prog', '-i', '1'], target, { ints: { flag: 'i', type: types.list(types.int) } })
      expect(target.ints).toEqual([1])
      expect(result.counts).toBeUndefined()
    })
  })

  describe('coercion errors', () => {
    it('rejects a negative unsigned value', () => {
      const target = { port: 0 }
      const error = thrown(() => parse(['prog', '-port', '-1'], target, { port: { flag: 'port', type: types.uint } }))
      expect(error).toBeInstanceOf(CoercionError)
      expect(error).toMatchObject({
        message: 'invalid value "-1" for flag -port: parse error',
        flag: 'port',
        value: '-1',
      })
      expect(target.port).toBe(0)
    })

    it('accepts digit separators in integers', () => {
      const target = { n: 0 }
      parse(['prog', '-n', '1_000'], target, { n: { flag: 'n', type: types.int } })
      expect(target.n).toBe(1000)
    })

    it('rejects a malformed integer', () => {
      expect(() => parse(['prog', '-n', 'ten'], { n: 0 }, { n: { flag: 'n', type: types.int } })).toThrow(
        'invalid value "ten" for flag -n: parse error'
      )
    })

    it('reports a missing value', () => {
      expect(() => parse(['prog', '-s'], { s: '' }, { s: { flag: 's' } })).toThrow(
        'flag needs an argument: -s'
      )
    })
  })

  describe('configuration errors', () => {
    it('rejects a duplicate alias before reading arguments', () => {
      const target = { a: '', b: '', c: '' }
      const schema: FieldSchema<typeof target> = {
        a: { flag: 'a' },
        b: { flag: 'x' },
        c: { flag: 'x' },
      }
      expect(() => parse(['prog', '-a', 'v'], target, schema)).toThrow(ConfigurationError)
      expect(() => parse(['prog', '-a', 'v'], target, schema)).toThrow('flag redefined: x (b, c)')
      expect(target.a).toBe('')
    })

    it('rejects dashed aliases instead of reporting an unknown flag', () => {
      const target = { verbose: false }
      const parser = new Parser()
      expect(() =>
        parser.safeParse(['prog', '--verbose'], target, { verbose: { flag: '-v,--verbose' } })
      ).toThrow('flag "-v" begins with -')
      expect(target.verbose).toBe(false)
    })

    it('rejects targets that are not objects', () => {
      const parser = new Parser()
      expect(() => Reflect.apply(parser.parse, parser, [['prog'], 42, {}])).toThrow(
        'target must be an object, got number'
      )
    })

    it('rejects fields of unsupported type', () => {
      const target: { c?: boolean } = {}
      expect(() => parse(['prog', '-c'], target, { c: { flag: 'c' } })).toThrow(
        'unsupported field type: undefined (c)'
      )
    })

    it('leaves fields without schema untouched', () => {
      const target = { v: 4 }
      const result = parse(['prog', 'x'], target, {})
      expect(target.v).toBe(4)
      expect(result.args).toEqual(['x'])
    })
  })

  describe('text values', () => {
    class Level {
      value = 'info'

      marshalText(): string {
        return this.value
      }

      unmarshalText(text: string): void {
        if (!['debug', 'info', 'error'].includes(text)) {
          throw new Error(`unknown level ${text}`)
        }
        this.value = text
      }
    }

    it('unmarshals into the current value', () => {
      const target = { level: new Level() }
      const current = target.level
      parse(['prog', '-level', 'debug'], target, { level: { flag: 'level' } })
      expect(target.level).toBe(current)
      expect(target.level.value).toBe('debug')
    })

    it('reports the unmarshal error', () => {
      const target = { level: new Level() }
      expect(() => parse(['prog', '-level', 'loud'], target, { level: { flag: 'level' } })).toThrow(
        'invalid value "loud" for flag -level: unknown level loud'
      )
    })
  })

  describe('validation', () => {
    class E {
      addr = ''
      db = ''
      failure = new Error('address must be set')

      validate(): Error | undefined {
        return this.addr === '' ? this.failure : undefined
      }
    }

    const eSchema: FieldSchema<E> = {
      addr: { flag: 'addr' },
      db: { flag: 'db' },
    }

    it('throws the error returned by validate', () => {
      const e = new E()
      expect(thrown(() => parse(['prog'], e, eSchema))).toBe(e.failure)
    })

    it('passes when validate returns nothing', () => {
      const e = new E()
      parse(['prog', '-addr', ':2345'], e, eSchema)
      expect(e.addr).toBe(':2345')
    })

    it('propagates errors thrown by validate', () => {
      const target = {
        validate(): void {
          throw new RangeError('bad range')
        },
      }
      expect(() => parse(['prog'], target, {})).toThrow(RangeError)
    })

    it('validates after an empty argument vector', () => {
      const e = new E()
      expect(thrown(() => parse([], e, eSchema))).toBe(e.failure)
    })

    it('skips validation after a parse error', () => {
      let validated = false
      const target = {
        validate(): void {
          validated = true
        },
      }
      expect(() => parse(['prog', '-z'], target, {})).toThrow(UnknownFlagError)
      expect(validated).toBe(false)
    })
  })

  describe('safeParse', () => {
    it('returns the result on success', () => {
      const result = new Parser().safeParse(['prog', '-b', 'a'], new F(), fSchema)
      expect(result).toEqual({
        success: true,
        data: { args: ['a'], flags: new Set(['b']), counts: undefined },
      })
    })

    it('returns parse errors', () => {
      const result = new Parser().safeParse(['prog', '-z'], new F(), fSchema)
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error).toBeInstanceOf(UnknownFlagError)
      }
    })

    it('returns validation errors as they are', () => {
      const failure = new Error('db must be set')
      const target = { validate: () => failure }
      const result = new Parser().safeParse(['prog'], target, {})
      expect(result).toEqual({ success: false, error: failure })
      if (!result.success) {
        expect(result.error).toBe(failure)
      }
    })

    it('throws configuration errors', () => {
      const target = { a: '', b: '' }
      expect(() =>
        new Parser().safeParse(['prog'], target, { a: { flag: 'x' }, b: { flag: 'x' } })
      ).toThrow(ConfigurationError)
    })
  })
})
