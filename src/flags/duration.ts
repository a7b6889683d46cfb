/**
 * Elapsed time in milliseconds. Fractions express sub-millisecond units.
 */
export type Duration = number

const UNITS = new Map<string, number>([
  ['ns', 1e-6],
  ['us', 1e-3],
  ['µs', 1e-3], // U+00B5 micro sign
  ['μs', 1e-3], // U+03BC greek mu
  ['ms', 1],
  ['s', 1000],
  ['m', 60_000],
  ['h', 3_600_000],
])

const HOUR = 3_600_000
const MINUTE = 60_000

/**
 * Parse a duration such as "300ms", "-1.5h" or "2h45m".
 *
 * Every number needs a unit; only a lone "0" may omit it.
 */
export function parseDuration(text: string): Duration {
  let rest = text
  let negative = false

  if (rest.startsWith('-') || rest.startsWith('+')) {
    negative = rest[0] === '-'
    rest = rest.slice(1)
  }
  if (rest === '0') return 0
  if (rest === '') {
    throw new Error(`time: invalid duration ${JSON.stringify(text)}`)
  }

  let total = 0
  while (rest !== '') {
    const number = /^(\d*)(?:\.(\d*))?/.exec(rest)
    const whole = number?.[1] ?? ''
    const fraction = number?.[2] ?? ''
    if (!number || (whole === '' && fraction === '')) {
      throw new Error(`time: invalid duration ${JSON.stringify(text)}`)
    }
    rest = rest.slice(number[0].length)

    const unit = /^[^\d.]*/.exec(rest)?.[0] ?? ''
    if (unit === '') {
      throw new Error(`time: missing unit in duration ${JSON.stringify(text)}`)
    }
    const scale = UNITS.get(unit)
    if (scale === undefined) {
      throw new Error(
        `time: unknown unit ${JSON.stringify(unit)} in duration ${JSON.stringify(text)}`
      )
    }
    rest = rest.slice(unit.length)

    total += Number(`${whole || '0'}.${fraction || '0'}`) * scale
  }

  if (!Number.isFinite(total)) {
    throw new Error(`time: invalid duration ${JSON.stringify(text)}`)
  }
  return negative ? -total : total
}

/**
 * Render a duration as "1h2m3.5s", "1.5ms", "250µs" or "0s".
 */
export function formatDuration(duration: Duration): string {
  if (duration === 0) return '0s'

  const sign = duration < 0 ? '-' : ''
  let rest = Math.abs(duration)

  if (rest < 1) {
    const micros = rest * 1000
    return micros < 1
      ? `${sign}${trim(rest * 1e6)}ns`
      : `${sign}${trim(micros)}µs`
  }
  if (rest < 1000) return `${sign}${trim(rest)}ms`

  const hours = Math.floor(rest / HOUR)
  rest -= hours * HOUR
  const minutes = Math.floor(rest / MINUTE)
  rest -= minutes * MINUTE

  let out = sign
  if (hours > 0) out += `${hours}h`
  if (hours > 0 || minutes > 0) out += `${minutes}m`
  return `${out}${trim(rest / 1000)}s`
}

function trim(value: number): string {
  return String(Number(value.toFixed(9)))
}
