/**
 * Duration strings: bare integers are seconds, otherwise a sequence of
 * `<number><unit>` segments such as `1h30m`, `90s` or `2d`.
 */

import { InvalidDurationError } from './errors.js'

const UNIT_MS = new Map<string, number>([
  ['ns', 1e-6],
  ['us', 1e-3],
  ['µs', 1e-3],
  ['ms', 1],
  ['s', 1_000],
  ['m', 60_000],
  ['h', 3_600_000],
  ['d', 86_400_000],
])

const SECONDS_ONLY = /^\d+$/

/** Longest accepted duration: 100 years of 365 days. */
export const MAX_DURATION_MS = 100 * 365 * 86_400_000

/**
 * Parse a duration string to milliseconds, truncated to whole seconds.
 *
 * @param value - Duration as supplied by the caller
 * @param field - Name of the input field, reported on failure
 * @throws {InvalidDurationError} if the value is malformed, not positive or
 *   longer than {@link MAX_DURATION_MS}
 */
export function parseDuration(value: string, field: string): number {
  const input = value.trim()

  let ms: number
  if (SECONDS_ONLY.test(input)) {
    ms = Number(input) * 1_000
  } else {
    ms = parseSegments(input, value, field)
  }

  const truncated = Math.floor(ms / 1_000) * 1_000
  if (!Number.isFinite(truncated) || truncated <= 0) {
    throw new InvalidDurationError(
      `${field} must be a positive duration of at least one second, got: ${value}`,
      field,
      value,
    )
  }
  if (truncated > MAX_DURATION_MS) {
    throw new InvalidDurationError(`${field} must not exceed 100 years, got: ${value}`, field, value)
  }
  return truncated
}

function parseSegments(input: string, value: string, field: string): number {
  if (input === '') {
    throw new InvalidDurationError(`unable to parse provided ${field} of: ${value}`, field, value)
  }

  const segment = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h|d)/y
  let total = 0
  let offset = 0
  while (offset < input.length) {
    segment.lastIndex = offset
    const match = segment.exec(input)
    const amount = match?.[1]
    const unitMs = UNIT_MS.get(match?.[2] ?? '')
    if (match === null || amount === undefined || unitMs === undefined) {
      throw new InvalidDurationError(`unable to parse provided ${field} of: ${value}`, field, value)
    }
    total += Number(amount) * unitMs
    offset += match[0].length
  }
  return total
}
