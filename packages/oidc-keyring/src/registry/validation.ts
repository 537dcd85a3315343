/**
 * Input validation for named key creation.
 */

import { InvalidDurationError, InvalidInputError, UnsupportedAlgorithmError } from '../errors.js'
import { MAX_RING_CAPACITY } from '../keys/ring.js'
import { SIGNING_ALGORITHMS, type SigningAlgorithm } from '../types.js'

const NAME_PATTERN = /^\w(?:[\w.-]*\w)?$/

/**
 * Check a named key name.
 * @throws {InvalidInputError} if the name is empty or has characters other
 *   than letters, digits, `_`, `-` and `.` (the latter two not at either end)
 */
export function validateName(name: string): string {
  if (name.trim() === '') {
    throw new InvalidInputError('name must not be empty', 'name')
  }
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidInputError(`name ${JSON.stringify(name)} contains invalid characters`, 'name')
  }
  return name
}

/**
 * Resolve an algorithm name to a member of the supported set.
 * @throws {UnsupportedAlgorithmError} for any other value
 */
export function parseAlgorithm(input: string): SigningAlgorithm {
  const algorithm = SIGNING_ALGORITHMS.find((candidate) => candidate === input)
  if (algorithm === undefined) {
    throw new UnsupportedAlgorithmError(
      `unknown signing algorithm ${JSON.stringify(input)}; supported: ${SIGNING_ALGORITHMS.join(', ')}`,
      input,
    )
  }
  return algorithm
}

/**
 * Smallest ring capacity that keeps every key retired within the last
 * verification TTL: `(capacity - 1) * rotationPeriod >= verificationTtl`.
 */
export function requiredCapacity(
  minimum: number,
  rotationPeriodMs: number,
  verificationTtlMs: number,
): number {
  return Math.max(minimum, Math.ceil(verificationTtlMs / rotationPeriodMs) + 1)
}

/**
 * {@link requiredCapacity}, refusing timings that keep more than
 * {@link MAX_RING_CAPACITY} keys verifiable at once.
 * @throws {InvalidDurationError} on `verificationTtl` when the ring would be too large
 */
export function boundedCapacity(
  minimum: number,
  rotationPeriodMs: number,
  verificationTtlMs: number,
  verificationTtl: string,
): number {
  const periods = Math.ceil(verificationTtlMs / rotationPeriodMs)
  if (periods + 1 > MAX_RING_CAPACITY) {
    throw new InvalidDurationError(
      `verificationTtl spans ${String(periods)} rotation periods; ` +
        `at most ${String(MAX_RING_CAPACITY - 1)} are supported, got: ${verificationTtl}`,
      'verificationTtl',
      verificationTtl,
    )
  }
  return requiredCapacity(minimum, rotationPeriodMs, verificationTtlMs)
}
