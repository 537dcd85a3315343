import type { JWK } from 'jose'
import { isObject } from './guards.js'

const OPTIONAL_MEMBERS = ['alg', 'use', 'n', 'e', 'd', 'p', 'q', 'dp', 'dq', 'qi'] as const

/**
 * Parse a stored RSA JWK, keeping only the members oidc-keyring writes.
 * Returns `undefined` if `kty` or `kid` is missing or a member is not a string.
 * @internal
 */
export function parseJwk(raw: unknown): JWK | undefined {
  if (!isObject(raw)) {
    return undefined
  }
  const { kty, kid } = raw
  if (typeof kty !== 'string' || typeof kid !== 'string') {
    return undefined
  }

  const jwk: JWK = { kty, kid }
  for (const member of OPTIONAL_MEMBERS) {
    const value = raw[member]
    if (value === undefined) {
      continue
    }
    if (typeof value !== 'string') {
      return undefined
    }
    jwk[member] = value
  }
  return jwk
}
