/**
 * Persisted form of the published key set.
 */

import type { ExpireableKey } from '../types.js'
import { isObject } from '../util/guards.js'
import { parseJwk } from '../util/jwk.js'

interface StoredPublishedKey {
  key: ExpireableKey['key']
  expirable: boolean
  /** ISO timestamp, `null` for keys still signing. */
  expireAt: string | null
}

/**
 * Encode the published key set for storage.
 * @internal
 */
export function serializePublishedKeys(keys: readonly ExpireableKey[]): string {
  const stored: StoredPublishedKey[] = keys.map((entry) => ({
    key: entry.key,
    expirable: entry.expirable,
    expireAt: entry.expirable ? entry.expireAt.toISOString() : null,
  }))
  return JSON.stringify(stored)
}

function parseEntry(raw: unknown): ExpireableKey | undefined {
  if (!isObject(raw)) {
    return undefined
  }
  const key = parseJwk(raw.key)
  if (key === undefined || typeof key.kid !== 'string') {
    return undefined
  }

  if (raw.expirable === false) {
    return { kid: key.kid, key, expirable: false }
  }
  if (raw.expirable !== true || typeof raw.expireAt !== 'string') {
    return undefined
  }
  const expireAt = new Date(raw.expireAt)
  if (Number.isNaN(expireAt.getTime())) {
    return undefined
  }
  return { kid: key.kid, key, expirable: true, expireAt }
}

/**
 * Decode a stored published key set. Returns `undefined` if any entry is malformed.
 * @internal
 */
export function parsePublishedKeys(raw: string): ExpireableKey[] | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return undefined
  }
  if (!Array.isArray(parsed)) {
    return undefined
  }

  const items: unknown[] = parsed
  const keys: ExpireableKey[] = []
  for (const item of items) {
    const entry = parseEntry(item)
    if (entry === undefined) {
      return undefined
    }
    keys.push(entry)
  }
  return keys
}
