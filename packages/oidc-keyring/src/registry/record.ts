/**
 * Persisted form of a named key.
 */

import type { KeyRingSnapshot, StoredKeyEntry } from '../keys/types.js'
import { walkOldestToCurrent } from '../keys/slots.js'
import { SIGNING_ALGORITHMS, type NamedKeyConfig } from '../types.js'
import { isObject } from '../util/guards.js'
import { parseJwk } from '../util/jwk.js'

/**
 * Stored record of a named key: its configuration, the ids of the keys in
 * its ring and the ring slots with their private key material.
 * @internal
 */
export interface NamedKeyRecord extends NamedKeyConfig {
  /** Retained key ids, oldest first, current signer last. */
  keyRing: string[]
  /** Id of the key currently used for signing. */
  signingKeyId: string | null
  ring: KeyRingSnapshot
}

/**
 * Build the stored record for `config` with the ring in `snapshot`.
 * @internal
 */
export function toNamedKeyRecord(config: NamedKeyConfig, snapshot: KeyRingSnapshot): NamedKeyRecord {
  return {
    ...config,
    keyRing: Array.from(walkOldestToCurrent(snapshot.slots, snapshot.currentIndex), (slot) => slot.id),
    signingKeyId: snapshot.slots[snapshot.currentIndex]?.id ?? null,
    ring: snapshot,
  }
}

function parseSlot(raw: unknown): StoredKeyEntry | null | undefined {
  if (raw === null) {
    return null
  }
  if (!isObject(raw) || typeof raw.id !== 'string' || typeof raw.createdAt !== 'string') {
    return undefined
  }
  if (Number.isNaN(new Date(raw.createdAt).getTime())) {
    return undefined
  }
  const privateJwk = parseJwk(raw.privateJwk)
  if (privateJwk?.d === undefined) {
    return undefined
  }
  return { id: raw.id, createdAt: raw.createdAt, privateJwk }
}

function parseSnapshot(raw: unknown): KeyRingSnapshot | undefined {
  if (!isObject(raw) || !Array.isArray(raw.slots)) {
    return undefined
  }
  const { capacity, currentIndex } = raw
  const items: unknown[] = raw.slots
  if (typeof capacity !== 'number' || !Number.isInteger(capacity) || capacity !== items.length) {
    return undefined
  }
  if (typeof currentIndex !== 'number' || !Number.isInteger(currentIndex)) {
    return undefined
  }
  if (currentIndex < -1 || currentIndex >= capacity) {
    return undefined
  }

  const slots: (StoredKeyEntry | null)[] = []
  for (const item of items) {
    const slot = parseSlot(item)
    if (slot === undefined) {
      return undefined
    }
    slots.push(slot)
  }
  if (currentIndex >= 0 && slots[currentIndex] === null) {
    return undefined
  }
  return { capacity, currentIndex, slots }
}

/**
 * Decode a stored named key record. Returns `undefined` if it is malformed.
 * @internal
 */
export function parseNamedKeyRecord(raw: string): NamedKeyRecord | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return undefined
  }
  if (!isObject(parsed)) {
    return undefined
  }

  const { name, rotationPeriod, verificationTtl, audience, signingKeyId } = parsed
  const storedAlgorithm = parsed.algorithm
  if (
    typeof name !== 'string' ||
    typeof rotationPeriod !== 'string' ||
    typeof verificationTtl !== 'string' ||
    typeof audience !== 'string'
  ) {
    return undefined
  }
  const algorithm = SIGNING_ALGORITHMS.find((candidate) => candidate === storedAlgorithm)
  if (algorithm === undefined) {
    return undefined
  }
  if (signingKeyId !== null && typeof signingKeyId !== 'string') {
    return undefined
  }
  const ring = parseSnapshot(parsed.ring)
  if (ring === undefined) {
    return undefined
  }

  const record = toNamedKeyRecord({ name, algorithm, rotationPeriod, verificationTtl, audience }, ring)
  if (record.signingKeyId !== signingKeyId) {
    return undefined
  }
  return record
}
