import { describe, it, expect, beforeEach } from 'vitest'
import type { JWK } from 'jose'
import {
  PublicKeyPublisher,
  PUBLIC_KEYS_PATH,
  isVerifiable,
} from '../../../src/publisher/publisher.js'
import { OperationCancelledError, StorageError } from '../../../src/errors.js'
import type { ExpireableKey } from '../../../src/types.js'
import { MemoryStorage } from '../../helpers/storage.js'

const NOW = new Date('2026-01-01T12:00:00.000Z')
const LATER = new Date('2026-01-01T13:00:00.000Z')

function jwk(kid: string): JWK {
  return { kty: 'RSA', n: `modulus-${kid}`, e: 'AQAB', kid, alg: 'RS256', use: 'sig' }
}

function active(kid: string): ExpireableKey {
  return { kid, key: jwk(kid), expirable: false }
}

function retired(kid: string, expireAt: Date): ExpireableKey {
  return { kid, key: jwk(kid), expirable: true, expireAt }
}

// ---------------------------------------------------------------------------
// isVerifiable
// ---------------------------------------------------------------------------

describe('isVerifiable', () => {
  it('accepts keys without expiry', () => {
    expect(isVerifiable(active('a'), LATER)).toBe(true)
  })

  it('accepts expirable keys strictly before their expiry', () => {
    expect(isVerifiable(retired('a', LATER), NOW)).toBe(true)
    expect(isVerifiable(retired('a', LATER), LATER)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// publish / currentSet
// ---------------------------------------------------------------------------

describe('PublicKeyPublisher', () => {
  let storage: MemoryStorage
  let publisher: PublicKeyPublisher

  beforeEach(() => {
    storage = new MemoryStorage()
    publisher = new PublicKeyPublisher({ storage })
  })

  it('adds keys and overwrites them by kid', async () => {
    await publisher.publish([active('a'), active('b')])
    await publisher.publish([retired('a', LATER)])

    expect(publisher.get('a')).toEqual(retired('a', LATER))
    expect(publisher.get('b')).toEqual(active('b'))
    expect(publisher.get('missing')).toBeUndefined()
  })

  it('never shares stored keys with callers', async () => {
    const published = retired('a', LATER)
    await publisher.publish([published])
    published.key.n = 'changed-by-publisher-caller'

    const document = publisher.jwks(NOW)
    const [first] = document.keys
    if (first !== undefined) {
      first.n = 'tampered'
    }
    const fetched = publisher.get('a')
    if (fetched?.expirable === true) {
      fetched.key.e = 'tampered'
      fetched.expireAt.setTime(0)
    }
    const [listed] = publisher.currentSet(NOW)
    if (listed !== undefined) {
      listed.key.kty = 'tampered'
    }

    expect(publisher.get('a')).toEqual(retired('a', LATER))
    expect(publisher.jwks(NOW)).toEqual({ keys: [jwk('a')] })
  })

  it('filters expired keys from the current set', async () => {
    await publisher.publish([active('a'), retired('b', LATER), retired('c', NOW)])

    expect(publisher.currentSet(NOW).map((key) => key.kid)).toEqual(['a', 'b'])
    expect(publisher.currentSet(LATER).map((key) => key.kid)).toEqual(['a'])
  })

  it('renders the current set as a JWKS document', async () => {
    await publisher.publish([active('a'), retired('b', NOW)])
    expect(publisher.jwks(NOW)).toEqual({ keys: [jwk('a')] })
  })

  it('persists every write', async () => {
    await publisher.publish([active('a'), retired('b', LATER)])

    expect(JSON.parse(storage.entries.get(PUBLIC_KEYS_PATH) ?? 'null')).toEqual([
      { key: jwk('a'), expirable: false, expireAt: null },
      { key: jwk('b'), expirable: true, expireAt: '2026-01-01T13:00:00.000Z' },
    ])
  })

  it('keeps the previous set when persisting fails', async () => {
    await publisher.publish([active('a')])
    storage.failNext('put')

    await expect(publisher.publish([active('b')])).rejects.toThrow(StorageError)
    expect(publisher.currentSet(NOW).map((key) => key.kid)).toEqual(['a'])
  })

  it('does not publish once cancelled', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(publisher.publish([active('a')], controller.signal)).rejects.toThrow(
      OperationCancelledError,
    )
    expect(publisher.get('a')).toBeUndefined()
    expect(storage.entries.has(PUBLIC_KEYS_PATH)).toBe(false)
  })

  it('applies concurrent writes without losing any', async () => {
    await Promise.all(['a', 'b', 'c', 'd'].map((kid) => publisher.publish([active(kid)])))

    expect(publisher.currentSet(NOW).map((key) => key.kid).sort()).toEqual(['a', 'b', 'c', 'd'])
    const reloaded = await PublicKeyPublisher.load({ storage })
    expect(reloaded.currentSet(NOW)).toHaveLength(4)
  })

  it('works without storage', async () => {
    const memoryOnly = new PublicKeyPublisher()
    await memoryOnly.publish([active('a')])
    expect(memoryOnly.jwks(NOW)).toEqual({ keys: [jwk('a')] })
  })
})

// ---------------------------------------------------------------------------
// sweep
// ---------------------------------------------------------------------------

describe('PublicKeyPublisher.sweep', () => {
  it('removes expired keys and persists the result', async () => {
    const storage = new MemoryStorage()
    const publisher = new PublicKeyPublisher({ storage })
    await publisher.publish([active('a'), retired('b', NOW), retired('c', LATER)])

    expect(await publisher.sweep(NOW)).toBe(1)

    expect(publisher.get('b')).toBeUndefined()
    const reloaded = await PublicKeyPublisher.load({ storage })
    expect(reloaded.get('b')).toBeUndefined()
    expect(reloaded.get('c')).toEqual(retired('c', LATER))
  })

  it('skips the write when nothing expired', async () => {
    const storage = new MemoryStorage()
    const publisher = new PublicKeyPublisher({ storage })
    await publisher.publish([active('a')])
    const writes = storage.calls.length

    expect(await publisher.sweep(NOW)).toBe(0)
    expect(storage.calls).toHaveLength(writes)
  })
})

// ---------------------------------------------------------------------------
// load
// ---------------------------------------------------------------------------

describe('PublicKeyPublisher.load', () => {
  it('starts empty when nothing is stored', async () => {
    const publisher = await PublicKeyPublisher.load({ storage: new MemoryStorage() })
    expect(publisher.currentSet(NOW)).toEqual([])
  })

  it('restores expiry dates', async () => {
    const storage = new MemoryStorage()
    await new PublicKeyPublisher({ storage }).publish([retired('a', LATER)])

    const publisher = await PublicKeyPublisher.load({ storage })

    expect(publisher.get('a')).toEqual(retired('a', LATER))
  })

  it('rejects a corrupt stored set', async () => {
    const storage = new MemoryStorage()
    storage.entries.set(PUBLIC_KEYS_PATH, '[{"key":{"kty":"RSA"},"expirable":false}]')

    await expect(PublicKeyPublisher.load({ storage })).rejects.toThrow(
      `Stored public key set at ${PUBLIC_KEYS_PATH} is corrupt`,
    )
  })

  it('surfaces a storage failure as StorageError', async () => {
    const storage = new MemoryStorage()
    storage.failNext('get')
    await expect(PublicKeyPublisher.load({ storage })).rejects.toThrow(StorageError)
  })
})
