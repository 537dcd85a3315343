/**
 * Process-wide set of public keys valid for token verification.
 */

import type { JSONWebKeySet } from 'jose'
import { StorageError } from '../errors.js'
import { createLogger, type Logger } from '../logging.js'
import { guardStorage } from '../storage/guard.js'
import type { StorageBackend } from '../storage/types.js'
import type { ExpireableKey } from '../types.js'
import { throwIfCancelled } from '../util/cancel.js'
import { SerialQueue } from '../util/serial-queue.js'
import { parsePublishedKeys, serializePublishedKeys } from './record.js'

/** Storage key of the persisted published key set. */
export const PUBLIC_KEYS_PATH = 'oidc-config/publicKeys/'

/** Options for {@link PublicKeyPublisher}. */
export interface PublicKeyPublisherOptions {
  /** Where the published set is persisted. Omit for a purely in-memory set. */
  storage?: StorageBackend | undefined
  logger?: Logger | undefined
}

/**
 * Whether `key` may still be used to verify tokens at `now`.
 */
export function isVerifiable(key: ExpireableKey, now: Date): boolean {
  return !key.expirable || key.expireAt.getTime() > now.getTime()
}

function copyKey(key: ExpireableKey): ExpireableKey {
  return key.expirable
    ? { kid: key.kid, key: { ...key.key }, expirable: true, expireAt: new Date(key.expireAt) }
    : { kid: key.kid, key: { ...key.key }, expirable: false }
}

/**
 * Owner of the published public keys.
 *
 * @remarks
 * The set is an immutable map replaced copy-on-write, so readers always see
 * a consistent snapshot without waiting. Writers are serialized and each
 * write is persisted before the new snapshot is swapped in. Expired keys are
 * filtered when read; {@link PublicKeyPublisher.sweep} removes them eagerly.
 *
 * The publisher never holds private key material and cannot rotate keys.
 * Keys are copied on the way in and on the way out; callers never share
 * the stored objects.
 *
 * @public
 */
export class PublicKeyPublisher {
  readonly #storage: StorageBackend | undefined
  readonly #logger: Logger
  readonly #queue = new SerialQueue()
  #keys: ReadonlyMap<string, ExpireableKey> = new Map()

  constructor(options?: PublicKeyPublisherOptions) {
    this.#storage = options?.storage
    this.#logger = options?.logger ?? createLogger('publisher')
  }

  /**
   * Create a publisher holding the key set persisted in `options.storage`.
   * @throws {StorageError} if the stored set cannot be read or is corrupt
   */
  static async load(options: PublicKeyPublisherOptions): Promise<PublicKeyPublisher> {
    const publisher = new PublicKeyPublisher(options)
    const { storage } = options
    if (storage === undefined) {
      return publisher
    }

    const raw = await guardStorage(`get ${PUBLIC_KEYS_PATH}`, () => storage.get(PUBLIC_KEYS_PATH))
    if (raw !== undefined) {
      const keys = parsePublishedKeys(raw)
      if (keys === undefined) {
        throw new StorageError(
          `Stored public key set at ${PUBLIC_KEYS_PATH} is corrupt`,
          `get ${PUBLIC_KEYS_PATH}`,
        )
      }
      publisher.#keys = new Map(keys.map((key) => [key.kid, key]))
    }
    return publisher
  }

  /** Look up a published key by id, expired or not. */
  get(kid: string): ExpireableKey | undefined {
    const key = this.#keys.get(kid)
    return key === undefined ? undefined : copyKey(key)
  }

  /**
   * Add or overwrite keys, keyed by `kid`.
   *
   * @throws {StorageError} if the new set cannot be persisted; the published
   *   set is then unchanged
   * @throws {OperationCancelledError} if `signal` fired before persisting
   */
  publish(keys: readonly ExpireableKey[], signal?: AbortSignal): Promise<void> {
    return this.#queue.run(async () => {
      const next = new Map(this.#keys)
      for (const key of keys) {
        next.set(key.kid, copyKey(key))
      }
      throwIfCancelled(signal, 'Publishing public keys')
      await this.#save(next)
      this.#keys = next
    })
  }

  /**
   * Keys valid for verification at `now`: every non-expirable key and every
   * expirable key whose expiry is still in the future.
   */
  currentSet(now: Date = new Date()): ExpireableKey[] {
    return Array.from(this.#keys.values())
      .filter((key) => isVerifiable(key, now))
      .map(copyKey)
  }

  /** The verification key set as a JWKS document. */
  jwks(now: Date = new Date()): JSONWebKeySet {
    return { keys: this.currentSet(now).map((entry) => entry.key) }
  }

  /**
   * Remove expired keys from the stored set.
   *
   * @returns The number of keys removed
   */
  sweep(now: Date = new Date(), signal?: AbortSignal): Promise<number> {
    return this.#queue.run(async () => {
      const next = new Map<string, ExpireableKey>()
      for (const [kid, key] of this.#keys) {
        if (isVerifiable(key, now)) {
          next.set(kid, key)
        }
      }
      const removed = this.#keys.size - next.size
      if (removed === 0) {
        return 0
      }
      throwIfCancelled(signal, 'Sweeping expired public keys')
      await this.#save(next)
      this.#keys = next
      this.#logger.info({ removed }, 'removed expired public keys')
      return removed
    })
  }

  async #save(keys: ReadonlyMap<string, ExpireableKey>): Promise<void> {
    const storage = this.#storage
    if (storage === undefined) {
      return
    }
    const value = serializePublishedKeys(Array.from(keys.values()))
    await guardStorage(`put ${PUBLIC_KEYS_PATH}`, () => storage.put(PUBLIC_KEYS_PATH, value))
  }
}
