/**
 * Key ring: a bounded circular set of signing keys for one named key, with
 * one designated current signer.
 */

import { SignJWT, importJWK, type JWK, type JWTPayload, type KeyLike } from 'jose'
import { EmptyRingError, InvalidInputError, SerializationError, SigningError } from '../errors.js'
import { createLogger, type Logger } from '../logging.js'
import type { PublicKeyPublisher } from '../publisher/publisher.js'
import type { ExpireableKey, KeyInfo, SigningAlgorithm } from '../types.js'
import { throwIfCancelled } from '../util/cancel.js'
import { SerialQueue } from '../util/serial-queue.js'
import { toPublicJwk } from './generator.js'
import { walkOldestToCurrent } from './slots.js'
import type { KeyGenerator, KeyRingSnapshot } from './types.js'

/** Largest supported ring. Every rotation persists the whole ring. */
export const MAX_RING_CAPACITY = 256

/** Options for constructing a {@link KeyRing}. */
export interface KeyRingOptions {
  /** Name of the owning named key, used in logs and errors. */
  name: string
  algorithm: SigningAlgorithm
  /** Maximum number of retained keys. */
  capacity: number
  /** Age after which the current key is replaced. */
  rotationPeriodMs: number
  /** How long a retired public key stays published. */
  verificationTtlMs: number
  generator: KeyGenerator
  publisher: PublicKeyPublisher
  /**
   * Make a ring state durable. Called before the published key set changes
   * and before the new state becomes visible.
   */
  persist: (snapshot: KeyRingSnapshot) => Promise<void>
  logger?: Logger | undefined
}

interface KeyEntry {
  id: string
  createdAt: Date
  privateKey: KeyLike
  privateJwk: JWK
  publicJwk: JWK
}

interface RingState {
  readonly slots: readonly (KeyEntry | null)[]
  /** `-1` while the ring is empty. */
  readonly current: number
}

function toKeyInfo(entry: KeyEntry): KeyInfo {
  return { id: entry.id, createdAt: new Date(entry.createdAt), publicJwk: { ...entry.publicJwk } }
}

function toSnapshot(state: RingState, capacity: number): KeyRingSnapshot {
  return {
    capacity,
    currentIndex: state.current,
    slots: state.slots.map((entry) =>
      entry === null
        ? null
        : { id: entry.id, createdAt: entry.createdAt.toISOString(), privateJwk: entry.privateJwk },
    ),
  }
}

/**
 * Ring of signing keys for one named key.
 *
 * @remarks
 * Mutations (`rotate`, `rotateIfDue`, `sign`) are serialized per ring.
 * Reads take the latest committed state and never wait. A rotation commits
 * in a fixed order: the ring state is persisted, then the published key set
 * is updated, and only then does the new key become current in memory. If
 * publishing fails the previous ring state is written back.
 *
 * Retiring a key from signing publishes it as expirable with
 * `expireAt = now + verificationTtl`, so the key stays verifiable for the
 * whole window even after its slot is reused.
 *
 * @public
 */
export class KeyRing {
  readonly name: string
  readonly algorithm: SigningAlgorithm
  readonly capacity: number
  readonly rotationPeriodMs: number
  readonly verificationTtlMs: number
  readonly #generator: KeyGenerator
  readonly #publisher: PublicKeyPublisher
  readonly #persist: (snapshot: KeyRingSnapshot) => Promise<void>
  readonly #logger: Logger
  readonly #queue = new SerialQueue()
  #state: RingState

  constructor(options: KeyRingOptions) {
    if (
      !Number.isInteger(options.capacity) ||
      options.capacity < 1 ||
      options.capacity > MAX_RING_CAPACITY
    ) {
      throw new InvalidInputError(
        `Key ring capacity must be an integer from 1 to ${String(MAX_RING_CAPACITY)}, got ${String(options.capacity)}`,
        'capacity',
      )
    }
    this.name = options.name
    this.algorithm = options.algorithm
    this.capacity = options.capacity
    this.rotationPeriodMs = options.rotationPeriodMs
    this.verificationTtlMs = options.verificationTtlMs
    this.#generator = options.generator
    this.#publisher = options.publisher
    this.#persist = options.persist
    this.#logger = options.logger ?? createLogger('key-ring')
    this.#state = { slots: new Array<KeyEntry | null>(options.capacity).fill(null), current: -1 }
  }

  /**
   * Rebuild a ring from a persisted snapshot.
   *
   * A snapshot with a different capacity is laid out again oldest to newest.
   */
  static async restore(options: KeyRingOptions, snapshot: KeyRingSnapshot): Promise<KeyRing> {
    const ring = new KeyRing(options)

    const stored: KeyEntry[] = []
    for (const slot of walkOldestToCurrent(snapshot.slots, snapshot.currentIndex)) {
      const imported = await importJWK(slot.privateJwk, options.algorithm)
      if (imported instanceof Uint8Array) {
        throw new InvalidInputError(`Stored key ${slot.id} is not an asymmetric key`, 'slots')
      }
      stored.push({
        id: slot.id,
        createdAt: new Date(slot.createdAt),
        privateKey: imported,
        privateJwk: slot.privateJwk,
        publicJwk: toPublicJwk(slot.privateJwk),
      })
    }

    const retained = stored.slice(-ring.capacity)
    const slots = new Array<KeyEntry | null>(ring.capacity).fill(null)
    retained.forEach((entry, i) => {
      slots[i] = entry
    })
    ring.#state = { slots, current: retained.length - 1 }
    return ring
  }

  /** Number of keys currently retained. */
  get size(): number {
    return this.#state.slots.filter((entry) => entry !== null).length
  }

  /** Identifiers of the retained keys, oldest first, current last. */
  keyIds(): string[] {
    const { slots, current } = this.#state
    return Array.from(walkOldestToCurrent(slots, current), (entry) => entry.id)
  }

  /** Persistable state of the ring. Contains private key material. */
  snapshot(): KeyRingSnapshot {
    return toSnapshot(this.#state, this.capacity)
  }

  /**
   * Public half of the current signing key.
   * @throws {EmptyRingError} if no key has been generated yet
   */
  currentPublicKey(): KeyInfo {
    return toKeyInfo(this.#requireCurrent(this.#state))
  }

  /**
   * Generate a new key and make it the current signer, evicting the key in
   * the slot it takes over.
   *
   * @returns The public view of the new key
   */
  rotate(signal?: AbortSignal): Promise<KeyInfo> {
    return this.#queue.run(() => this.#rotateLocked(signal))
  }

  /**
   * Rotate if the ring is empty or its current key is older than the
   * rotation period.
   *
   * @returns `true` when a rotation happened
   */
  rotateIfDue(signal?: AbortSignal): Promise<boolean> {
    return this.#queue.run(() => this.#rotateIfDueLocked(signal))
  }

  /**
   * Sign `payload` as a compact JWS with the current key, rotating first
   * when the current key is due.
   *
   * @throws {SerializationError} if the payload is not JSON-encodable
   * @throws {SigningError} if the signature cannot be produced
   */
  sign(payload: JWTPayload, signal?: AbortSignal): Promise<string> {
    return this.#queue.run(async () => {
      await this.#rotateIfDueLocked(signal)
      const entry = this.#requireCurrent(this.#state)

      try {
        JSON.stringify(payload)
      } catch (err) {
        throw new SerializationError('Token claims cannot be encoded as JSON', { cause: err })
      }

      try {
        return await new SignJWT(payload)
          .setProtectedHeader({ alg: this.algorithm, kid: entry.id, typ: 'JWT' })
          .sign(entry.privateKey)
      } catch (err) {
        throw new SigningError(`Failed to sign token with key ${entry.id}`, { cause: err })
      }
    })
  }

  async #rotateIfDueLocked(signal: AbortSignal | undefined): Promise<boolean> {
    const { slots, current } = this.#state
    const entry = slots[current]
    if (entry !== undefined && entry !== null) {
      const expireAt = entry.createdAt.getTime() + this.rotationPeriodMs
      if (Date.now() <= expireAt) {
        return false
      }
    }
    await this.#rotateLocked(signal)
    return true
  }

  async #rotateLocked(signal: AbortSignal | undefined): Promise<KeyInfo> {
    throwIfCancelled(signal, `Rotation of ${this.name}`)
    const previous = this.#state
    const generated = await this.#generator.generate(signal)
    const entry: KeyEntry = {
      id: generated.id,
      createdAt: generated.createdAt,
      privateKey: generated.privateKey,
      privateJwk: generated.privateJwk,
      publicJwk: generated.publicJwk,
    }

    const slot = previous.current === -1 ? 0 : (previous.current + 1) % this.capacity
    const outgoing = previous.slots[previous.current] ?? null
    const evicted = previous.slots[slot] ?? null
    const slots = [...previous.slots]
    slots[slot] = entry
    const next: RingState = { slots, current: slot }

    const expireAt = new Date(Date.now() + this.verificationTtlMs)
    const updates: ExpireableKey[] = []
    if (outgoing !== null) {
      updates.push({ kid: outgoing.id, key: outgoing.publicJwk, expirable: true, expireAt })
    }
    if (evicted !== null && evicted.id !== outgoing?.id) {
      // Retired keys were published as expirable when they stopped signing;
      // only a key still published without expiry needs retiring here.
      const published = this.#publisher.get(evicted.id)
      if (published !== undefined && !published.expirable) {
        updates.push({ kid: evicted.id, key: evicted.publicJwk, expirable: true, expireAt })
      }
      this.#logger.debug({ name: this.name, kid: evicted.id, slot }, 'evicting key from ring')
    }
    updates.push({ kid: entry.id, key: entry.publicJwk, expirable: false })

    throwIfCancelled(signal, `Rotation of ${this.name}`)
    await this.#persist(toSnapshot(next, this.capacity))
    try {
      await this.#publisher.publish(updates)
    } catch (err) {
      await this.#rollback(previous)
      throw err
    }

    this.#state = next
    this.#logger.info(
      { name: this.name, kid: entry.id, retired: outgoing?.id, slot },
      'rotated signing key',
    )
    return toKeyInfo(entry)
  }

  async #rollback(previous: RingState): Promise<void> {
    try {
      await this.#persist(toSnapshot(previous, this.capacity))
    } catch (err) {
      // The publishing failure is what the caller sees; this one is only logged.
      this.#logger.error(
        { name: this.name, err },
        'failed to restore ring state after publishing failed',
      )
    }
  }

  #requireCurrent(state: RingState): KeyEntry {
    const entry = state.slots[state.current]
    if (entry === undefined || entry === null) {
      throw new EmptyRingError(`Key ring ${this.name} has no keys`)
    }
    return entry
  }
}

