/**
 * Named key registry: maps key names to their configuration and key ring,
 * and persists both.
 */

import { AlreadyExistsError, InvalidInputError, NotFoundError, StorageError } from '../errors.js'
import { KeyRing } from '../keys/ring.js'
import type { KeyGenerator, KeyRingSnapshot } from '../keys/types.js'
import { createLogger, type Logger } from '../logging.js'
import { parseDuration } from '../duration.js'
import type { PublicKeyPublisher } from '../publisher/publisher.js'
import { guardStorage } from '../storage/guard.js'
import type { StorageBackend } from '../storage/types.js'
import { DEFAULT_ALGORITHM, type CreateKeyOptions, type KeyInfo, type NamedKeyConfig } from '../types.js'
import { throwIfCancelled } from '../util/cancel.js'
import { KeyedSerialQueue } from '../util/serial-queue.js'
import { parseNamedKeyRecord, toNamedKeyRecord } from './record.js'
import { boundedCapacity, parseAlgorithm, requiredCapacity, validateName } from './validation.js'

/** Storage key prefix of named key records. */
export const NAMED_KEY_PREFIX = 'oidc-config/namedKey/'

/** Rotation period used when none is given. */
export const DEFAULT_ROTATION_PERIOD = '6h'

/** Minimum number of keys retained per ring. */
export const DEFAULT_RING_CAPACITY = 4

/** Audience used when neither the key nor the registry declares one. */
export const DEFAULT_AUDIENCE = 'oidc-keyring'

/** Options for {@link NamedKeyRegistry}. */
export interface NamedKeyRegistryOptions {
  storage: StorageBackend
  publisher: PublicKeyPublisher
  generator: KeyGenerator
  /** Minimum ring capacity. Defaults to {@link DEFAULT_RING_CAPACITY}. */
  capacity?: number | undefined
  /** Rotation period for keys created without one. */
  defaultRotationPeriod?: string | undefined
  /** Audience for keys created without one. */
  defaultAudience?: string | undefined
  logger?: Logger | undefined
}

interface RegisteredKey {
  config: NamedKeyConfig
  ring: KeyRing
}

interface ResolvedTimings {
  rotationPeriodMs: number
  verificationTtlMs: number
  capacity: number
}

function namedKeyPath(name: string): string {
  return `${NAMED_KEY_PREFIX}${name}`
}

/**
 * Registry of named keys.
 *
 * @remarks
 * Each name has its own lock: creating, loading or rotating one key never
 * waits on another. Loaded key rings stay cached for the life of the
 * registry; storage is consulted on first access of a name.
 *
 * @public
 */
export class NamedKeyRegistry {
  readonly #storage: StorageBackend
  readonly #publisher: PublicKeyPublisher
  readonly #generator: KeyGenerator
  readonly #capacity: number
  readonly #defaultRotationPeriod: string
  readonly #defaultAudience: string
  readonly #logger: Logger
  readonly #locks = new KeyedSerialQueue()
  readonly #entries = new Map<string, RegisteredKey>()

  constructor(options: NamedKeyRegistryOptions) {
    this.#storage = options.storage
    this.#publisher = options.publisher
    this.#generator = options.generator
    this.#capacity = options.capacity ?? DEFAULT_RING_CAPACITY
    this.#defaultRotationPeriod = options.defaultRotationPeriod ?? DEFAULT_ROTATION_PERIOD
    this.#defaultAudience = options.defaultAudience ?? DEFAULT_AUDIENCE
    this.#logger = options.logger ?? createLogger('named-keys')
  }

  /**
   * Create a named key with a freshly generated signing key.
   *
   * @throws {InvalidInputError} for an empty or malformed name or audience
   * @throws {InvalidDurationError} if a duration does not parse or is not positive
   * @throws {UnsupportedAlgorithmError} for an unknown algorithm
   * @throws {AlreadyExistsError} if the name is taken; the existing key is not touched
   * @throws {GenerationError} if the initial key cannot be generated
   * @throws {StorageError} if the record or the published keys cannot be stored
   */
  async create(
    name: string,
    options: CreateKeyOptions = {},
    signal?: AbortSignal,
  ): Promise<NamedKeyConfig> {
    validateName(name)
    const rotationPeriod = options.rotationPeriod ?? this.#defaultRotationPeriod
    const rotationPeriodMs = parseDuration(rotationPeriod, 'rotationPeriod')
    const verificationTtl =
      options.verificationTtl === undefined || options.verificationTtl === ''
        ? rotationPeriod
        : options.verificationTtl
    const verificationTtlMs = parseDuration(verificationTtl, 'verificationTtl')
    const capacity = boundedCapacity(
      this.#capacity,
      rotationPeriodMs,
      verificationTtlMs,
      verificationTtl,
    )
    const algorithm = parseAlgorithm(options.algorithm ?? DEFAULT_ALGORITHM)
    const audience = options.audience ?? this.#defaultAudience
    if (audience.trim() === '') {
      throw new InvalidInputError('audience must not be empty', 'audience')
    }

    const config: NamedKeyConfig = { name, algorithm, rotationPeriod, verificationTtl, audience }

    return this.#locks.run(name, async () => {
      throwIfCancelled(signal, `Creating key ${name}`)
      if (this.#entries.has(name) || (await this.#readRecord(name)) !== undefined) {
        this.#logger.warn({ name }, 'refusing to create existing named key')
        throw new AlreadyExistsError(`A named key already exists at ${JSON.stringify(name)}`, name)
      }

      const ring = this.#createRing(config, { rotationPeriodMs, verificationTtlMs, capacity })
      await ring.rotate(signal)
      this.#entries.set(name, { config, ring })
      this.#logger.info(
        { name, algorithm, rotationPeriod, verificationTtl, capacity: ring.capacity },
        'created named key',
      )
      return { ...config }
    })
  }

  /**
   * Read the configuration of a named key.
   * @throws {NotFoundError} if no key is stored under `name`
   */
  async get(name: string, signal?: AbortSignal): Promise<NamedKeyConfig> {
    const { config } = await this.#load(name, signal)
    return { ...config }
  }

  /**
   * The key ring of a named key, restored from storage on first access.
   * @throws {NotFoundError} if no key is stored under `name`
   */
  async ring(name: string, signal?: AbortSignal): Promise<KeyRing> {
    const { ring } = await this.#load(name, signal)
    return ring
  }

  /**
   * Rotate the ring of a named key now, whether or not it is due.
   * @throws {NotFoundError} if no key is stored under `name`
   */
  async rotate(name: string, signal?: AbortSignal): Promise<KeyInfo> {
    const ring = await this.ring(name, signal)
    return ring.rotate(signal)
  }

  /** Names of the keys loaded by this registry. */
  loadedNames(): string[] {
    return Array.from(this.#entries.keys())
  }

  #load(name: string, signal: AbortSignal | undefined): Promise<RegisteredKey> {
    if (name.trim() === '') {
      return Promise.reject(new InvalidInputError('name must not be empty', 'name'))
    }
    const cached = this.#entries.get(name)
    if (cached !== undefined) {
      return Promise.resolve(cached)
    }

    return this.#locks.run(name, async () => {
      const loaded = this.#entries.get(name)
      if (loaded !== undefined) {
        return loaded
      }
      throwIfCancelled(signal, `Loading key ${name}`)

      const record = await this.#readRecord(name)
      if (record === undefined) {
        throw new NotFoundError(`no named key was stored at ${JSON.stringify(name)}`, name)
      }
      const { keyRing, signingKeyId, ring: snapshot, ...config } = record
      const rotationPeriodMs = parseDuration(config.rotationPeriod, 'rotationPeriod')
      const verificationTtlMs = parseDuration(config.verificationTtl, 'verificationTtl')
      const timings: ResolvedTimings = {
        rotationPeriodMs,
        verificationTtlMs,
        capacity: requiredCapacity(this.#capacity, rotationPeriodMs, verificationTtlMs),
      }
      const ring = await KeyRing.restore(this.#ringOptions(config, timings), snapshot)
      const entry: RegisteredKey = { config, ring }
      this.#entries.set(name, entry)
      this.#logger.debug({ name, keyRing, signingKeyId }, 'loaded named key')
      return entry
    })
  }

  async #readRecord(name: string): Promise<ReturnType<typeof parseNamedKeyRecord>> {
    const path = namedKeyPath(name)
    const raw = await guardStorage(`get ${path}`, () => this.#storage.get(path))
    if (raw === undefined) {
      return undefined
    }
    const record = parseNamedKeyRecord(raw)
    if (record?.name !== name) {
      throw new StorageError(`Stored named key at ${path} is corrupt`, `get ${path}`)
    }
    return record
  }

  #createRing(config: NamedKeyConfig, timings: ResolvedTimings): KeyRing {
    return new KeyRing(this.#ringOptions(config, timings))
  }

  #ringOptions(config: NamedKeyConfig, timings: ResolvedTimings): ConstructorParameters<typeof KeyRing>[0] {
    return {
      name: config.name,
      algorithm: config.algorithm,
      capacity: timings.capacity,
      rotationPeriodMs: timings.rotationPeriodMs,
      verificationTtlMs: timings.verificationTtlMs,
      generator: this.#generator,
      publisher: this.#publisher,
      persist: (snapshot) => this.#persist(config, snapshot),
      logger: this.#logger,
    }
  }

  #persist(config: NamedKeyConfig, snapshot: KeyRingSnapshot): Promise<void> {
    const path = namedKeyPath(config.name)
    if (snapshot.currentIndex === -1) {
      // Only reached when the first rotation of a new key is rolled back.
      return guardStorage(`delete ${path}`, () => this.#storage.delete(path))
    }
    const value = JSON.stringify(toNamedKeyRecord(config, snapshot))
    return guardStorage(`put ${path}`, () => this.#storage.put(path, value))
  }
}
