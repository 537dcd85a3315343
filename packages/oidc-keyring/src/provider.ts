/**
 * OidcProvider: wires configuration, storage, key rings, the published key
 * set and the token issuer together.
 */

import type { JSONWebKeySet } from 'jose'
import { getDefaultConfigDir, loadConfig, resolveStorageConfig } from './config.js'
import { parseDuration } from './duration.js'
import { TokenIssuer } from './issuer/issuer.js'
import { RsaKeyGenerator } from './keys/generator.js'
import type { KeyGenerator } from './keys/types.js'
import { createLogger, type Logger } from './logging.js'
import { PublicKeyPublisher } from './publisher/publisher.js'
import { NamedKeyRegistry } from './registry/named-keys.js'
import { StorageRegistry } from './storage/registry.js'
import type { StorageBackend } from './storage/types.js'
import type {
  CreateKeyOptions,
  IdentityResolver,
  IssuedToken,
  KeyInfo,
  NamedKeyConfig,
  OidcConfig,
} from './types.js'

/** Options for initializing an OidcProvider. */
export interface OidcProviderOptions {
  /** Override the config directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: OidcConfig | undefined
  /** Supply a storage backend directly instead of building one from config. */
  storage?: StorageBackend | undefined
  /** Maps caller credentials to entities. */
  resolver: IdentityResolver
  /** Key pair source. Defaults to an RSA generator built from config. */
  generator?: KeyGenerator | undefined
  logger?: Logger | undefined
}

/**
 * Main entry point for oidc-keyring.
 *
 * @example
 * ```ts
 * const provider = await OidcProvider.init({ resolver })
 * await provider.createKey('svc', { rotationPeriod: '1h' })
 * const { token, keys } = await provider.issueToken(credential, 'svc')
 * ```
 *
 * @public
 */
export class OidcProvider {
  readonly #config: OidcConfig
  readonly #registry: NamedKeyRegistry
  readonly #publisher: PublicKeyPublisher
  readonly #issuer: TokenIssuer

  private constructor(
    config: OidcConfig,
    registry: NamedKeyRegistry,
    publisher: PublicKeyPublisher,
    issuer: TokenIssuer,
  ) {
    this.#config = config
    this.#registry = registry
    this.#publisher = publisher
    this.#issuer = issuer
  }

  /**
   * Initialize a provider: load config, open storage and restore the
   * published key set.
   *
   * @throws {ConfigError} if the config file is invalid
   * @throws {StorageError} if the published key set cannot be loaded
   */
  static async init(options: OidcProviderOptions): Promise<OidcProvider> {
    const configDir = options.configDir ?? getDefaultConfigDir()
    const config = options.config ?? (await loadConfig(configDir))
    const logger = options.logger ?? createLogger('provider')

    const storage = options.storage ?? StorageRegistry.create(resolveStorageConfig(config, configDir))
    const generator =
      options.generator ??
      new RsaKeyGenerator({
        modulusLength: config.keyGeneration.modulusLength,
        timeoutMs: config.keyGeneration.timeoutMs,
        logger: logger.child({ component: 'generator' }),
      })

    const publisher = await PublicKeyPublisher.load({
      storage,
      logger: logger.child({ component: 'publisher' }),
    })
    const registry = new NamedKeyRegistry({
      storage,
      publisher,
      generator,
      capacity: config.keyRing.capacity,
      defaultRotationPeriod: config.defaults.rotationPeriod,
      defaultAudience: config.defaults.audience,
      logger: logger.child({ component: 'named-keys' }),
    })
    const issuer = new TokenIssuer({
      registry,
      publisher,
      resolver: options.resolver,
      issuer: config.issuer,
      tokenTtlMs: parseDuration(config.defaults.tokenTtl, 'defaults.tokenTtl'),
      logger: logger.child({ component: 'issuer' }),
    })

    logger.debug({ storage: storage.type, issuer: config.issuer }, 'provider initialized')
    return new OidcProvider(config, registry, publisher, issuer)
  }

  /** The configuration this provider runs with. */
  get config(): OidcConfig {
    return structuredClone(this.#config)
  }

  /** Create a named key and its first signing key. */
  createKey(name: string, options?: CreateKeyOptions, signal?: AbortSignal): Promise<NamedKeyConfig> {
    return this.#registry.create(
      name,
      { algorithm: this.#config.defaults.algorithm, ...options },
      signal,
    )
  }

  /** Read the configuration of a named key. */
  readKey(name: string, signal?: AbortSignal): Promise<NamedKeyConfig> {
    return this.#registry.get(name, signal)
  }

  /** Replace the signing key of a named key now. */
  rotateKey(name: string, signal?: AbortSignal): Promise<KeyInfo> {
    return this.#registry.rotate(name, signal)
  }

  /** Issue an identity token for `credential` signed by `keyName`. */
  issueToken(credential: string, keyName: string, signal?: AbortSignal): Promise<IssuedToken> {
    return this.#issuer.issue(credential, keyName, signal)
  }

  /**
   * Public keys currently valid for verification. With `keyName`, that
   * key's ring is rotated first when due.
   */
  async publicKeys(keyName?: string, signal?: AbortSignal): Promise<JSONWebKeySet> {
    if (keyName !== undefined) {
      const ring = await this.#registry.ring(keyName, signal)
      await ring.rotateIfDue(signal)
    }
    return this.#publisher.jwks()
  }

  /**
   * Remove expired keys from the published set.
   * @returns The number of keys removed
   */
  sweepExpiredKeys(signal?: AbortSignal): Promise<number> {
    return this.#publisher.sweep(new Date(), signal)
  }
}
