/**
 * Pre-configured OidcProvider for consumer tests.
 */

import type { IdentityResolver, OidcConfig, ResolvedIdentity } from 'oidc-keyring'
import { OidcProvider, StaticIdentityResolver, StorageRegistry, defaultConfig } from 'oidc-keyring'
import { InMemoryStorage } from './in-memory-storage.js'
import { StaticKeyGenerator } from './static-key-generator.js'

/**
 * Options for creating a {@link TestProvider}.
 * @public
 */
export interface TestProviderOptions {
  /** Credentials the provider recognizes. `subject:<id>` credentials always resolve. */
  identities?: Record<string, ResolvedIdentity> | undefined
  /** Replace the identity resolver entirely. */
  resolver?: IdentityResolver | undefined
  /** Override the `iss` claim. */
  issuer?: string | undefined
  /** Override the token lifetime (e.g. `'30s'`). */
  tokenTtl?: string | undefined
}

/**
 * A pre-configured provider for consumer test workflows.
 *
 * @remarks
 * `TestProvider` wraps a real `OidcProvider` backed by an
 * {@link InMemoryStorage} and a {@link StaticKeyGenerator}, making it
 * suitable for fast, hermetic tests.
 *
 * @example
 * ```ts
 * const test = await TestProvider.create()
 * await test.provider.createKey('svc')
 * const { token, keys } = await test.provider.issueToken('subject:entity-42', 'svc')
 * ```
 *
 * @public
 */
export class TestProvider {
  /** The underlying OidcProvider instance. */
  readonly provider: OidcProvider

  /** The in-memory storage used by this provider. */
  readonly storage: InMemoryStorage

  /** The key generator used by this provider. */
  readonly generator: StaticKeyGenerator

  private constructor(provider: OidcProvider, storage: InMemoryStorage, generator: StaticKeyGenerator) {
    this.provider = provider
    this.storage = storage
    this.generator = generator
  }

  /**
   * Create a new TestProvider, ready for use.
   * @public
   */
  static async create(options?: TestProviderOptions): Promise<TestProvider> {
    const storage = new InMemoryStorage()
    const generator = new StaticKeyGenerator()

    // Let configurations that name 'memory' storage resolve to this instance.
    StorageRegistry.register('memory', () => storage)

    const base = defaultConfig()
    const config: OidcConfig = {
      ...base,
      issuer: options?.issuer ?? 'https://oidc-keyring.test',
      storage: { type: 'memory' },
      defaults: { ...base.defaults, tokenTtl: options?.tokenTtl ?? base.defaults.tokenTtl },
    }

    const resolver =
      options?.resolver ??
      new StaticIdentityResolver(options?.identities ?? {}, { allowSubjectCredentials: true })

    const provider = await OidcProvider.init({ config, resolver, generator })
    return new TestProvider(provider, storage, generator)
  }

  /**
   * Reset the stored state. Providers created afterwards start empty; this
   * provider keeps the keys it already loaded.
   * @public
   */
  reset(): void {
    this.storage.clear()
  }
}
