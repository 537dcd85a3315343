/**
 * oidc-keyring-test-helpers: test utilities for oidc-keyring consumers.
 *
 * @packageDocumentation
 */

export { InMemoryStorage } from './in-memory-storage.js'
export { StaticKeyGenerator } from './static-key-generator.js'
export { TestProvider } from './test-provider.js'
export type { TestProviderOptions } from './test-provider.js'
