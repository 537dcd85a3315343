/**
 * In-memory storage backend for testing.
 */

import type { StorageBackend } from 'oidc-keyring'

/**
 * A fully in-memory `StorageBackend` for testing.
 *
 * @remarks
 * Entries live in a plain `Map` and nothing is encrypted. Suitable for unit,
 * integration, and e2e tests.
 *
 * @public
 */
export class InMemoryStorage implements StorageBackend {
  readonly type = 'memory'
  readonly displayName = 'In-Memory Storage'
  readonly #entries = new Map<string, string>()

  /** @public */
  get(key: string): Promise<string | undefined> {
    return Promise.resolve(this.#entries.get(key))
  }

  /** @public */
  put(key: string, value: string): Promise<void> {
    this.#entries.set(key, value)
    return Promise.resolve()
  }

  /** @public */
  delete(key: string): Promise<void> {
    this.#entries.delete(key)
    return Promise.resolve()
  }

  /**
   * Stored keys, in insertion order.
   * @public
   */
  keys(): string[] {
    return [...this.#entries.keys()]
  }

  /**
   * Remove all entries. Useful for test teardown.
   * @public
   */
  clear(): void {
    this.#entries.clear()
  }

  /**
   * The number of entries currently stored.
   * @public
   */
  get size(): number {
    return this.#entries.size
  }
}
