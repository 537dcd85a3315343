/**
 * Storage abstraction types for oidc-keyring.
 */

import type { StorageConfig } from '../types.js'

/**
 * Factory function for creating a StorageBackend instance.
 * @public
 */
export type StorageFactory = (config: StorageConfig) => StorageBackend

/**
 * Key-value storage collaborator.
 *
 * @remarks
 * Keys are sorted path-like strings such as `oidc-config/namedKey/<name>`.
 * Each call must be strongly consistent for a single key.
 *
 * @public
 */
export interface StorageBackend {
  /** Unique type identifier for this backend. */
  readonly type: string

  /** Human-readable display name for this backend. */
  readonly displayName: string

  /**
   * Read the value stored under `key`.
   * @returns The stored value, or `undefined` if nothing is stored
   */
  get(key: string): Promise<string | undefined>

  /**
   * Store `value` under `key`, replacing any previous value.
   */
  put(key: string, value: string): Promise<void>

  /**
   * Remove the value stored under `key`. Removing an absent key is a no-op.
   */
  delete(key: string): Promise<void>
}
