/**
 * Key management types for oidc-keyring.
 */

import type { JWK, KeyLike } from 'jose'

/**
 * A freshly generated key pair.
 * @internal
 */
export interface GeneratedKey {
  /** Globally unique key identifier. */
  id: string
  /** When the key pair was generated. */
  createdAt: Date
  /** Private key handle used for signing. */
  privateKey: KeyLike
  /** Private key as a JWK, for persistence only. */
  privateJwk: JWK
  /** Public key as a JWK, stamped with `kid`, `alg` and `use`. */
  publicJwk: JWK
}

/**
 * Produces key pairs for key rings.
 * @public
 */
export interface KeyGenerator {
  /**
   * Generate a key pair with a new unique identifier.
   * @throws {GenerationError} if key construction fails or times out
   * @throws {OperationCancelledError} if `signal` fires first
   */
  generate(signal?: AbortSignal): Promise<GeneratedKey>
}

/**
 * A key ring slot as persisted.
 * @internal
 */
export interface StoredKeyEntry {
  id: string
  /** ISO timestamp of generation. */
  createdAt: string
  privateJwk: JWK
}

/**
 * Persistable state of a key ring.
 * @internal
 */
export interface KeyRingSnapshot {
  capacity: number
  /** Slot of the current signer, `-1` when the ring is empty. */
  currentIndex: number
  slots: (StoredKeyEntry | null)[]
}
