/**
 * Shared types and interfaces for oidc-keyring.
 */

import type { JWK, JSONWebKeySet } from 'jose'

/** Signing algorithms a named key may declare. */
export type SigningAlgorithm = 'RS256'

/** Every supported signing algorithm, in declaration order. */
export const SIGNING_ALGORITHMS: readonly SigningAlgorithm[] = ['RS256']

/** Algorithm used when a named key does not declare one. */
export const DEFAULT_ALGORITHM: SigningAlgorithm = 'RS256'

/**
 * Public view of a key held by a key ring. Never carries private material.
 */
export interface KeyInfo {
  /** Globally unique key identifier (`kid`). */
  id: string
  /** When the key pair was generated. */
  createdAt: Date
  /** Public half of the key pair as a JWK, stamped with `kid`, `alg` and `use`. */
  publicJwk: JWK
}

/**
 * A public key published for verification.
 *
 * The active signer of a ring is published without expiry. Once a key is
 * retired from signing it becomes expirable and stays in the published set
 * until `expireAt`.
 */
export type ExpireableKey =
  | {
      kid: string
      key: JWK
      expirable: false
    }
  | {
      kid: string
      key: JWK
      expirable: true
      /** Retirement time plus the verification TTL of the owning ring. */
      expireAt: Date
    }

/** User-visible configuration of a named key. Private material is never included. */
export interface NamedKeyConfig {
  /** Unique, immutable name of the key. */
  name: string
  /** Declared signing algorithm. */
  algorithm: SigningAlgorithm
  /** How often a new key pair is generated, exactly as supplied (e.g. `'6h'`). */
  rotationPeriod: string
  /** How long a retired public key stays available for verification. */
  verificationTtl: string
  /** Audience placed in tokens signed with this key. */
  audience: string
}

/** Options for creating a named key. Omitted fields take their defaults. */
export interface CreateKeyOptions {
  /** Rotation period. Defaults to `'6h'`. */
  rotationPeriod?: string | undefined
  /** Verification TTL. Defaults to the rotation period. */
  verificationTtl?: string | undefined
  /** Signing algorithm name. Defaults to `'RS256'`. */
  algorithm?: string | undefined
  /** Token audience. Defaults to the configured default audience. */
  audience?: string | undefined
}

/**
 * Claim set signed into an identity token.
 *
 * The set is closed: only the members listed here are ever emitted.
 */
export interface IdentityClaims {
  /** Issuer identifier of this service. */
  iss: string
  /** Resolved entity identifier of the caller. */
  sub: string
  /** Audience declared by the named key. */
  aud: string[]
  /** Issued-at (Unix timestamp, seconds). */
  iat: number
  /** Expiration (Unix timestamp, seconds). */
  exp: number
  /** Time the caller's identity was resolved (Unix timestamp, seconds). */
  auth_time: number
  /** Display name of the entity, when known. */
  entity_name?: string | undefined
  /** Group names the entity belongs to, when known. */
  groups?: string[] | undefined
}

/** Identity a caller's credential resolves to. */
export interface ResolvedIdentity {
  /** Opaque entity identifier, used as the token subject. */
  entityId: string
  /** Display name of the entity. */
  entityName?: string | undefined
  /** Groups the entity belongs to. */
  groups?: string[] | undefined
}

/**
 * Resolves a caller credential to an entity. Returns `undefined` for
 * credentials not bound to any entity (root or anonymous credentials).
 */
export interface IdentityResolver {
  resolve(credential: string, signal?: AbortSignal): Promise<ResolvedIdentity | undefined>
}

/** Result of issuing an identity token. */
export interface IssuedToken {
  /** Compact JWS. */
  token: string
  /** Public keys currently valid for verification. */
  keys: JSONWebKeySet
}

/** Storage settings. */
export interface StorageConfig {
  /** Storage type identifier (e.g. `'file'`, `'memory'`). */
  type: string
  /** Directory used by file-based storage. */
  path?: string | undefined
}

/** oidc-keyring configuration file structure. */
export interface OidcConfig {
  /** Config schema version. Currently must be `1`. */
  version: number
  /** Issuer placed in the `iss` claim of every token. */
  issuer: string
  /** Where named keys and published keys are persisted. */
  storage: StorageConfig
  /** Key ring sizing. */
  keyRing: {
    /**
     * Minimum number of keys retained per ring. Rings are grown when the
     * verification TTL spans more rotation periods than this allows.
     */
    capacity: number
  }
  /** Defaults applied to `createKey()` and token issuance. */
  defaults: {
    rotationPeriod: string
    algorithm: SigningAlgorithm
    audience: string
    /** Lifetime of issued identity tokens. */
    tokenTtl: string
  }
  /** Key pair generation settings. */
  keyGeneration: {
    /** RSA modulus length in bits. */
    modulusLength: number
    /** Deadline for a single key generation, in milliseconds. */
    timeoutMs: number
  }
}
