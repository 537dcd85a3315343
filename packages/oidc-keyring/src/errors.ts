/**
 * Error hierarchy for oidc-keyring.
 *
 * @packageDocumentation
 */

/** Options accepted by errors that wrap an underlying failure. */
export interface OidcErrorOptions {
  /** The original error, kept for diagnostics. */
  cause?: unknown
}

/** Base error for all oidc-keyring errors. */
export class OidcError extends Error {
  constructor(message: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'OidcError'
  }
}

// --- Input Validation Failures ---

/**
 * Thrown when a caller-supplied value is malformed (empty name, bad option).
 */
export class InvalidInputError extends OidcError {
  /**
   * The input field that failed validation (e.g. `'name'`).
   */
  readonly field: string

  constructor(message: string, field: string) {
    super(message)
    this.name = 'InvalidInputError'
    this.field = field
  }
}

/**
 * Thrown when a duration string cannot be parsed or is not positive.
 */
export class InvalidDurationError extends InvalidInputError {
  /**
   * The duration string exactly as supplied.
   */
  readonly value: string

  constructor(message: string, field: string, value: string) {
    super(message, field)
    this.name = 'InvalidDurationError'
    this.value = value
  }
}

/**
 * Thrown when a signing algorithm outside the supported set is requested.
 */
export class UnsupportedAlgorithmError extends InvalidInputError {
  readonly algorithm: string

  constructor(message: string, algorithm: string) {
    super(message, 'algorithm')
    this.name = 'UnsupportedAlgorithmError'
    this.algorithm = algorithm
  }
}

// --- Named Key Lifecycle Failures ---

/**
 * Thrown when creating a named key whose name is already registered.
 * The existing configuration and its key ring are left untouched.
 */
export class AlreadyExistsError extends OidcError {
  readonly keyName: string

  constructor(message: string, keyName: string) {
    super(message)
    this.name = 'AlreadyExistsError'
    this.keyName = keyName
  }
}

/**
 * Thrown when no named key is stored under the requested name.
 */
export class NotFoundError extends OidcError {
  readonly keyName: string

  constructor(message: string, keyName: string) {
    super(message)
    this.name = 'NotFoundError'
    this.keyName = keyName
  }
}

/**
 * Thrown when the current key of a ring is requested before any key has
 * been generated.
 */
export class EmptyRingError extends OidcError {
  constructor(message: string) {
    super(message)
    this.name = 'EmptyRingError'
  }
}

// --- Cryptographic Failures ---

/**
 * Thrown when a key pair cannot be constructed, including when generation
 * does not finish before its deadline. Never retried.
 */
export class GenerationError extends OidcError {
  constructor(message: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'GenerationError'
  }
}

/**
 * Thrown when producing the signature of an identity token fails.
 */
export class SigningError extends OidcError {
  constructor(message: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'SigningError'
  }
}

/**
 * Thrown when a claim set cannot be encoded as JSON.
 */
export class SerializationError extends OidcError {
  constructor(message: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'SerializationError'
  }
}

// --- Identity Failures ---

/**
 * Thrown when the caller's credential is not bound to any entity (for
 * example a root or anonymous credential).
 */
export class UnresolvedIdentityError extends OidcError {
  constructor(message: string) {
    super(message)
    this.name = 'UnresolvedIdentityError'
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when the storage collaborator fails. The original error is
 * available as `cause`.
 */
export class StorageError extends OidcError {
  /**
   * The storage operation that failed (e.g. `'put oidc-config/publicKeys/'`).
   */
  readonly operation: string

  constructor(message: string, operation: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'StorageError'
    this.operation = operation
  }
}

/**
 * Thrown when the caller's abort signal fires before the operation became
 * durable. Nothing from the operation is visible afterwards.
 */
export class OperationCancelledError extends OidcError {
  constructor(message: string, options?: OidcErrorOptions) {
    super(message, options)
    this.name = 'OperationCancelledError'
  }
}

/**
 * Thrown when the configuration file is malformed.
 */
export class ConfigError extends OidcError {
  /**
   * Path of the offending config file, when it was loaded from disk.
   */
  readonly path: string | undefined

  constructor(message: string, path?: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = path
  }
}
