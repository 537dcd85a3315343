/**
 * oidc-keyring: rotating signing keys, a published verification key set and
 * identity token issuance.
 *
 * @packageDocumentation
 */

export {
  OidcError,
  InvalidInputError,
  InvalidDurationError,
  UnsupportedAlgorithmError,
  AlreadyExistsError,
  NotFoundError,
  EmptyRingError,
  GenerationError,
  SigningError,
  SerializationError,
  UnresolvedIdentityError,
  StorageError,
  OperationCancelledError,
  ConfigError,
} from './errors.js'
export type { OidcErrorOptions } from './errors.js'

export { SIGNING_ALGORITHMS, DEFAULT_ALGORITHM } from './types.js'
export type {
  SigningAlgorithm,
  KeyInfo,
  ExpireableKey,
  NamedKeyConfig,
  CreateKeyOptions,
  IdentityClaims,
  ResolvedIdentity,
  IdentityResolver,
  IssuedToken,
  StorageConfig,
  OidcConfig,
} from './types.js'

export { parseDuration, MAX_DURATION_MS } from './duration.js'

export { createLogger, getRootLogger, resolveLogLevel, REDACTION_PATHS } from './logging.js'
export type { Logger, LogLevel } from './logging.js'

export type { StorageBackend, StorageFactory } from './storage/index.js'
export { FileStorage, StorageRegistry } from './storage/index.js'

export { KeyRing, MAX_RING_CAPACITY, RsaKeyGenerator } from './keys/index.js'
export type {
  KeyRingOptions,
  RsaKeyGeneratorOptions,
  GeneratedKey,
  KeyGenerator,
  KeyRingSnapshot,
  StoredKeyEntry,
} from './keys/index.js'

export { PublicKeyPublisher, PUBLIC_KEYS_PATH, isVerifiable } from './publisher/index.js'
export type { PublicKeyPublisherOptions } from './publisher/index.js'

export {
  NamedKeyRegistry,
  NAMED_KEY_PREFIX,
  DEFAULT_AUDIENCE,
  DEFAULT_RING_CAPACITY,
  DEFAULT_ROTATION_PERIOD,
  requiredCapacity,
} from './registry/index.js'
export type { NamedKeyRegistryOptions } from './registry/index.js'

export {
  TokenIssuer,
  DEFAULT_TOKEN_TTL_MS,
  StaticIdentityResolver,
  SUBJECT_CREDENTIAL_PREFIX,
} from './issuer/index.js'
export type { TokenIssuerOptions } from './issuer/index.js'

export { OidcProvider } from './provider.js'
export type { OidcProviderOptions } from './provider.js'

export {
  loadConfig,
  getDefaultConfigDir,
  validateConfig,
  defaultConfig,
  resolveStorageConfig,
  writeConfig,
  CONFIG_FILE_NAME,
} from './config.js'
