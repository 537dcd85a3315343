/**
 * Identity token issuance.
 */

import { decodeProtectedHeader, type JWTPayload } from 'jose'
import { UnresolvedIdentityError } from '../errors.js'
import { createLogger, type Logger } from '../logging.js'
import type { PublicKeyPublisher } from '../publisher/publisher.js'
import type { NamedKeyRegistry } from '../registry/named-keys.js'
import type {
  IdentityClaims,
  IdentityResolver,
  IssuedToken,
  NamedKeyConfig,
  ResolvedIdentity,
} from '../types.js'
import { throwIfCancelled } from '../util/cancel.js'

/** Default lifetime of an issued token. */
export const DEFAULT_TOKEN_TTL_MS = 120_000

/** Options for {@link TokenIssuer}. */
export interface TokenIssuerOptions {
  registry: NamedKeyRegistry
  publisher: PublicKeyPublisher
  resolver: IdentityResolver
  /** Value of the `iss` claim. */
  issuer: string
  /** Token lifetime in milliseconds. Defaults to two minutes. */
  tokenTtlMs?: number | undefined
  logger?: Logger | undefined
}

/**
 * Build the claim set for `identity`. Only the members of
 * {@link IdentityClaims} are emitted; optional ones only when known.
 * @internal
 */
export function buildClaims(
  issuer: string,
  config: NamedKeyConfig,
  identity: ResolvedIdentity,
  issuedAt: number,
  ttlSeconds: number,
): IdentityClaims {
  const claims: IdentityClaims = {
    iss: issuer,
    sub: identity.entityId,
    aud: [config.audience],
    iat: issuedAt,
    exp: issuedAt + ttlSeconds,
    auth_time: issuedAt,
  }
  if (identity.entityName !== undefined && identity.entityName !== '') {
    claims.entity_name = identity.entityName
  }
  if (identity.groups !== undefined && identity.groups.length > 0) {
    claims.groups = [...identity.groups]
  }
  return claims
}

/**
 * Widen a claim set to the payload type the signer takes.
 */
function toJwtPayload(claims: IdentityClaims): JWTPayload {
  const { iss, sub, aud, iat, exp, auth_time, entity_name, groups } = claims
  const payload: JWTPayload = { iss, sub, aud, iat, exp, auth_time }
  if (entity_name !== undefined) {
    payload.entity_name = entity_name
  }
  if (groups !== undefined) {
    payload.groups = groups
  }
  return payload
}

/**
 * Issues signed identity tokens for callers, using the key ring of a named
 * key.
 *
 * @public
 */
export class TokenIssuer {
  readonly #registry: NamedKeyRegistry
  readonly #publisher: PublicKeyPublisher
  readonly #resolver: IdentityResolver
  readonly #issuer: string
  readonly #ttlSeconds: number
  readonly #logger: Logger

  constructor(options: TokenIssuerOptions) {
    this.#registry = options.registry
    this.#publisher = options.publisher
    this.#resolver = options.resolver
    this.#issuer = options.issuer
    this.#ttlSeconds = Math.floor((options.tokenTtlMs ?? DEFAULT_TOKEN_TTL_MS) / 1000)
    this.#logger = options.logger ?? createLogger('issuer')
  }

  /**
   * Issue a token for the entity behind `credential`, signed with the
   * current key of `keyName`.
   *
   * @returns The compact JWS and the keys currently valid for verifying it
   * @throws {UnresolvedIdentityError} if the credential is bound to no entity
   * @throws {NotFoundError} if `keyName` does not exist
   * @throws {SigningError} if the token cannot be signed
   */
  async issue(credential: string, keyName: string, signal?: AbortSignal): Promise<IssuedToken> {
    const identity = await this.#resolver.resolve(credential, signal)
    if (identity === undefined || identity.entityId === '') {
      this.#logger.warn({ keyName }, 'refusing to issue token for unresolved identity')
      throw new UnresolvedIdentityError('no entity associated with the request\'s credential')
    }

    const config = await this.#registry.get(keyName, signal)
    const ring = await this.#registry.ring(keyName, signal)
    throwIfCancelled(signal, `Issuing token with ${keyName}`)

    const issuedAt = Math.floor(Date.now() / 1000)
    const claims = buildClaims(this.#issuer, config, identity, issuedAt, this.#ttlSeconds)
    const token = await ring.sign(toJwtPayload(claims), signal)

    this.#logger.info(
      { keyName, sub: claims.sub, kid: decodeProtectedHeader(token).kid },
      'issued identity token',
    )
    return { token, keys: this.#publisher.jwks() }
  }
}
