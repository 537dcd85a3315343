/**
 * Token issuer barrel export.
 */

export { TokenIssuer, DEFAULT_TOKEN_TTL_MS } from './issuer.js'
export type { TokenIssuerOptions } from './issuer.js'
export { StaticIdentityResolver, SUBJECT_CREDENTIAL_PREFIX } from './static-resolver.js'
