import type { IdentityResolver, ResolvedIdentity } from '../types.js'

/** Prefix of credentials that name their subject directly. */
export const SUBJECT_CREDENTIAL_PREFIX = 'subject:'

/**
 * Identity resolver backed by a fixed credential table.
 *
 * Credentials of the form `subject:<id>` resolve to entity `<id>` when
 * `allowSubjectCredentials` is set, which is how the CLI issues tokens.
 *
 * @public
 */
export class StaticIdentityResolver implements IdentityResolver {
  readonly #identities: ReadonlyMap<string, ResolvedIdentity>
  readonly #allowSubjectCredentials: boolean

  constructor(
    identities: Record<string, ResolvedIdentity> = {},
    options?: { allowSubjectCredentials?: boolean | undefined },
  ) {
    this.#identities = new Map(Object.entries(identities))
    this.#allowSubjectCredentials = options?.allowSubjectCredentials ?? false
  }

  resolve(credential: string): Promise<ResolvedIdentity | undefined> {
    const known = this.#identities.get(credential)
    if (known !== undefined) {
      return Promise.resolve({ ...known })
    }
    if (this.#allowSubjectCredentials && credential.startsWith(SUBJECT_CREDENTIAL_PREFIX)) {
      const entityId = credential.slice(SUBJECT_CREDENTIAL_PREFIX.length)
      return Promise.resolve(entityId === '' ? undefined : { entityId })
    }
    return Promise.resolve(undefined)
  }
}
