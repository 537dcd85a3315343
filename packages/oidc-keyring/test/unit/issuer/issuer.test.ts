import { describe, it, expect, expectTypeOf, beforeEach, afterEach, vi } from 'vitest'
import { createLocalJWKSet, decodeJwt, decodeProtectedHeader, jwtVerify } from 'jose'
import { TokenIssuer, type TokenIssuerOptions } from '../../../src/issuer/issuer.js'
import { StaticIdentityResolver } from '../../../src/issuer/static-resolver.js'
import { NamedKeyRegistry } from '../../../src/registry/named-keys.js'
import { PublicKeyPublisher } from '../../../src/publisher/publisher.js'
import { NotFoundError, UnresolvedIdentityError } from '../../../src/errors.js'
import type { IdentityClaims, IdentityResolver } from '../../../src/types.js'
import { FastKeyGenerator } from '../../helpers/generator.js'
import { MemoryStorage } from '../../helpers/storage.js'

const START = new Date('2026-01-01T00:00:00.000Z')
const START_SECONDS = 1_767_225_600
const ISSUER = 'https://issuer.example.test'

let publisher: PublicKeyPublisher
let registry: NamedKeyRegistry
let resolver: IdentityResolver

function makeIssuer(overrides: Partial<TokenIssuerOptions> = {}): TokenIssuer {
  return new TokenIssuer({ registry, publisher, resolver, issuer: ISSUER, ...overrides })
}

beforeEach(async () => {
  vi.useFakeTimers({ toFake: ['Date'] })
  vi.setSystemTime(START)
  const storage = new MemoryStorage()
  publisher = new PublicKeyPublisher({ storage })
  registry = new NamedKeyRegistry({ storage, publisher, generator: new FastKeyGenerator() })
  resolver = new StaticIdentityResolver({
    'token-alice': { entityId: 'entity-42', entityName: 'alice', groups: ['admins', 'ops'] },
    'token-bob': { entityId: 'entity-7' },
    'token-orphan': { entityId: '' },
  })
  await registry.create('svc', { rotationPeriod: '1h' })
})

afterEach(() => {
  vi.useRealTimers()
})

describe('TokenIssuer.issue', () => {
  it('signs exactly the identity claims', async () => {
    const { token } = await makeIssuer().issue('token-bob', 'svc')

    expect(decodeJwt(token)).toEqual({
      iss: ISSUER,
      sub: 'entity-7',
      aud: ['oidc-keyring'],
      iat: START_SECONDS,
      exp: START_SECONDS + 120,
      auth_time: START_SECONDS,
    })
  })

  it('declares a closed claim set', () => {
    expectTypeOf<keyof IdentityClaims>().toEqualTypeOf<
      'iss' | 'sub' | 'aud' | 'iat' | 'exp' | 'auth_time' | 'entity_name' | 'groups'
    >()
  })

  it('adds the entity name and groups when known', async () => {
    const { token } = await makeIssuer().issue('token-alice', 'svc')

    expect(decodeJwt(token)).toMatchObject({
      sub: 'entity-42',
      entity_name: 'alice',
      groups: ['admins', 'ops'],
    })
  })

  it('uses the audience of the named key', async () => {
    await registry.create('api', { audience: 'https://api.example.test' })
    const { token } = await makeIssuer().issue('token-bob', 'api')
    expect(decodeJwt(token).aud).toEqual(['https://api.example.test'])
  })

  it('honours a custom token lifetime', async () => {
    const { token } = await makeIssuer({ tokenTtlMs: 300_000 }).issue('token-bob', 'svc')
    const claims = decodeJwt(token)
    expect((claims.exp ?? 0) - (claims.iat ?? 0)).toBe(300)
  })

  it('returns a key set that verifies the token', async () => {
    const { token, keys } = await makeIssuer().issue('token-alice', 'svc')

    const kid = decodeProtectedHeader(token).kid
    expect(keys.keys.map((key) => key.kid)).toContain(kid)
    const { payload } = await jwtVerify(token, createLocalJWKSet(keys), {
      issuer: ISSUER,
      audience: 'oidc-keyring',
    })
    expect(payload.sub).toBe('entity-42')
  })

  it('returns a key set the caller may change without affecting the published one', async () => {
    const { token, keys } = await makeIssuer().issue('token-bob', 'svc')
    for (const key of keys.keys) {
      key.n = 'tampered'
      key.e = 'tampered'
    }

    const published = publisher.jwks()
    expect(published.keys.map((key) => key.e)).toEqual(['AQAB'])
    await expect(jwtVerify(token, createLocalJWKSet(published))).resolves.toBeDefined()
    expect((await registry.ring('svc')).currentPublicKey().publicJwk.e).toBe('AQAB')
  })

  it('keeps earlier tokens verifiable after the key rotates', async () => {
    const issuer = makeIssuer()
    const { token: early } = await issuer.issue('token-bob', 'svc')

    vi.setSystemTime(new Date(START.getTime() + 60_000))
    await registry.rotate('svc')
    const { token: late, keys } = await issuer.issue('token-bob', 'svc')

    expect(decodeProtectedHeader(late).kid).not.toBe(decodeProtectedHeader(early).kid)
    await expect(jwtVerify(early, createLocalJWKSet(keys))).resolves.toBeDefined()
  })

  it.each(['token-unknown', 'token-orphan'])(
    'refuses %s, which is bound to no entity',
    async (credential) => {
      await expect(makeIssuer().issue(credential, 'svc')).rejects.toThrow(
        new UnresolvedIdentityError("no entity associated with the request's credential"),
      )
    },
  )

  it('reports an unknown key name', async () => {
    await expect(makeIssuer().issue('token-bob', 'nope')).rejects.toThrow(NotFoundError)
  })
})

describe('StaticIdentityResolver', () => {
  it('resolves known credentials to a copy of their identity', async () => {
    const identities = { 'token-bob': { entityId: 'entity-7' } }
    const staticResolver = new StaticIdentityResolver(identities)

    const identity = await staticResolver.resolve('token-bob')
    expect(identity).toEqual({ entityId: 'entity-7' })
    expect(identity).not.toBe(identities['token-bob'])
  })

  it('ignores subject credentials unless allowed', async () => {
    expect(await new StaticIdentityResolver().resolve('subject:entity-9')).toBeUndefined()

    const permissive = new StaticIdentityResolver({}, { allowSubjectCredentials: true })
    expect(await permissive.resolve('subject:entity-9')).toEqual({ entityId: 'entity-9' })
    expect(await permissive.resolve('subject:')).toBeUndefined()
  })
})
