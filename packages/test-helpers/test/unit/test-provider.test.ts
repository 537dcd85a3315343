import { describe, it, expect, beforeEach } from 'vitest'
import { createLocalJWKSet, decodeJwt, jwtVerify } from 'jose'
import { UnresolvedIdentityError } from 'oidc-keyring'
import { InMemoryStorage, StaticKeyGenerator, TestProvider } from '../../src/index.js'

describe('InMemoryStorage', () => {
  let storage: InMemoryStorage

  beforeEach(() => {
    storage = new InMemoryStorage()
  })

  it('returns undefined for missing entries', async () => {
    expect(await storage.get('missing')).toBeUndefined()
  })

  it('stores, overwrites and deletes entries', async () => {
    await storage.put('k1', 'v1')
    await storage.put('k1', 'v2')
    expect(await storage.get('k1')).toBe('v2')

    await storage.delete('k1')
    expect(await storage.get('k1')).toBeUndefined()
  })

  it('lists keys and clears', async () => {
    await storage.put('a', '1')
    await storage.put('b', '2')
    expect(storage.keys()).toEqual(['a', 'b'])
    expect(storage.size).toBe(2)

    storage.clear()
    expect(storage.size).toBe(0)
  })

  it('has correct type and displayName', () => {
    expect(storage.type).toBe('memory')
    expect(storage.displayName).toBe('In-Memory Storage')
  })
})

describe('StaticKeyGenerator', () => {
  it('hands out the same key material under fresh ids', async () => {
    const generator = new StaticKeyGenerator()
    const a = await generator.generate()
    const b = await generator.generate()

    expect(a.id).not.toBe(b.id)
    expect(a.publicJwk.n).toBe(b.publicJwk.n)
    expect(b.publicJwk).toMatchObject({ kid: b.id, alg: 'RS256', use: 'sig' })
    expect(generator.issuedIds).toEqual([a.id, b.id])
  })
})

describe('TestProvider', () => {
  let test: TestProvider

  beforeEach(async () => {
    test = await TestProvider.create()
  })

  it('issues verifiable tokens for subject credentials', async () => {
    await test.provider.createKey('svc')

    const { token, keys } = await test.provider.issueToken('subject:entity-42', 'svc')

    const { payload } = await jwtVerify(token, createLocalJWKSet(keys), {
      issuer: 'https://oidc-keyring.test',
    })
    expect(payload.sub).toBe('entity-42')
  })

  it('resolves configured identities', async () => {
    const custom = await TestProvider.create({
      identities: { 'token-alice': { entityId: 'entity-1', groups: ['ops'] } },
      tokenTtl: '30s',
    })
    await custom.provider.createKey('svc')

    const claims = decodeJwt((await custom.provider.issueToken('token-alice', 'svc')).token)

    expect(claims.groups).toEqual(['ops'])
    expect((claims.exp ?? 0) - (claims.iat ?? 0)).toBe(30)
  })

  it('rejects unknown credentials', async () => {
    await test.provider.createKey('svc')
    await expect(test.provider.issueToken('token-unknown', 'svc')).rejects.toThrow(
      UnresolvedIdentityError,
    )
  })

  it('persists keys to its storage and clears them on reset', async () => {
    await test.provider.createKey('svc')
    expect(test.storage.keys()).toContain('oidc-config/namedKey/svc')
    expect(test.generator.issuedIds).toHaveLength(1)

    test.reset()
    expect(test.storage.size).toBe(0)
  })
})
