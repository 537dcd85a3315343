import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createLocalJWKSet, decodeProtectedHeader, jwtVerify } from 'jose'
import { OidcProvider } from '../../src/provider.js'
import { defaultConfig } from '../../src/config.js'
import { StaticIdentityResolver } from '../../src/issuer/static-resolver.js'
import { UnresolvedIdentityError } from '../../src/errors.js'
import { FastKeyGenerator } from '../helpers/generator.js'
import { MemoryStorage } from '../helpers/storage.js'

const START = new Date('2026-03-01T09:00:00.000Z')
const MINUTE = 60_000
const HOUR = 60 * MINUTE

// ---------------------------------------------------------------------------
// Token lifecycle e2e tests
// ---------------------------------------------------------------------------

describe('Token lifecycle e2e', () => {
  let provider: OidcProvider
  let generator: FastKeyGenerator

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(START)
    generator = new FastKeyGenerator()
    provider = await OidcProvider.init({
      config: defaultConfig(),
      storage: new MemoryStorage(),
      generator,
      resolver: new StaticIdentityResolver({
        'token-svc-caller': { entityId: 'entity-42', entityName: 'build-bot' },
        'token-root': { entityId: '' },
      }),
    })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('creates a key, issues a token and verifies it', async () => {
    await provider.createKey('svc', { rotationPeriod: '1h' })

    const config = await provider.readKey('svc')
    expect(config).toEqual({
      name: 'svc',
      algorithm: 'RS256',
      rotationPeriod: '1h',
      verificationTtl: '1h',
      audience: 'oidc-keyring',
    })

    const { token, keys } = await provider.issueToken('token-svc-caller', 'svc')
    const { payload, protectedHeader } = await jwtVerify(token, createLocalJWKSet(keys), {
      issuer: 'oidc-keyring',
      audience: 'oidc-keyring',
    })

    expect(protectedHeader).toEqual({ alg: 'RS256', kid: generator.ids[0], typ: 'JWT' })
    expect(payload.sub).toBe('entity-42')
    expect(payload.entity_name).toBe('build-bot')
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(120)
  })

  it('keeps tokens verifiable across scheduled rotations for the verification window', async () => {
    await provider.createKey('svc', { rotationPeriod: '1h', verificationTtl: '2h' })
    const { token: first } = await provider.issueToken('token-svc-caller', 'svc')
    const firstKid = decodeProtectedHeader(first).kid

    // One rotation period later the next token is signed by a fresh key.
    vi.setSystemTime(new Date(START.getTime() + HOUR + MINUTE))
    const { token: second } = await provider.issueToken('token-svc-caller', 'svc')
    expect(decodeProtectedHeader(second).kid).not.toBe(firstKid)

    // The first key stays published until its verification window closes.
    vi.setSystemTime(new Date(START.getTime() + 3 * HOUR))
    const published = (await provider.publicKeys()).keys.map((key) => key.kid)
    expect(published).toContain(firstKid)

    vi.setSystemTime(new Date(START.getTime() + 3 * HOUR + 2 * MINUTE))
    expect(await provider.sweepExpiredKeys()).toBe(1)
    expect((await provider.publicKeys()).keys.map((key) => key.kid)).not.toContain(firstKid)
  })

  it('refuses callers bound to no entity', async () => {
    await provider.createKey('svc')
    await expect(provider.issueToken('token-root', 'svc')).rejects.toThrow(UnresolvedIdentityError)
  })
})
