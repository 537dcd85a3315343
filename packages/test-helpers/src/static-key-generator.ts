/**
 * Key generator that skips RSA key generation after the first call.
 */

import { exportJWK, generateKeyPair, type JWK, type KeyLike } from 'jose'
import { nanoid } from 'nanoid'
import type { GeneratedKey, KeyGenerator } from 'oidc-keyring'

interface KeyPair {
  privateKey: KeyLike
  privateJwk: JWK
  publicJwk: JWK
}

/**
 * A `KeyGenerator` that generates one RSA key pair and hands it out again
 * under a fresh key id on every call.
 *
 * @remarks
 * Every key of every ring shares the same key material, so tokens verify
 * against any published key. Only key ids tell keys apart. Never use it
 * outside tests.
 *
 * @public
 */
export class StaticKeyGenerator implements KeyGenerator {
  #pair: Promise<KeyPair> | undefined
  readonly #issued: string[] = []

  /**
   * Ids handed out so far, oldest first.
   * @public
   */
  get issuedIds(): readonly string[] {
    return this.#issued
  }

  /** @public */
  async generate(): Promise<GeneratedKey> {
    const pair = await this.#keyPair()
    const id = nanoid()
    this.#issued.push(id)
    const stamp = { kid: id, alg: 'RS256', use: 'sig' }
    return {
      id,
      createdAt: new Date(),
      privateKey: pair.privateKey,
      privateJwk: { ...pair.privateJwk, ...stamp },
      publicJwk: { ...pair.publicJwk, ...stamp },
    }
  }

  #keyPair(): Promise<KeyPair> {
    this.#pair ??= (async () => {
      const { privateKey, publicKey } = await generateKeyPair<KeyLike>('RS256', {
        modulusLength: 2048,
        extractable: true,
      })
      return {
        privateKey,
        privateJwk: await exportJWK(privateKey),
        publicJwk: await exportJWK(publicKey),
      }
    })()
    return this.#pair
  }
}
