/**
 * RSA key pair generation for key rings.
 */

import { exportJWK, generateKeyPair, type JWK, type KeyLike } from 'jose'
import { nanoid } from 'nanoid'
import { GenerationError, OperationCancelledError, OidcError } from '../errors.js'
import { createLogger, type Logger } from '../logging.js'
import type { SigningAlgorithm } from '../types.js'
import { throwIfCancelled } from '../util/cancel.js'
import type { GeneratedKey, KeyGenerator } from './types.js'

/** Options for {@link RsaKeyGenerator}. */
export interface RsaKeyGeneratorOptions {
  /** RSA modulus length in bits. Defaults to 2048. */
  modulusLength?: number | undefined
  /** Deadline for one generation in milliseconds. Defaults to 30 seconds. */
  timeoutMs?: number | undefined
  logger?: Logger | undefined
}

const DEFAULT_MODULUS_LENGTH = 2048
const DEFAULT_TIMEOUT_MS = 30_000
const ALGORITHM: SigningAlgorithm = 'RS256'

/**
 * Stamp a JWK with the identifying members every published key carries.
 * @internal
 */
export function stampJwk(jwk: JWK, kid: string, alg: SigningAlgorithm): JWK {
  return { ...jwk, kid, alg, use: 'sig' }
}

/**
 * Reduce a private RSA JWK to its public members.
 * @internal
 */
export function toPublicJwk(privateJwk: JWK): JWK {
  const { kty, n, e, kid, alg, use } = privateJwk
  return { kty, n, e, kid, alg, use }
}

/**
 * Race `work` against a deadline and the caller's abort signal.
 */
function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  signal: AbortSignal | undefined,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup()
      reject(new OperationCancelledError('Key generation was cancelled', { cause: signal?.reason }))
    }
    const timer = setTimeout(() => {
      cleanup()
      reject(new GenerationError(`Key generation did not finish within ${String(timeoutMs)}ms`))
    }, timeoutMs)
    function cleanup(): void {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    work.then(
      (value) => {
        cleanup()
        resolve(value)
      },
      (err: unknown) => {
        cleanup()
        reject(err)
      },
    )

    if (signal?.aborted === true) {
      onAbort()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Generates RS256 key pairs with `nanoid` key identifiers.
 *
 * @public
 */
export class RsaKeyGenerator implements KeyGenerator {
  readonly #modulusLength: number
  readonly #timeoutMs: number
  readonly #logger: Logger

  constructor(options?: RsaKeyGeneratorOptions) {
    this.#modulusLength = options?.modulusLength ?? DEFAULT_MODULUS_LENGTH
    this.#timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.#logger = options?.logger ?? createLogger('generator')
  }

  async generate(signal?: AbortSignal): Promise<GeneratedKey> {
    try {
      throwIfCancelled(signal, 'Key generation')
      const started = Date.now()
      const key = await withDeadline(this.#generate(), this.#timeoutMs, signal)
      this.#logger.debug(
        { kid: key.id, modulusLength: this.#modulusLength, durationMs: Date.now() - started },
        'generated key pair',
      )
      return key
    } catch (err) {
      if (err instanceof OidcError) {
        throw err
      }
      throw new GenerationError('Failed to generate RSA key pair', { cause: err })
    }
  }

  async #generate(): Promise<GeneratedKey> {
    const { privateKey, publicKey } = await generateKeyPair<KeyLike>(ALGORITHM, {
      modulusLength: this.#modulusLength,
      extractable: true,
    })
    const id = nanoid()

    return {
      id,
      createdAt: new Date(),
      privateKey,
      privateJwk: stampJwk(await exportJWK(privateKey), id, ALGORITHM),
      publicJwk: stampJwk(await exportJWK(publicKey), id, ALGORITHM),
    }
  }
}
