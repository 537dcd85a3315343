/**
 * Encrypted file storage backend.
 *
 * @remarks
 * Each key is stored as an individual AES-256-GCM encrypted file whose name
 * is the hex encoding of the key. A randomly generated local key, kept in a
 * protected file beside the entries, is used for encryption. Named key
 * records contain private key material, so nothing is written in clear.
 *
 * Encrypted file format (all parts base64-encoded, colon-separated):
 *   <iv>:<authTag>:<ciphertext>
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as crypto from 'node:crypto'
import type { StorageBackend } from './types.js'

const KEY_FILE = '.key'
const GCM_IV_BYTES = 12
const GCM_KEY_BYTES = 32
const GCM_TAG_LENGTH = 128 // bits

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function getEntryPath(storageDir: string, key: string): string {
  const safeId = Buffer.from(key, 'utf8').toString('hex')
  return path.join(storageDir, `${safeId}.enc`)
}

function encryptGcm(key: Buffer, plaintext: string): string {
  const iv = crypto.randomBytes(GCM_IV_BYTES)
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv, {
    authTagLength: GCM_TAG_LENGTH / 8,
  })
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
  const authTag = cipher.getAuthTag()
  return [iv.toString('base64'), authTag.toString('base64'), encrypted.toString('base64')].join(':')
}

function decryptGcm(key: Buffer, encoded: string): string {
  const [ivB64, authTagB64, ciphertextB64, ...rest] = encoded.split(':')
  if (ivB64 === undefined || authTagB64 === undefined || ciphertextB64 === undefined || rest.length > 0) {
    throw new Error('Invalid encrypted file format: expected iv:authTag:ciphertext')
  }
  const iv = Buffer.from(ivB64, 'base64')
  const authTag = Buffer.from(authTagB64, 'base64')
  const ciphertext = Buffer.from(ciphertextB64, 'base64')

  const decipher = crypto.createDecipheriv('aes-256-gcm', key, iv, {
    authTagLength: GCM_TAG_LENGTH / 8,
  })
  decipher.setAuthTag(authTag)
  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()])
  return decrypted.toString('utf8')
}

/**
 * Encrypted file storage backend rooted at a directory.
 *
 * @public
 */
export class FileStorage implements StorageBackend {
  readonly type = 'file'
  readonly displayName = 'Encrypted File Store'
  readonly #storageDir: string
  #key: Promise<Buffer> | undefined

  constructor(storageDir: string) {
    this.#storageDir = storageDir
  }

  /** Directory holding the encrypted entries. */
  get directory(): string {
    return this.#storageDir
  }

  async get(key: string): Promise<string | undefined> {
    let encoded: string
    try {
      encoded = await fs.readFile(getEntryPath(this.#storageDir, key), 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined
      }
      throw err
    }

    const encryptionKey = await this.#encryptionKey()
    try {
      return decryptGcm(encryptionKey, encoded)
    } catch (err) {
      throw new Error(
        `Failed to decrypt stored entry: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
  }

  async put(key: string, value: string): Promise<void> {
    const encryptionKey = await this.#encryptionKey()
    const entryPath = getEntryPath(this.#storageDir, key)
    // Write then rename so a reader never observes a half-written entry.
    const temporaryPath = `${entryPath}.${crypto.randomBytes(4).toString('hex')}.tmp`
    await fs.writeFile(temporaryPath, encryptGcm(encryptionKey, value), { mode: 0o600 })
    await fs.rename(temporaryPath, entryPath)
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(getEntryPath(this.#storageDir, key))
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return
      }
      throw err
    }
  }

  #encryptionKey(): Promise<Buffer> {
    this.#key ??= this.#loadOrCreateKey().catch((err: unknown) => {
      this.#key = undefined
      throw err
    })
    return this.#key
  }

  async #loadOrCreateKey(): Promise<Buffer> {
    await fs.mkdir(this.#storageDir, { recursive: true, mode: 0o700 })
    const keyPath = path.join(this.#storageDir, KEY_FILE)
    try {
      return await fs.readFile(keyPath)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return this.#createKey(keyPath)
      }
      throw err
    }
  }

  async #createKey(keyPath: string): Promise<Buffer> {
    const key = crypto.randomBytes(GCM_KEY_BYTES)
    try {
      await fs.writeFile(keyPath, key, { mode: 0o600, flag: 'wx' })
      return key
    } catch (err) {
      // Another process created the key first; use theirs.
      if (isErrnoException(err) && err.code === 'EEXIST') {
        return fs.readFile(keyPath)
      }
      throw err
    }
  }
}
