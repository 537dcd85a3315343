import { OidcError, StorageError } from '../errors.js'

/**
 * Run a storage call, surfacing foreign failures as {@link StorageError}.
 * Errors already in the oidc-keyring hierarchy pass through unchanged.
 * @internal
 */
export async function guardStorage<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (err) {
    if (err instanceof OidcError) {
      throw err
    }
    throw new StorageError(`Storage operation failed: ${operation}`, operation, { cause: err })
  }
}
