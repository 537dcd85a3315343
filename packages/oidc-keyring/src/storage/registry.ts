/**
 * Registry for storage backend implementations.
 *
 * @remarks
 * The registry maintains a mapping of storage types to factory functions,
 * allowing a backend to be chosen from configuration.
 *
 * @packageDocumentation
 */

import * as path from 'node:path'
import type { StorageBackend, StorageFactory } from './types.js'
import type { StorageConfig } from '../types.js'
import { FileStorage } from './file-storage.js'
import { InvalidInputError } from '../errors.js'

/**
 * Registry for storage backend implementations.
 *
 * Note: This class is used as a namespace for static methods.
 * @public
 */
export class StorageRegistry {
  private static factories = new Map<string, StorageFactory>()

  /**
   * Register a storage factory, replacing any factory of the same type.
   */
  static register(type: string, factory: StorageFactory): void {
    this.factories.set(type, factory)
  }

  /**
   * Create a storage backend from configuration.
   * @throws {InvalidInputError} if the storage type is not registered
   */
  static create(config: StorageConfig): StorageBackend {
    const factory = this.factories.get(config.type)
    if (factory === undefined) {
      throw new InvalidInputError(
        `Unknown storage type: ${config.type}. ` +
          `Available types: ${Array.from(this.factories.keys()).join(', ')}`,
        'storage.type',
      )
    }
    return factory(config)
  }

  /** Get all registered storage type identifiers. */
  static getTypes(): string[] {
    return Array.from(this.factories.keys())
  }
}

StorageRegistry.register('file', (config) => {
  if (config.path === undefined) {
    throw new InvalidInputError('File storage requires storage.path', 'storage.path')
  }
  return new FileStorage(path.resolve(config.path))
})
