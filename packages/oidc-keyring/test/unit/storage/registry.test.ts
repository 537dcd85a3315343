import { describe, it, expect } from 'vitest'
import * as path from 'node:path'
import { StorageRegistry } from '../../../src/storage/registry.js'
import { FileStorage } from '../../../src/storage/file-storage.js'
import { InvalidInputError } from '../../../src/errors.js'
import { MemoryStorage } from '../../helpers/storage.js'

describe('StorageRegistry', () => {
  it('builds file storage from a path', () => {
    const storage = StorageRegistry.create({ type: 'file', path: 'relative/data' })
    expect(storage).toBeInstanceOf(FileStorage)
    if (storage instanceof FileStorage) {
      expect(storage.directory).toBe(path.resolve('relative/data'))
    }
  })

  it('requires a path for file storage', () => {
    expect(() => StorageRegistry.create({ type: 'file' })).toThrow(
      new InvalidInputError('File storage requires storage.path', 'storage.path'),
    )
  })

  it('uses registered factories', () => {
    const storage = new MemoryStorage()
    StorageRegistry.register('memory', () => storage)

    expect(StorageRegistry.create({ type: 'memory' })).toBe(storage)
    expect(StorageRegistry.getTypes()).toContain('memory')
  })

  it('names the available types for an unknown type', () => {
    try {
      StorageRegistry.create({ type: 'vault' })
      expect.unreachable('create should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError)
      if (err instanceof InvalidInputError) {
        expect(err.field).toBe('storage.type')
        expect(err.message).toMatch(/^Unknown storage type: vault\. Available types: file/)
      }
    }
  })
})
