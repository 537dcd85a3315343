/**
 * Storage barrel export.
 */

export type { StorageBackend, StorageFactory } from './types.js'
export { FileStorage } from './file-storage.js'
export { StorageRegistry } from './registry.js'
