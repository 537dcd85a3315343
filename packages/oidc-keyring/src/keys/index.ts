/**
 * Key management barrel export.
 *
 * @packageDocumentation
 */

export { KeyRing, MAX_RING_CAPACITY } from './ring.js'
export type { KeyRingOptions } from './ring.js'
export { RsaKeyGenerator } from './generator.js'
export type { RsaKeyGeneratorOptions } from './generator.js'
export type { GeneratedKey, KeyGenerator, KeyRingSnapshot, StoredKeyEntry } from './types.js'
