/**
 * Public key publisher barrel export.
 */

export { PublicKeyPublisher, PUBLIC_KEYS_PATH, isVerifiable } from './publisher.js'
export type { PublicKeyPublisherOptions } from './publisher.js'
