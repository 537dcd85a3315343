/**
 * Named key registry barrel export.
 */

export {
  NamedKeyRegistry,
  NAMED_KEY_PREFIX,
  DEFAULT_AUDIENCE,
  DEFAULT_RING_CAPACITY,
  DEFAULT_ROTATION_PERIOD,
} from './named-keys.js'
export type { NamedKeyRegistryOptions } from './named-keys.js'
export { requiredCapacity } from './validation.js'
