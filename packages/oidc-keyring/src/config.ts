/**
 * Configuration loading, validation, and defaults for oidc-keyring.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { parseDuration } from './duration.js'
import { MAX_RING_CAPACITY } from './keys/ring.js'
import { ConfigError, InvalidInputError } from './errors.js'
import { parseAlgorithm } from './registry/validation.js'
import type { OidcConfig, SigningAlgorithm, StorageConfig } from './types.js'
import { isObject } from './util/guards.js'

/** Name of the configuration file inside the config directory. */
export const CONFIG_FILE_NAME = 'config.json'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'oidc-keyring')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'oidc-keyring')
  }
  return path.join(os.homedir(), '.config', 'oidc-keyring')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): OidcConfig {
  return {
    version: 1,
    issuer: 'oidc-keyring',
    storage: { type: 'file' },
    keyRing: { capacity: 4 },
    defaults: {
      rotationPeriod: '6h',
      algorithm: 'RS256',
      audience: 'oidc-keyring',
      tokenTtl: '2m',
    },
    keyGeneration: { modulusLength: 2048, timeoutMs: 30_000 },
  }
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Config ${field} must be a non-empty string`)
  }
  return value
}

function requirePositiveInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Config ${field} must be a positive integer`)
  }
  return value
}

function requireDuration(value: unknown, field: string): string {
  const duration = requireString(value, field)
  try {
    parseDuration(duration, field)
  } catch (err) {
    if (err instanceof InvalidInputError) {
      throw new ConfigError(`Config ${field} is invalid: ${err.message}`)
    }
    throw err
  }
  return duration
}

function requireAlgorithm(value: unknown, field: string): SigningAlgorithm {
  try {
    return parseAlgorithm(requireString(value, field))
  } catch (err) {
    if (err instanceof InvalidInputError) {
      throw new ConfigError(`Config ${field} is invalid: ${err.message}`)
    }
    throw err
  }
}

function validateStorage(value: unknown): StorageConfig {
  if (!isObject(value)) {
    throw new ConfigError('Config storage must be an object')
  }
  const result: StorageConfig = { type: requireString(value.type, 'storage.type') }
  if (value.path !== undefined) {
    result.path = requireString(value.path, 'storage.path')
  }
  return result
}

/**
 * Validate an unknown value as an OidcConfig, throwing on invalid structure.
 * @throws {ConfigError} describing the first invalid member
 */
export function validateConfig(config: unknown): OidcConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  if (!isObject(config.keyRing)) {
    throw new ConfigError('Config keyRing must be an object')
  }
  if (!isObject(config.defaults)) {
    throw new ConfigError('Config defaults must be an object')
  }
  if (!isObject(config.keyGeneration)) {
    throw new ConfigError('Config keyGeneration must be an object')
  }

  const modulusLength = requirePositiveInteger(
    config.keyGeneration.modulusLength,
    'keyGeneration.modulusLength',
  )
  if (modulusLength < 2048) {
    throw new ConfigError('Config keyGeneration.modulusLength must be at least 2048')
  }
  const capacity = requirePositiveInteger(config.keyRing.capacity, 'keyRing.capacity')
  if (capacity > MAX_RING_CAPACITY) {
    throw new ConfigError(`Config keyRing.capacity must be at most ${String(MAX_RING_CAPACITY)}`)
  }

  return {
    version: 1,
    issuer: requireString(config.issuer, 'issuer'),
    storage: validateStorage(config.storage),
    keyRing: { capacity },
    defaults: {
      rotationPeriod: requireDuration(config.defaults.rotationPeriod, 'defaults.rotationPeriod'),
      algorithm: requireAlgorithm(config.defaults.algorithm, 'defaults.algorithm'),
      audience: requireString(config.defaults.audience, 'defaults.audience'),
      tokenTtl: requireDuration(config.defaults.tokenTtl, 'defaults.tokenTtl'),
    },
    keyGeneration: {
      modulusLength,
      timeoutMs: requirePositiveInteger(config.keyGeneration.timeoutMs, 'keyGeneration.timeoutMs'),
    },
  }
}

/**
 * Load the oidc-keyring config from disk, falling back to defaults if the
 * file does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 * @throws {ConfigError} if the file exists but cannot be parsed or validated
 */
export async function loadConfig(configDir?: string): Promise<OidcConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (err) {
    if (isObject(err) && err.code === 'ENOENT') {
      return defaultConfig()
    }
    throw new ConfigError(`Failed to read config file at ${configPath}`, configPath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath)
  }

  try {
    return validateConfig(parsed)
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(err.message, configPath)
    }
    throw err
  }
}

/**
 * Resolve where storage lives: the configured path, or `data` inside the
 * config directory.
 */
export function resolveStorageConfig(config: OidcConfig, configDir: string): StorageConfig {
  if (config.storage.type === 'file' && config.storage.path === undefined) {
    return { ...config.storage, path: path.join(configDir, 'data') }
  }
  return { ...config.storage }
}

/**
 * Write `config` to `config.json` in `configDir`, creating the directory.
 * @returns The path written
 */
export async function writeConfig(config: OidcConfig, configDir?: string): Promise<string> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)
  await fs.mkdir(dir, { recursive: true, mode: 0o700 })
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', { mode: 0o600 })
  return configPath
}
