/**
 * Configuration loading, validation, and defaults for dropkeys.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import type { DropkeysConfig, GpgConfig, CacheConfig } from './types.js'
import { ConfigurationError } from './errors.js'
import { DEFAULT_GPG_BINARY, DEFAULT_GPG_USERNAME } from './engine/gpg-engine.js'
import { DEFAULT_CACHE_NAMESPACE } from './cache/fingerprint-cache.js'

/** Default Redis URL for the cache store. */
export const DEFAULT_CACHE_URL = 'redis://localhost:6379'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'dropkeys')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'dropkeys')
  }
  return path.join(os.homedir(), '.config', 'dropkeys')
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Config ${field} must be a non-empty string`)
  }
  return value
}

function optionalString(value: unknown, field: string, fallback: string): string {
  if (value === undefined) {
    return fallback
  }
  return requireString(value, field)
}

/**
 * Validates the optional `gpg` section.
 */
function validateGpgSection(section: unknown): GpgConfig {
  if (section === undefined) {
    return { binary: DEFAULT_GPG_BINARY, username: DEFAULT_GPG_USERNAME }
  }
  if (!isObject(section)) {
    throw new Error('Config gpg must be an object')
  }
  return {
    binary: optionalString(section.binary, 'gpg.binary', DEFAULT_GPG_BINARY),
    username: optionalString(section.username, 'gpg.username', DEFAULT_GPG_USERNAME),
  }
}

/**
 * Validates the optional `cache` section.
 */
function validateCacheSection(section: unknown): CacheConfig {
  if (section === undefined) {
    return { url: DEFAULT_CACHE_URL, namespace: DEFAULT_CACHE_NAMESPACE }
  }
  if (!isObject(section)) {
    throw new Error('Config cache must be an object')
  }
  return {
    url: optionalString(section.url, 'cache.url', DEFAULT_CACHE_URL),
    namespace: optionalString(section.namespace, 'cache.namespace', DEFAULT_CACHE_NAMESPACE),
  }
}

/**
 * Validate an unknown value as a DropkeysConfig, throwing on invalid structure.
 */
export function validateConfig(config: unknown): DropkeysConfig {
  if (!isObject(config)) {
    throw new Error('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new Error('Config version must be 1')
  }

  const gpgKeyDir = requireString(config.gpgKeyDir, 'gpgKeyDir')
  const journalistKeyFingerprint = requireString(
    config.journalistKeyFingerprint,
    'journalistKeyFingerprint',
  )
  if (!/^[0-9A-Fa-f ]+$/.test(journalistKeyFingerprint)) {
    throw new Error('Config journalistKeyFingerprint must be a hexadecimal fingerprint')
  }

  return {
    version: 1,
    gpgKeyDir,
    journalistKeyFingerprint,
    gpg: validateGpgSection(config.gpg),
    cache: validateCacheSection(config.cache),
  }
}

/**
 * Load the dropkeys config from disk.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 * @throws {@link ConfigurationError} if no config file exists
 */
export async function loadConfig(configDir?: string): Promise<DropkeysConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    throw new ConfigurationError(`No config file found at ${configPath}`, 'configDir')
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Failed to parse config file at ${configPath}`)
  }

  return validateConfig(parsed)
}
