/**
 * dropkeys: Source key lifecycle and encryption in front of GnuPG.
 *
 * @packageDocumentation
 */

export {
  KeyringError,
  KeyNotFoundError,
  EncryptError,
  DecryptError,
  ReplyDecodeError,
  EngineError,
  EngineStatusError,
  ConfigurationError,
  CacheUnavailableError,
} from './errors.js'

export type {
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
  SourceCredentials,
  DropkeysConfig,
  GpgConfig,
  CacheConfig,
} from './types.js'

export type { KeyEngine, EncryptRequest, EngineInput, KeyGenerationRequest } from './engine/index.js'
export type { GpgEngineOptions, ListedKey } from './engine/index.js'
export {
  GpgEngine,
  DEFAULT_GPG_BINARY,
  DEFAULT_GPG_USERNAME,
  SOURCE_KEY_TYPE,
  SOURCE_KEY_LENGTH,
  SOURCE_KEY_CREATION_DATE,
  SOURCE_KEY_EXPIRATION_DATE,
  SOURCE_KEY_NAME,
  SOURCE_KEY_UID_RE,
  compactFingerprint,
} from './engine/index.js'

export type { HashStore } from './cache/index.js'
export { FingerprintCache, RedisHashStore, DEFAULT_CACHE_NAMESPACE } from './cache/index.js'

export { KeyManager } from './keys/index.js'
export type { KeyManagerOptions } from './keys/index.js'

export { runDoctor, checkGpg, checkGpgAgent } from './doctor/index.js'
export type { RunDoctorOptions } from './doctor/index.js'

export { loadConfig, getDefaultConfigDir, validateConfig, DEFAULT_CACHE_URL } from './config.js'
