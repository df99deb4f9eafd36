/**
 * Engine barrel export.
 */

export { GpgEngine, DEFAULT_GPG_BINARY, DEFAULT_GPG_USERNAME, parseColonListing } from './gpg-engine.js'
export type { GpgEngineOptions, ListedKey } from './gpg-engine.js'
export { GpgHandle } from './handle.js'
export type { GpgHandleOptions } from './handle.js'
export { parseStatusOutput, readStatus } from './status.js'
export type { StatusLine, ParsedStatus, EngineOperation } from './status.js'
export {
  SOURCE_KEY_TYPE,
  SOURCE_KEY_LENGTH,
  SOURCE_KEY_CREATION_DATE,
  SOURCE_KEY_EXPIRATION_DATE,
  SOURCE_KEY_NAME,
  SOURCE_KEY_UID_RE,
  compactFingerprint,
} from './types.js'
export type { KeyEngine, EncryptRequest, EngineInput, KeyGenerationRequest } from './types.js'
