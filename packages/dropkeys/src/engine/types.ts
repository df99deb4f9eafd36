/**
 * Engine abstraction layer types for dropkeys.
 */

import type { ExecInput } from '../util/exec.js'

/**
 * Plaintext or ciphertext handed to the engine: text, bytes, or a readable
 * stream (e.g. an uploaded file).
 * @public
 */
export type EngineInput = ExecInput

/**
 * A request to encrypt data for one or more recipients.
 * @public
 */
export interface EncryptRequest {
  /**
   * Recipient key fingerprints. Spaces are permitted and stripped before the
   * engine sees them.
   */
  recipients: string[]
  /** The data to encrypt. */
  plaintext: EngineInput
  /**
   * Path the engine writes the ciphertext to. When omitted the ciphertext is
   * returned instead.
   */
  outputPath?: string | undefined
}

/**
 * A request to generate a source key pair.
 * @public
 */
export interface KeyGenerationRequest {
  /** The source identity; becomes the e-mail part of the key's user ID. */
  identity: string
  /** Passphrase protecting the secret key. Never persisted by dropkeys. */
  passphrase: string
}

/**
 * Abstraction over the external OpenPGP engine.
 *
 * @remarks
 * Every method corresponds to one (or, for listing, a scan over all) engine
 * invocations. Implementations never retry; every failure is surfaced.
 *
 * @public
 */
export interface KeyEngine {
  /**
   * Encrypt for every recipient, trusting them unconditionally, producing
   * binary (non-armored) output.
   * @returns The ciphertext, or an empty buffer when `outputPath` was given
   * @throws EncryptError if the engine reports failure
   */
  encrypt(request: EncryptRequest): Promise<Buffer>

  /**
   * Decrypt with the secret key unlocked by `passphrase`.
   * @throws DecryptError if the engine reports failure
   */
  decrypt(ciphertext: EngineInput, passphrase: string): Promise<Buffer>

  /**
   * Generate a key pair for a source identity.
   * @returns The new key's fingerprint
   * @throws EngineError if generation fails
   */
  generateKeyPair(request: KeyGenerationRequest): Promise<string>

  /**
   * Delete the secret key, public key and subkeys for a fingerprint.
   * @throws KeyNotFoundError if the engine has no such key
   */
  deleteKeyPair(fingerprint: string): Promise<void>

  /**
   * Scan every key in the keyring for a source user ID matching `identity`.
   * @throws KeyNotFoundError if no key matches
   */
  findKeyFingerprint(identity: string): Promise<string>

  /**
   * Export the ASCII-armored public key for a fingerprint.
   * @throws KeyNotFoundError if the engine has no such key
   */
  exportPublicKey(fingerprint: string): Promise<string>
}

/** Key algorithm used for every source key. */
export const SOURCE_KEY_TYPE = 'RSA'

/** Key size used for every source key. */
export const SOURCE_KEY_LENGTH = 4096

/**
 * Creation date stamped on every source key, so that keys do not reveal when
 * a source first appeared.
 */
export const SOURCE_KEY_CREATION_DATE = '2013-05-14'

/** `0` tells batch key generation to set no expiration date. */
export const SOURCE_KEY_EXPIRATION_DATE = '0'

/** Real-name part of the user ID on generated source keys. */
export const SOURCE_KEY_NAME = 'Source Key'

/** User IDs that identify a source key, old and new naming. */
export const SOURCE_KEY_UID_RE = /^(Source|Autogenerated) Key <([-A-Za-z0-9+/=_]+)>/

/**
 * Remove the spaces the engine inserts into fingerprints for readability.
 * The engine only accepts the compact form when selecting keys.
 */
export function compactFingerprint(fingerprint: string): string {
  return fingerprint.replace(/ /g, '')
}
