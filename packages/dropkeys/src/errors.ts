/**
 * Error hierarchy for dropkeys.
 *
 * @packageDocumentation
 */

/** Base error for all dropkeys errors. */
export class KeyringError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'KeyringError'
  }
}

// --- Lookup Failures ---

/**
 * Thrown when a key pair cannot be found, either because the engine has no
 * key with the requested fingerprint or because no key's user ID matches the
 * requested source identity.
 */
export class KeyNotFoundError extends KeyringError {
  constructor(message: string) {
    super(message)
    this.name = 'KeyNotFoundError'
  }
}

// --- Engine Operation Failures ---

/**
 * Thrown when the engine refuses or fails to encrypt (for example an unknown
 * recipient fingerprint, or the engine process crashing).
 */
export class EncryptError extends KeyringError {
  /**
   * Diagnostic text reported by the engine, verbatim.
   */
  readonly diagnostics: string

  constructor(message: string, diagnostics: string) {
    super(message)
    this.name = 'EncryptError'
    this.diagnostics = diagnostics
  }
}

/**
 * Thrown when the engine refuses or fails to decrypt (wrong passphrase,
 * corrupt ciphertext, unsupported algorithm).
 */
export class DecryptError extends KeyringError {
  /**
   * Diagnostic text reported by the engine, verbatim.
   */
  readonly diagnostics: string

  constructor(message: string, diagnostics: string) {
    super(message)
    this.name = 'DecryptError'
    this.diagnostics = diagnostics
  }
}

/**
 * Thrown when a reply decrypted successfully but the plaintext is not valid
 * UTF-8. Distinct from {@link DecryptError}: the engine did its job.
 */
export class ReplyDecodeError extends KeyringError {
  constructor(message: string) {
    super(message)
    this.name = 'ReplyDecodeError'
  }
}

/**
 * Thrown when an engine invocation other than encrypt/decrypt fails, such as
 * key generation running out of entropy or a key listing that exits non-zero.
 */
export class EngineError extends KeyringError {
  /**
   * The adapter operation that was running (e.g. `'generate'`, `'list'`).
   */
  readonly operation: string

  /**
   * Diagnostic text reported by the engine, verbatim.
   */
  readonly diagnostics: string

  constructor(message: string, operation: string, diagnostics: string) {
    super(message)
    this.name = 'EngineError'
    this.operation = operation
    this.diagnostics = diagnostics
  }
}

/**
 * Thrown when the engine emits a status keyword the adapter does not
 * recognize for the running operation.
 */
export class EngineStatusError extends KeyringError {
  /**
   * The unrecognized status keyword, e.g. `'NEW_UNKNOWN_STATUS'`.
   */
  readonly keyword: string

  /**
   * The adapter operation whose status stream contained the keyword.
   */
  readonly operation: string

  constructor(message: string, keyword: string, operation: string) {
    super(message)
    this.name = 'EngineStatusError'
    this.keyword = keyword
    this.operation = operation
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when a cache store command fails while the store cannot reach its
 * server.
 */
export class CacheUnavailableError extends KeyringError {
  /**
   * The most recent connection error reported by the store client.
   */
  readonly connectionError: Error

  constructor(message: string, connectionError: Error) {
    super(message)
    this.name = 'CacheUnavailableError'
    this.connectionError = connectionError
  }
}

/**
 * Thrown at construction time when the environment is misconfigured, most
 * notably when the journalist public key has not been imported into the
 * engine's keyring. Not recoverable at runtime.
 */
export class ConfigurationError extends KeyringError {
  /**
   * The configuration setting at fault (e.g. `'journalistKeyFingerprint'`).
   */
  readonly setting: string

  constructor(message: string, setting: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.setting = setting
  }
}
