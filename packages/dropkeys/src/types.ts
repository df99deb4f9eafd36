/**
 * Shared types and interfaces for dropkeys.
 */

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing' | 'version-unsupported'

/** Result of a preflight check for a single dependency. */
export interface PreflightCheck {
  /** Human-readable name of the dependency being checked. */
  name: string
  /** Whether the dependency was found and is a supported version. */
  status: PreflightCheckStatus
  /** The detected version string, if the dependency was found. */
  version?: string | undefined
  /** Human-readable explanation of why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results, one per dependency inspected. */
  checks: PreflightCheck[]
  /** `true` if all required checks passed and the system is ready. */
  ready: boolean
  /** Non-fatal advisory messages. */
  warnings: string[]
  /** Action items the user should complete before dropkeys will work. */
  nextSteps: string[]
}

/**
 * A source as seen by the key manager: an identity plus the passphrase that
 * unlocks its secret key.
 *
 * The passphrase is held by the caller for the duration of a request and is
 * never persisted by dropkeys.
 */
export interface SourceCredentials {
  /** Filesystem-safe identifier of the source. */
  identity: string
  /** Passphrase protecting the source's secret key. */
  passphrase: string
}

/** dropkeys configuration file structure. */
export interface DropkeysConfig {
  /** Config schema version. Currently must be `1`. */
  version: number
  /** Directory holding the engine's keyring. */
  gpgKeyDir: string
  /** Fingerprint of the journalist key every submission is encrypted to. */
  journalistKeyFingerprint: string
  /** Engine invocation settings. */
  gpg: GpgConfig
  /** Cache store settings. */
  cache: CacheConfig
}

/** Engine invocation settings. */
export interface GpgConfig {
  /** Engine binary name or path. */
  binary: string
  /** Value of `USERNAME` in the engine's environment. */
  username: string
}

/** Cache store settings. */
export interface CacheConfig {
  /** Redis connection URL. */
  url: string
  /** Prefix for the cache's hash names. */
  namespace: string
}
