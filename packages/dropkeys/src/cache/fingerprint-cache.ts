/**
 * Two-table cache of source fingerprints and exported public keys.
 *
 * @remarks
 * Listing keys in the engine scans every key in the keyring, so the manager
 * caches identity → fingerprint and fingerprint → public key. Reads go
 * through the cache, fall back to the engine on a miss, and write the result
 * back. Entries never expire; they are removed only when a key is deleted
 * through dropkeys. A key deleted behind dropkeys' back leaves a stale entry
 * until {@link FingerprintCache.invalidate} is called for it.
 */

import type { HashStore } from './types.js'

/** Default namespace for the cache hashes. */
export const DEFAULT_CACHE_NAMESPACE = 'dropkeys'

/**
 * Cache of identity → fingerprint and fingerprint → public key.
 * @public
 */
export class FingerprintCache {
  /** Hash holding identity → fingerprint. */
  readonly fingerprintHash: string
  /** Hash holding fingerprint → armored public key. */
  readonly publicKeyHash: string
  readonly #store: HashStore

  constructor(store: HashStore, namespace: string = DEFAULT_CACHE_NAMESPACE) {
    this.#store = store
    this.fingerprintHash = `${namespace}/fingerprints`
    this.publicKeyHash = `${namespace}/keys`
  }

  /** The cached fingerprint for an identity, if any. */
  getFingerprint(identity: string): Promise<string | undefined> {
    return this.#read(this.fingerprintHash, identity)
  }

  /** Record the fingerprint of an identity's key. */
  setFingerprint(identity: string, fingerprint: string): Promise<void> {
    return this.#store.hset(this.fingerprintHash, identity, fingerprint)
  }

  /** The cached public key for a fingerprint, if any. */
  getPublicKey(fingerprint: string): Promise<string | undefined> {
    return this.#read(this.publicKeyHash, fingerprint)
  }

  /** Record the exported public key of a fingerprint. */
  setPublicKey(fingerprint: string, publicKey: string): Promise<void> {
    return this.#store.hset(this.publicKeyHash, fingerprint, publicKey)
  }

  /**
   * Return the identity's fingerprint from the cache, or from `load` on a
   * miss, writing the loaded value back.
   */
  async fingerprintFor(identity: string, load: () => Promise<string>): Promise<string> {
    const cached = await this.getFingerprint(identity)
    if (cached !== undefined) {
      return cached
    }
    const fingerprint = await load()
    await this.setFingerprint(identity, fingerprint)
    return fingerprint
  }

  /**
   * Return the fingerprint's public key from the cache, or from `load` on a
   * miss, writing the loaded value back.
   */
  async publicKeyFor(fingerprint: string, load: () => Promise<string>): Promise<string> {
    const cached = await this.getPublicKey(fingerprint)
    if (cached !== undefined) {
      return cached
    }
    const publicKey = await load()
    await this.setPublicKey(fingerprint, publicKey)
    return publicKey
  }

  /**
   * Remove both entries for a key. Entries that are already absent are
   * ignored.
   */
  async invalidate(identity: string, fingerprint: string): Promise<void> {
    await this.#store.hdel(this.publicKeyHash, fingerprint)
    await this.#store.hdel(this.fingerprintHash, identity)
  }

  async #read(hash: string, field: string): Promise<string | undefined> {
    const value = await this.#store.hget(hash, field)
    // An empty value is treated as a miss.
    return value === null || value === '' ? undefined : value
  }
}
