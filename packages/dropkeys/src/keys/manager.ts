/**
 * Source key lifecycle and encryption orchestration.
 */

import type { DropkeysConfig, SourceCredentials } from '../types.js'
import type { EngineInput, KeyEngine } from '../engine/types.js'
import { GpgEngine } from '../engine/gpg-engine.js'
import type { HashStore } from '../cache/types.js'
import { FingerprintCache } from '../cache/fingerprint-cache.js'
import { ConfigurationError, KeyNotFoundError, ReplyDecodeError } from '../errors.js'

/** Options for {@link KeyManager.create}. */
export interface KeyManagerOptions {
  /** Fingerprint of the journalist key. Must already be in the engine's keyring. */
  journalistKeyFingerprint: string
  /** The engine performing key operations. */
  engine: KeyEngine
  /** Cache store for fingerprints and public keys. */
  store: HashStore
  /** Prefix for the cache's hash names. */
  cacheNamespace?: string | undefined
}

/**
 * Manages source key pairs and mediates every encryption and decryption
 * between sources and the journalist key.
 *
 * @remarks
 * Construct one per application with {@link KeyManager.create} and pass it
 * to whatever needs it. Calls are independent of each other; there is no
 * locking, so concurrent generation or deletion for the same identity races
 * (the engine remains the source of truth). Nothing is retried.
 *
 * @public
 */
export class KeyManager {
  readonly #journalistKeyFingerprint: string
  readonly #engine: KeyEngine
  readonly #cache: FingerprintCache

  private constructor(journalistKeyFingerprint: string, engine: KeyEngine, cache: FingerprintCache) {
    this.#journalistKeyFingerprint = journalistKeyFingerprint
    this.#engine = engine
    this.#cache = cache
  }

  /**
   * Create a manager, verifying that the journalist public key is present.
   * @throws {@link ConfigurationError} if the journalist key is not in the keyring
   */
  static async create(options: KeyManagerOptions): Promise<KeyManager> {
    const cache = new FingerprintCache(options.store, options.cacheNamespace)
    const manager = new KeyManager(options.journalistKeyFingerprint, options.engine, cache)

    try {
      await manager.getJournalistPublicKey()
    } catch (err) {
      if (err instanceof KeyNotFoundError) {
        throw new ConfigurationError(
          `The journalist public key with fingerprint ${options.journalistKeyFingerprint}` +
            ' has not been imported into the keyring.',
          'journalistKeyFingerprint',
        )
      }
      throw err
    }

    return manager
  }

  /**
   * Create a manager from a loaded config, with a GnuPG engine over the
   * configured keyring.
   */
  static async fromConfig(config: DropkeysConfig, store: HashStore): Promise<KeyManager> {
    const engine = await GpgEngine.init({
      homedir: config.gpgKeyDir,
      binary: config.gpg.binary,
      username: config.gpg.username,
    })
    return KeyManager.create({
      journalistKeyFingerprint: config.journalistKeyFingerprint,
      engine,
      store,
      cacheNamespace: config.cache.namespace,
    })
  }

  /** The configured journalist key fingerprint. */
  get journalistKeyFingerprint(): string {
    return this.#journalistKeyFingerprint
  }

  /**
   * Generate a key pair for a source and cache its fingerprint.
   *
   * @remarks
   * If the cache write fails the key still exists in the engine; it stays
   * reachable through the slow lookup path.
   *
   * @returns The new key's fingerprint
   */
  async generateSourceKeyPair(source: SourceCredentials): Promise<string> {
    const fingerprint = await this.#engine.generateKeyPair({
      identity: source.identity,
      passphrase: source.passphrase,
    })
    await this.#cache.setFingerprint(source.identity, fingerprint)
    return fingerprint
  }

  /**
   * Delete a source's key pair, then drop both cache entries. If the engine
   * refuses, the cache is left as it was.
   * @throws {@link KeyNotFoundError} if the source has no key
   */
  async deleteSourceKeyPair(identity: string): Promise<void> {
    const fingerprint = await this.getSourceKeyFingerprint(identity)
    await this.#engine.deleteKeyPair(fingerprint)
    await this.#cache.invalidate(identity, fingerprint)
  }

  /** The journalist's armored public key. */
  getJournalistPublicKey(): Promise<string> {
    return this.#getPublicKey(this.#journalistKeyFingerprint)
  }

  /**
   * A source's armored public key.
   * @throws {@link KeyNotFoundError} if the source has no key
   */
  async getSourcePublicKey(identity: string): Promise<string> {
    const fingerprint = await this.getSourceKeyFingerprint(identity)
    return this.#getPublicKey(fingerprint)
  }

  /**
   * A source's key fingerprint, from the cache or, on a miss, from a scan of
   * the keyring.
   * @throws {@link KeyNotFoundError} if the source has no key
   */
  getSourceKeyFingerprint(identity: string): Promise<string> {
    return this.#cache.fingerprintFor(identity, () => this.#engine.findKeyFingerprint(identity))
  }

  /**
   * Drop a source's cache entries and resolve its fingerprint from the engine
   * again. Use after a key was changed outside dropkeys.
   * @throws {@link KeyNotFoundError} if the engine has no key for the source
   */
  async refreshSourceKey(identity: string): Promise<string> {
    const cached = await this.#cache.getFingerprint(identity)
    if (cached !== undefined) {
      await this.#cache.invalidate(identity, cached)
    }
    return this.getSourceKeyFingerprint(identity)
  }

  /** Encrypt a source's text submission for the journalist only. */
  async encryptSourceMessage(message: string, outputPath: string): Promise<void> {
    await this.#engine.encrypt({
      recipients: [this.#journalistKeyFingerprint],
      plaintext: message,
      outputPath,
    })
  }

  /** Encrypt a source's file submission for the journalist only. */
  async encryptSourceFile(file: EngineInput, outputPath: string): Promise<void> {
    await this.#engine.encrypt({
      recipients: [this.#journalistKeyFingerprint],
      plaintext: file,
      outputPath,
    })
  }

  /**
   * Encrypt a journalist's reply for both the source and the journalist.
   * @throws {@link KeyNotFoundError} if the source has no key
   */
  async encryptJournalistReply(identity: string, reply: string, outputPath: string): Promise<void> {
    const sourceFingerprint = await this.getSourceKeyFingerprint(identity)
    await this.#engine.encrypt({
      recipients: [sourceFingerprint, this.#journalistKeyFingerprint],
      plaintext: reply,
      outputPath,
    })
  }

  /**
   * Decrypt a reply with the source's passphrase.
   * @throws {@link ReplyDecodeError} if the plaintext is not UTF-8
   */
  async decryptJournalistReply(source: SourceCredentials, ciphertext: EngineInput): Promise<string> {
    const plaintext = await this.#engine.decrypt(ciphertext, source.passphrase)
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(plaintext)
    } catch {
      throw new ReplyDecodeError('Decrypted reply is not valid UTF-8')
    }
  }

  #getPublicKey(fingerprint: string): Promise<string> {
    return this.#cache.publicKeyFor(fingerprint, () => this.#engine.exportPublicKey(fingerprint))
  }
}
