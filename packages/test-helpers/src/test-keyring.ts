/**
 * Pre-configured KeyManager for consumer tests.
 */

import { KeyManager } from 'dropkeys'
import { FakeKeyEngine } from './fake-key-engine.js'
import { InMemoryHashStore } from './in-memory-hash-store.js'

/** Fingerprint of the journalist key a {@link TestKeyring} starts with. */
export const TEST_JOURNALIST_FINGERPRINT = '65A1B5FF195B56353CC63DFFCC40EF1228271441'

/**
 * Options for creating a {@link TestKeyring}.
 * @public
 */
export interface TestKeyringOptions {
  /** Override the journalist key fingerprint. */
  journalistKeyFingerprint?: string | undefined
  /** Passphrase for the journalist's secret key. */
  journalistPassphrase?: string | undefined
}

/**
 * A key manager wired to in-process fakes, for consumer test workflows.
 *
 * @remarks
 * `TestKeyring` wraps a real `KeyManager` over a {@link FakeKeyEngine} that
 * already holds the journalist key and an {@link InMemoryHashStore} in place
 * of Redis.
 *
 * @example
 * ```ts
 * const keyring = await TestKeyring.create()
 * await keyring.manager.generateSourceKeyPair({ identity: 'source-1', passphrase: 'test-secret' })
 * ```
 *
 * @public
 */
export class TestKeyring {
  /** The underlying KeyManager instance. */
  readonly manager: KeyManager

  /** The fake engine behind the manager. */
  readonly engine: FakeKeyEngine

  /** The in-memory cache store used by the manager. */
  readonly store: InMemoryHashStore

  private constructor(manager: KeyManager, engine: FakeKeyEngine, store: InMemoryHashStore) {
    this.manager = manager
    this.engine = engine
    this.store = store
  }

  /**
   * Create a new TestKeyring, ready for use.
   * @public
   */
  static async create(options?: TestKeyringOptions): Promise<TestKeyring> {
    const journalistKeyFingerprint =
      options?.journalistKeyFingerprint ?? TEST_JOURNALIST_FINGERPRINT
    const engine = new FakeKeyEngine()
    engine.addKey({
      fingerprint: journalistKeyFingerprint,
      uid: 'Journalist <journalist@example.org>',
      passphrase: options?.journalistPassphrase ?? 'journalist-secret',
    })
    const store = new InMemoryHashStore()
    const manager = await KeyManager.create({ journalistKeyFingerprint, engine, store })
    return new TestKeyring(manager, engine, store)
  }

  /**
   * Clear the cache store. The engine's keyring is left as it is.
   * @public
   */
  reset(): void {
    this.store.clear()
  }
}
