/**
 * @dropkeys/test-helpers: Test utilities for dropkeys consumers.
 *
 * @packageDocumentation
 */

export { InMemoryHashStore } from './in-memory-hash-store.js'
export { FakeKeyEngine } from './fake-key-engine.js'
export type { FakeKey, AddKeyOptions, RecordedEncryption } from './fake-key-engine.js'
export { TestKeyring, TEST_JOURNALIST_FINGERPRINT } from './test-keyring.js'
export type { TestKeyringOptions } from './test-keyring.js'
