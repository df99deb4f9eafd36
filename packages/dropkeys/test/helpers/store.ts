/**
 * Shared test helpers for the cache store and engine.
 */

import { vi } from 'vitest'
import type { Mock } from 'vitest'
import type { HashStore } from '../../src/cache/types.js'
import type { KeyEngine } from '../../src/engine/types.js'

/** A `HashStore` over nested maps, exposing the maps for assertions. */
export interface InMemoryStore extends HashStore {
  hashes: Map<string, Map<string, string>>
}

/**
 * Create a fully in-memory `HashStore` suitable for unit tests.
 * The returned store has no external dependencies and starts empty.
 */
export function createInMemoryStore(): InMemoryStore {
  const hashes = new Map<string, Map<string, string>>()
  return {
    hashes,
    hget: (hash: string, field: string) => Promise.resolve(hashes.get(hash)?.get(field) ?? null),
    hset: (hash: string, field: string, value: string) => {
      const fields = hashes.get(hash) ?? new Map<string, string>()
      fields.set(field, value)
      hashes.set(hash, fields)
      return Promise.resolve()
    },
    hdel: (hash: string, field: string) => {
      hashes.get(hash)?.delete(field)
      return Promise.resolve()
    },
  }
}

/** A `KeyEngine` whose methods are all `vi.fn()` mocks. */
export interface MockEngine extends KeyEngine {
  encrypt: Mock<KeyEngine['encrypt']>
  decrypt: Mock<KeyEngine['decrypt']>
  generateKeyPair: Mock<KeyEngine['generateKeyPair']>
  deleteKeyPair: Mock<KeyEngine['deleteKeyPair']>
  findKeyFingerprint: Mock<KeyEngine['findKeyFingerprint']>
  exportPublicKey: Mock<KeyEngine['exportPublicKey']>
}

/**
 * Create a `KeyEngine` with mocked methods. `exportPublicKey` returns an
 * armored placeholder naming the fingerprint; `encrypt` returns an empty
 * buffer. Everything else must be stubbed per test.
 */
export function createMockEngine(): MockEngine {
  return {
    encrypt: vi.fn<KeyEngine['encrypt']>().mockResolvedValue(Buffer.alloc(0)),
    decrypt: vi.fn<KeyEngine['decrypt']>(),
    generateKeyPair: vi.fn<KeyEngine['generateKeyPair']>(),
    deleteKeyPair: vi.fn<KeyEngine['deleteKeyPair']>().mockResolvedValue(undefined),
    findKeyFingerprint: vi.fn<KeyEngine['findKeyFingerprint']>(),
    exportPublicKey: vi
      .fn<KeyEngine['exportPublicKey']>()
      .mockImplementation((fingerprint) => Promise.resolve(`PUBLIC KEY ${fingerprint}`)),
  }
}
