import { describe, it, expect, vi, beforeEach } from 'vitest'
import { FingerprintCache } from '../../../src/cache/fingerprint-cache.js'
import { createInMemoryStore } from '../../helpers/store.js'
import type { InMemoryStore } from '../../helpers/store.js'

describe('FingerprintCache', () => {
  let store: InMemoryStore
  let cache: FingerprintCache

  beforeEach(() => {
    store = createInMemoryStore()
    cache = new FingerprintCache(store)
  })

  it('names its hashes after the namespace', () => {
    expect(cache.fingerprintHash).toBe('dropkeys/fingerprints')
    expect(cache.publicKeyHash).toBe('dropkeys/keys')
    const custom = new FingerprintCache(store, 'newsroom')
    expect(custom.fingerprintHash).toBe('newsroom/fingerprints')
    expect(custom.publicKeyHash).toBe('newsroom/keys')
  })

  it('stores fingerprints and public keys in separate hashes', async () => {
    await cache.setFingerprint('source-a', 'AAAA')
    await cache.setPublicKey('AAAA', 'PUBLIC KEY AAAA')
    expect(store.hashes.get('dropkeys/fingerprints')?.get('source-a')).toBe('AAAA')
    expect(store.hashes.get('dropkeys/keys')?.get('AAAA')).toBe('PUBLIC KEY AAAA')
  })

  it('treats an absent or empty value as a miss', async () => {
    expect(await cache.getFingerprint('source-a')).toBeUndefined()
    await store.hset('dropkeys/fingerprints', 'source-a', '')
    expect(await cache.getFingerprint('source-a')).toBeUndefined()
  })

  describe('fingerprintFor', () => {
    it('loads and writes back on a miss', async () => {
      const load = vi.fn(() => Promise.resolve('AAAA'))
      expect(await cache.fingerprintFor('source-a', load)).toBe('AAAA')
      expect(load).toHaveBeenCalledTimes(1)
      expect(await cache.getFingerprint('source-a')).toBe('AAAA')
    })

    it('serves a hit without loading', async () => {
      await cache.setFingerprint('source-a', 'AAAA')
      const load = vi.fn(() => Promise.reject(new Error('should not load')))
      expect(await cache.fingerprintFor('source-a', load)).toBe('AAAA')
      expect(load).not.toHaveBeenCalled()
    })

    it('writes nothing when loading fails', async () => {
      const load = vi.fn(() => Promise.reject(new Error('no key')))
      await expect(cache.fingerprintFor('source-a', load)).rejects.toThrow('no key')
      expect(await cache.getFingerprint('source-a')).toBeUndefined()
    })
  })

  describe('publicKeyFor', () => {
    it('loads once and serves later reads from the cache', async () => {
      const load = vi.fn(() => Promise.resolve('PUBLIC KEY AAAA'))
      expect(await cache.publicKeyFor('AAAA', load)).toBe('PUBLIC KEY AAAA')
      expect(await cache.publicKeyFor('AAAA', load)).toBe('PUBLIC KEY AAAA')
      expect(load).toHaveBeenCalledTimes(1)
    })
  })

  describe('invalidate', () => {
    it('removes both entries', async () => {
      await cache.setFingerprint('source-a', 'AAAA')
      await cache.setPublicKey('AAAA', 'PUBLIC KEY AAAA')
      await cache.invalidate('source-a', 'AAAA')
      expect(await cache.getFingerprint('source-a')).toBeUndefined()
      expect(await cache.getPublicKey('AAAA')).toBeUndefined()
    })

    it('ignores entries that are already absent', async () => {
      await expect(cache.invalidate('source-a', 'AAAA')).resolves.toBeUndefined()
    })

    it('leaves other identities alone', async () => {
      await cache.setFingerprint('source-a', 'AAAA')
      await cache.setFingerprint('source-b', 'BBBB')
      await cache.invalidate('source-a', 'AAAA')
      expect(await cache.getFingerprint('source-b')).toBe('BBBB')
    })
  })
})
