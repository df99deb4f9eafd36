import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryHashStore } from '../../src/index.js'

describe('InMemoryHashStore', () => {
  let store: InMemoryHashStore

  beforeEach(() => {
    store = new InMemoryHashStore()
  })

  it('should store and read a field', async () => {
    await store.hset('h', 'f', 'v')
    expect(await store.hget('h', 'f')).toBe('v')
  })

  it('should return null for a missing field', async () => {
    expect(await store.hget('h', 'missing')).toBeNull()
  })

  it('should keep hashes separate', async () => {
    await store.hset('a', 'f', '1')
    await store.hset('b', 'f', '2')
    expect(store.entries('a')).toEqual({ f: '1' })
    expect(store.entries('b')).toEqual({ f: '2' })
  })

  it('should delete a field and ignore missing ones', async () => {
    await store.hset('h', 'f', 'v')
    await store.hdel('h', 'f')
    await store.hdel('h', 'f')
    await store.hdel('other', 'f')
    expect(await store.hget('h', 'f')).toBeNull()
  })

  it('should report size across hashes and clear them', async () => {
    await store.hset('a', 'x', '1')
    await store.hset('b', 'y', '2')
    expect(store.size).toBe(2)
    store.clear()
    expect(store.size).toBe(0)
    expect(store.entries('a')).toEqual({})
  })
})
