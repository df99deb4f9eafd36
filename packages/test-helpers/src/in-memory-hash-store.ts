/**
 * In-memory hash store for testing.
 */

import type { HashStore } from 'dropkeys'

/**
 * A fully in-memory `HashStore` for testing.
 *
 * @remarks
 * Hashes are plain nested `Map`s with no external dependencies. Suitable for
 * unit, integration, and e2e tests in place of Redis.
 *
 * @public
 */
export class InMemoryHashStore implements HashStore {
  readonly #hashes = new Map<string, Map<string, string>>()

  /** @public */
  hget(hash: string, field: string): Promise<string | null> {
    return Promise.resolve(this.#hashes.get(hash)?.get(field) ?? null)
  }

  /** @public */
  hset(hash: string, field: string, value: string): Promise<void> {
    let fields = this.#hashes.get(hash)
    if (fields === undefined) {
      fields = new Map()
      this.#hashes.set(hash, fields)
    }
    fields.set(field, value)
    return Promise.resolve()
  }

  /** @public */
  hdel(hash: string, field: string): Promise<void> {
    this.#hashes.get(hash)?.delete(field)
    return Promise.resolve()
  }

  /**
   * A copy of one hash's fields.
   * @public
   */
  entries(hash: string): Record<string, string> {
    return Object.fromEntries(this.#hashes.get(hash) ?? new Map<string, string>())
  }

  /**
   * Remove all hashes. Useful for test teardown.
   * @public
   */
  clear(): void {
    this.#hashes.clear()
  }

  /**
   * The number of fields across all hashes.
   * @public
   */
  get size(): number {
    let total = 0
    for (const fields of this.#hashes.values()) {
      total += fields.size
    }
    return total
  }
}
