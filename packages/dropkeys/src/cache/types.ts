/**
 * Cache store abstraction types for dropkeys.
 */

/**
 * Hash-map operations dropkeys needs from its cache store.
 *
 * @remarks
 * Each operation is assumed atomic per field. There is no cross-field
 * transaction.
 *
 * @public
 */
export interface HashStore {
  /**
   * Read a field of a hash.
   * @returns The stored value, or `null` if the field is not set
   */
  hget(hash: string, field: string): Promise<string | null>

  /** Set a field of a hash, replacing any existing value. */
  hset(hash: string, field: string, value: string): Promise<void>

  /** Remove a field of a hash. Removing an absent field is not an error. */
  hdel(hash: string, field: string): Promise<void>
}
