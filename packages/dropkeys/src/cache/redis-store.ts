/**
 * Redis-backed cache store.
 */

import { Redis } from 'ioredis'
import { CacheUnavailableError } from '../errors.js'
import type { HashStore } from './types.js'

/**
 * {@link HashStore} on a Redis server, via ioredis.
 *
 * @remarks
 * The client reconnects on its own. Connection errors it emits meanwhile are
 * recorded; a command that then fails is reported as
 * {@link CacheUnavailableError} carrying the last of them.
 *
 * @public
 */
export class RedisHashStore implements HashStore {
  readonly #client: Redis
  #lastError: Error | undefined

  constructor(client: Redis) {
    this.#client = client
    this.#client.on('error', (err: Error) => {
      this.#lastError = err
    })
    this.#client.on('ready', () => {
      this.#lastError = undefined
    })
  }

  /**
   * Connect to the Redis server at `url` (e.g. `redis://localhost:6379`).
   */
  static connect(url: string): RedisHashStore {
    return new RedisHashStore(new Redis(url))
  }

  /** The last connection error since the client was last ready. */
  get lastError(): Error | undefined {
    return this.#lastError
  }

  hget(hash: string, field: string): Promise<string | null> {
    return this.#run(() => this.#client.hget(hash, field))
  }

  async hset(hash: string, field: string, value: string): Promise<void> {
    await this.#run(() => this.#client.hset(hash, field, value))
  }

  async hdel(hash: string, field: string): Promise<void> {
    await this.#run(() => this.#client.hdel(hash, field))
  }

  /** Close the connection once pending replies arrive. */
  async close(): Promise<void> {
    await this.#client.quit()
  }

  async #run<T>(command: () => Promise<T>): Promise<T> {
    try {
      return await command()
    } catch (err) {
      const connectionError = this.#lastError
      if (connectionError === undefined) {
        throw err
      }
      throw new CacheUnavailableError(
        `Cache store unavailable: ${connectionError.message}`,
        connectionError,
      )
    }
  }
}
