/**
 * Builds a KeyManager from the on-disk config for the duration of a command.
 *
 * @internal
 */

import { KeyManager, RedisHashStore, loadConfig } from 'dropkeys'

/**
 * Load config, connect the cache store, build a manager, run `fn`, and close
 * the cache connection whether or not `fn` succeeds.
 *
 * @internal
 */
export async function withKeyManager<T>(
  configDir: string | undefined,
  fn: (manager: KeyManager) => Promise<T>,
): Promise<T> {
  const config = await loadConfig(configDir)
  const store = RedisHashStore.connect(config.cache.url)
  try {
    const manager = await KeyManager.fromConfig(config, store)
    return await fn(manager)
  } finally {
    await store.close()
  }
}
