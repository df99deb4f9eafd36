/**
 * Cache barrel export.
 */

export { FingerprintCache, DEFAULT_CACHE_NAMESPACE } from './fingerprint-cache.js'
export { RedisHashStore } from './redis-store.js'
export type { HashStore } from './types.js'
