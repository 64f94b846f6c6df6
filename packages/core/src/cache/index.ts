/**
 * Cache exports
 * Response cache contract, key derivation and the two bundled backends
 */

export type { ResponseCache, CacheStats } from './types.js'

export {
  CACHE_NAMESPACE,
  DEFAULT_CACHE_TTL,
  createCacheKey,
  isCacheable,
  stableStringify,
} from './keys.js'

export { MemoryResponseCache } from './lru.js'
export type { MemoryCacheOptions } from './lru.js'

export { SqliteResponseCache } from './sqlite.js'
export type { SqliteCacheOptions } from './sqlite.js'
