/**
 * Response cache contract
 * @module cache/types
 */

import type { JsonDocument } from '../api/types.js'

/**
 * Pluggable key-value store for decoded responses.
 *
 * Implementations may reject on any call; the request pipeline treats a
 * rejection as a cache miss (get) or a no-op (set, delete).
 */
export interface ResponseCache {
  /** Resolve the stored document, or undefined when absent or expired */
  get(key: string): Promise<JsonDocument | undefined>
  /** Store a whole document for ttl milliseconds */
  set(key: string, value: JsonDocument, ttl: number): Promise<void>
  /** Drop a key if present */
  delete(key: string): Promise<void>
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number
  misses: number
  hitRate: number
  size: number
}
