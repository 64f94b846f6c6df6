/**
 * In-memory response cache
 * Process-local LRU with per-entry TTL
 */

import { LRUCache } from 'lru-cache'
import type { JsonDocument } from '../api/types.js'
import type { CacheStats, ResponseCache } from './types.js'

export interface MemoryCacheOptions {
  /** Max entries kept (default: 500) */
  maxEntries?: number
}

export class MemoryResponseCache implements ResponseCache {
  private cache: LRUCache<string, JsonDocument>
  private hits = 0
  private misses = 0

  constructor(options: MemoryCacheOptions = {}) {
    this.cache = new LRUCache<string, JsonDocument>({
      max: options.maxEntries ?? 500,
      // Entries without an explicit ttl never expire
      ttl: 0,
    })
  }

  /**
   * Get a copy of the cached document
   */
  async get(key: string): Promise<JsonDocument | undefined> {
    const entry = this.cache.get(key)

    if (entry) {
      this.hits++
      return structuredClone(entry)
    }

    this.misses++
    return undefined
  }

  /**
   * Store a copy, so later mutation by the caller cannot reach the cache
   */
  async set(key: string, value: JsonDocument, ttl: number): Promise<void> {
    this.cache.set(key, structuredClone(value), { ttl })
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key)
  }

  has(key: string): boolean {
    return this.cache.has(key)
  }

  /**
   * Clear all cache entries
   */
  clear(): void {
    this.cache.clear()
    this.hits = 0
    this.misses = 0
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      size: this.cache.size,
    }
  }

  /**
   * Prune expired entries
   */
  prune(): void {
    this.cache.purgeStale()
  }
}

export default MemoryResponseCache
