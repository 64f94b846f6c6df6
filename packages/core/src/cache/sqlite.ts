/**
 * Persistent response cache on SQLite
 * One database file can back several processes at once.
 */

import Database from 'better-sqlite3'
import type { JsonDocument } from '../api/types.js'
import { isJsonDocument } from '../api/utils.js'
import type { CacheStats, ResponseCache } from './types.js'

export interface SqliteCacheOptions {
  /** Database file, or ':memory:' */
  dbPath: string
}

export class SqliteResponseCache implements ResponseCache {
  private db: Database.Database
  private hits = 0
  private misses = 0

  constructor(options: SqliteCacheOptions) {
    this.db = new Database(options.dbPath)
    this.initTable()
  }

  private initTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS amee_response_cache (
        cache_key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      )
    `)

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_amee_cache_expires
      ON amee_response_cache(expires_at)
    `)
  }

  async get(key: string): Promise<JsonDocument | undefined> {
    const stmt = this.db.prepare(`
      SELECT value_json
      FROM amee_response_cache
      WHERE cache_key = ? AND expires_at > ?
    `)

    const row = stmt.get(key, Date.now()) as { value_json: string } | undefined

    if (row) {
      const value: unknown = JSON.parse(row.value_json)
      if (isJsonDocument(value)) {
        this.hits++
        return value
      }
    }

    this.misses++
    return undefined
  }

  async set(key: string, value: JsonDocument, ttl: number): Promise<void> {
    const now = Date.now()

    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO amee_response_cache
      (cache_key, value_json, created_at, expires_at)
      VALUES (?, ?, ?, ?)
    `)

    stmt.run(key, JSON.stringify(value), now, now + ttl)
  }

  async delete(key: string): Promise<void> {
    this.db.prepare('DELETE FROM amee_response_cache WHERE cache_key = ?').run(key)
  }

  /**
   * Clear all cache entries
   */
  clear(): void {
    this.db.exec('DELETE FROM amee_response_cache')
    this.hits = 0
    this.misses = 0
  }

  /**
   * Remove expired entries
   *
   * @returns Number of rows removed
   */
  prune(): number {
    const result = this.db
      .prepare('DELETE FROM amee_response_cache WHERE expires_at <= ?')
      .run(Date.now())
    return result.changes
  }

  getStats(): CacheStats & { expiredCount: number } {
    const total = this.hits + this.misses

    const counts = this.db
      .prepare(
        `
      SELECT
        COUNT(*) as total,
        COALESCE(SUM(CASE WHEN expires_at <= ? THEN 1 ELSE 0 END), 0) as expired
      FROM amee_response_cache
    `
      )
      .get(Date.now()) as { total: number; expired: number }

    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      size: counts.total - counts.expired,
      expiredCount: counts.expired,
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close()
  }
}

export default SqliteResponseCache
