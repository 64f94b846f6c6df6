/**
 * Cache key derivation
 * @module cache/keys
 *
 * Keys must be identical across processes for a shared backend, so every
 * object is serialized with its keys sorted.
 */

import type { JsonDocument, JsonValue, QueryValue, RequestDescriptor } from '../api/types.js'

export const CACHE_NAMESPACE = 'amee'

/**
 * Default TTL for cached responses: 6 hours
 */
export const DEFAULT_CACHE_TTL = 6 * 60 * 60 * 1000

/**
 * JSON.stringify with object keys sorted at every depth
 */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value)
}

function sortedParams(params: JsonDocument): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${key}=${stableStringify(params[key])}`)
    .join('&')
}

/**
 * The query as it goes out on the wire: inline path parameters followed by
 * descriptor parameters, stringified and sorted by name
 */
function wireQuery(query: string, params: Record<string, QueryValue> = {}): string {
  const search = new URLSearchParams(query)
  for (const [key, value] of Object.entries(params)) {
    search.append(key, String(value))
  }
  search.sort()
  return search.toString()
}

/**
 * Generate the cache key for a descriptor sent to a server. Descriptors that
 * produce the same URL share a key, so `{ year: 2010 }`, `{ year: '2010' }`
 * and a path ending in `?year=2010` all hit one entry.
 *
 * @example
 * ```typescript
 * createCacheKey('https://stage.co2.dgen.net', {
 *   path: '/data/business/energy/electricity/drill',
 *   query: { country: 'United Kingdom' },
 * })
 * // 'amee;https://stage.co2.dgen.net;GET;/data/business/energy/electricity/drill;country=United+Kingdom'
 * ```
 */
export function createCacheKey(server: string, descriptor: RequestDescriptor): string {
  const queryStart = descriptor.path.indexOf('?')
  const path = queryStart === -1 ? descriptor.path : descriptor.path.slice(0, queryStart)
  const inlineQuery = queryStart === -1 ? '' : descriptor.path.slice(queryStart + 1)

  const parts = [CACHE_NAMESPACE, server, descriptor.method ?? 'GET', path]

  const query = wireQuery(inlineQuery, descriptor.query)
  if (query !== '') {
    parts.push(query)
  }
  if (descriptor.body && Object.keys(descriptor.body).length > 0) {
    parts.push(sortedParams(descriptor.body))
  }

  return parts.join(';')
}

/**
 * Only reads are cached. A mutating method is never cacheable, whatever the
 * descriptor's cache flag says.
 */
export function isCacheable(descriptor: RequestDescriptor): boolean {
  return (descriptor.method ?? 'GET') === 'GET' && descriptor.cache !== false
}
