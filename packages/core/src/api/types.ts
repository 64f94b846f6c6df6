/**
 * API Types
 * @module api/types
 *
 * AMEE does not publish a fixed schema for its JSON documents, so responses
 * are modelled as generic JSON objects and read field by field.
 */

import type { ResponseCache } from '../cache/types.js'
import type { Logger } from '../utils/logger.js'

// ============================================================================
// JSON Documents
// ============================================================================

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/**
 * Decoded response body. Always a JSON object at the top level.
 */
export type JsonDocument = { [key: string]: JsonValue }

// ============================================================================
// Request Descriptor
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type QueryValue = string | number | boolean

/**
 * Everything needed to issue one call and to derive its cache key
 */
export interface RequestDescriptor {
  /** HTTP method (default GET) */
  method?: HttpMethod
  /** Absolute URL, or a path starting with "/" relative to the server */
  path: string
  /** Query string parameters */
  query?: Record<string, QueryValue>
  /** JSON body parameters */
  body?: JsonDocument
  /** Set false to keep a GET out of the cache. Ignored for other methods. */
  cache?: boolean
  /** Cache TTL in ms for this descriptor, overriding the client default */
  ttl?: number
}

// ============================================================================
// Drill-down
// ============================================================================

/**
 * Outcome of a data item drill-down
 */
export type DrillResult =
  | { complete: true; uid: string }
  | { complete: false; name: string; choices: string[] }

// ============================================================================
// Client Configuration
// ============================================================================

/**
 * API client configuration
 */
export interface AmeeClientConfig {
  /** AMEE username (falls back to AMEE_USERNAME) */
  username?: string
  /** AMEE password (falls back to AMEE_PASSWORD) */
  password?: string
  /** Base URL (falls back to AMEE_SERVER, then the stage server) */
  server?: string
  /** Per-call timeout in ms (default 10000) */
  timeout?: number
  /** Response cache backend. Without one every call goes to the network. */
  cache?: ResponseCache
  /** Default cache TTL in ms (default 6 hours) */
  cacheTtl?: number
  /** Logger (default: namespaced console logger) */
  logger?: Logger
}
