/**
 * API Utility Functions
 * @module api/utils
 *
 * Helper functions for building AMEE requests
 */

import { ValidationError } from '../errors/index.js'
import type { JsonDocument, QueryValue } from './types.js'

// ============================================================================
// URL Constants
// ============================================================================

/**
 * AMEE stage server, reached over TLS
 */
export const DEFAULT_SERVER = 'https://stage.co2.dgen.net'

/**
 * Path of the credential exchange endpoint
 */
export const AUTH_PATH = '/auth'

// ============================================================================
// URL Building
// ============================================================================

export function isAbsoluteUrl(path: string): boolean {
  return /^https?:\/\//.test(path)
}

/**
 * Encode query parameters in insertion order
 */
export function buildQueryString(query?: Record<string, QueryValue>): string {
  if (!query) return ''
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    params.append(key, String(value))
  }
  return params.toString()
}

/**
 * Resolve a descriptor path against the server base URL
 *
 * @throws ValidationError when a relative path does not start with "/"
 */
export function resolveUrl(
  server: string,
  path: string,
  query?: Record<string, QueryValue>
): string {
  let url: string
  if (isAbsoluteUrl(path)) {
    url = path
  } else {
    if (!path.startsWith('/')) {
      throw new ValidationError(`Path '${path}' does not start with /`, { field: 'path' })
    }
    url = `${server}${path}`
  }

  const queryString = buildQueryString(query)
  if (queryString === '') return url
  return `${url}${url.includes('?') ? '&' : '?'}${queryString}`
}

/**
 * Reject category paths that would not join onto /data or /profiles/{uid}
 */
export function assertCategoryPath(path: string): void {
  if (!path.startsWith('/')) {
    throw new ValidationError(`Path '${path}' does not start with /`, { field: 'path' })
  }
}

// ============================================================================
// Request Header Builder
// ============================================================================

/**
 * Build request headers for AMEE calls
 *
 * @param authToken - Session token, omitted on the auth exchange itself
 * @param hasBody - Whether a JSON body is sent
 */
export function buildRequestHeaders(authToken?: string, hasBody = false): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'Cache-Control': 'max-age=0',
  }

  if (hasBody) {
    headers['Content-Type'] = 'application/json'
  }

  if (authToken) {
    headers['AuthToken'] = authToken
  }

  return headers
}

// ============================================================================
// JSON Documents
// ============================================================================

/**
 * Narrow parsed JSON to a top-level object
 */
export function isJsonDocument(value: unknown): value is JsonDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
