/**
 * API module exports
 * @module api
 */

// ============================================================================
// API Client
// ============================================================================

export { AmeeClient, createAmeeClient } from './client.js'

// ============================================================================
// Transport
// ============================================================================

export { AmeeTransport, decodeDocument, type TransportOptions } from './transport.js'

export {
  DEFAULT_SERVER,
  AUTH_PATH,
  assertCategoryPath,
  buildQueryString,
  buildRequestHeaders,
  isAbsoluteUrl,
  isJsonDocument,
  resolveUrl,
} from './utils.js'

// ============================================================================
// Schemas
// ============================================================================

export {
  AmountSchema,
  AuthBodySchema,
  DrillResponseSchema,
  ItemAmountSchema,
  ItemCreatedSchema,
  ProfileCreatedSchema,
  ProfileListSchema,
  type Amount,
  type ValidatedDrillResponse,
} from './schemas.js'

// ============================================================================
// Types
// ============================================================================

export type {
  AmeeClientConfig,
  DrillResult,
  HttpMethod,
  JsonDocument,
  JsonPrimitive,
  JsonValue,
  QueryValue,
  RequestDescriptor,
} from './types.js'
