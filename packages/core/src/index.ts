/**
 * @amee-client/core - Client binding for the AMEE carbon accounting API
 */

// Version
export const VERSION = '0.1.0'

// API client, transport, schemas and types
export * from './api/index.js'

// Profile and profile item facades
export { Profile, ProfileItem, CO2_UNIT } from './resources/index.js'

// Response caches
export * from './cache/index.js'

// Configuration
export { resolveClientConfig, DEFAULT_TIMEOUT, type ResolvedClientConfig } from './config.js'

// Errors
export * from './errors/index.js'

// Logging
export * from './utils/index.js'
