/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { ApiError, AuthError, getErrorMessage } from '@amee-client/core'
 *
 * try {
 *   await client.createProfile()
 * } catch (error) {
 *   if (error instanceof ApiError && error.isServerError()) {
 *     // retry later
 *   }
 *   console.error(getErrorMessage(error))
 * }
 * ```
 *
 * @module errors
 */

export {
  AmeeError,
  AuthError,
  ApiError,
  DecodeError,
  NetworkError,
  CacheUnavailableError,
  ValidationError,
  UnexpectedResponseError,
  getErrorMessage,
  isAmeeError,
  type RequestOrigin,
} from './AmeeError.js'
