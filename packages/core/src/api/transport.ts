/**
 * AMEE Transport
 * @module api/transport
 *
 * Turns a request descriptor into one HTTP call with the session token
 * attached, and decodes the answer. Owns the session token.
 */

import {
  ApiError,
  AuthError,
  DecodeError,
  NetworkError,
  getErrorMessage,
  type RequestOrigin,
} from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { AuthBodySchema } from './schemas.js'
import type { JsonDocument, RequestDescriptor } from './types.js'
import { AUTH_PATH, buildRequestHeaders, isJsonDocument, resolveUrl } from './utils.js'

export interface TransportOptions {
  server: string
  username: string
  password: string
  /** Per-call timeout in ms */
  timeout: number
  logger?: Logger
}

/**
 * Decode a response body into a JSON object. An empty body is an empty object.
 *
 * @throws DecodeError when the body is not JSON or not an object
 */
export function decodeDocument(text: string, origin: RequestOrigin = {}): JsonDocument {
  if (text.trim() === '') return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new DecodeError(`Response from ${origin.method} ${origin.path} is not valid JSON`, {
      ...origin,
      cause: error,
      body: text.slice(0, 200),
    })
  }

  if (!isJsonDocument(parsed)) {
    throw new DecodeError(`Response from ${origin.method} ${origin.path} is not a JSON object`, {
      ...origin,
      body: text.slice(0, 200),
    })
  }

  return parsed
}

interface FetchedResponse {
  response: Response
  text: string
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

export class AmeeTransport {
  private readonly options: TransportOptions
  private readonly log: Logger
  private authToken: string | undefined
  private pendingAuth: Promise<string> | undefined

  constructor(options: TransportOptions) {
    this.options = options
    this.log = options.logger ?? createLogger('transport')
  }

  get server(): string {
    return this.options.server
  }

  hasToken(): boolean {
    return this.authToken !== undefined
  }

  /**
   * Return the held session token, exchanging credentials for one first if
   * there is none. Concurrent callers share a single exchange.
   *
   * @throws AuthError when the credentials are rejected or no token comes back
   */
  async authenticate(): Promise<string> {
    if (this.authToken !== undefined) return this.authToken

    if (!this.pendingAuth) {
      this.pendingAuth = this.exchangeCredentials().finally(() => {
        this.pendingAuth = undefined
      })
    }

    return this.pendingAuth
  }

  /**
   * Issue the call a descriptor describes and decode the answer
   *
   * A 401 on a held token means it expired: the token is replaced once and
   * the call repeated once.
   */
  async send(descriptor: RequestDescriptor): Promise<JsonDocument> {
    const method = descriptor.method ?? 'GET'
    const origin: RequestOrigin = { method, path: descriptor.path }
    const url = resolveUrl(this.options.server, descriptor.path, descriptor.query)

    const token = await this.authenticate()
    let fetched = await this.dispatch(url, descriptor, token, origin)

    if (fetched.response.status === 401) {
      this.log.info('AMEE authentication token expired', { ...origin })
      this.dropToken(token)

      const freshToken = await this.authenticate()
      fetched = await this.dispatch(url, descriptor, freshToken, origin)

      if (fetched.response.status === 401) {
        throw new AuthError('AMEE rejected fresh authentication token', {
          ...origin,
          statusCode: 401,
        })
      }
    }

    const { response, text } = fetched

    if (!response.ok) {
      throw new ApiError(`Status code ${response.status} from ${method} to ${descriptor.path}`, {
        ...origin,
        statusCode: response.status,
        body: text,
      })
    }

    const document = decodeDocument(text, origin)

    const location = response.status === 201 ? response.headers.get('Location') : null
    if (location && document.location === undefined) {
      document.location = location
    }

    this.log.debug('Response received', { ...origin, status: response.status })
    return document
  }

  private async exchangeCredentials(): Promise<string> {
    const origin: RequestOrigin = { method: 'POST', path: AUTH_PATH }
    const url = resolveUrl(this.options.server, AUTH_PATH)

    const { response, text } = await this.fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: buildRequestHeaders(undefined, true),
        body: JSON.stringify({
          username: this.options.username,
          password: this.options.password,
        }),
      },
      origin
    )

    if (!response.ok) {
      throw new AuthError(`Failed to authenticate with AMEE: status ${response.status}`, {
        ...origin,
        statusCode: response.status,
      })
    }

    const token = response.headers.get('authToken') ?? tokenFromBody(text)
    if (!token) {
      throw new AuthError('Failed to authenticate with AMEE: no token in response', {
        ...origin,
        statusCode: response.status,
      })
    }

    this.authToken = token
    this.log.info('Authenticated with AMEE', { server: this.options.server })
    return token
  }

  private dropToken(staleToken: string): void {
    // Another caller may already hold a fresh one
    if (this.authToken === staleToken) {
      this.authToken = undefined
    }
  }

  private async dispatch(
    url: string,
    descriptor: RequestDescriptor,
    token: string,
    origin: RequestOrigin
  ): Promise<FetchedResponse> {
    const hasBody = descriptor.body !== undefined
    return this.fetchWithTimeout(
      url,
      {
        method: descriptor.method ?? 'GET',
        headers: buildRequestHeaders(token, hasBody),
        ...(hasBody ? { body: JSON.stringify(descriptor.body) } : {}),
      },
      origin
    )
  }

  /**
   * Fetch and read the body under one deadline; headers arriving in time do
   * not stop the clock.
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
    origin: RequestOrigin
  ): Promise<FetchedResponse> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout)

    try {
      const response = await fetch(url, { ...init, redirect: 'manual', signal: controller.signal })
      const text = await Promise.race([response.text(), whenAborted(controller.signal)])
      return { response, text }
    } catch (error) {
      const message = controller.signal.aborted
        ? `Request to ${url} timed out after ${this.options.timeout}ms`
        : `Request to ${url} failed: ${getErrorMessage(error)}`
      throw new NetworkError(message, { ...origin, url, cause: error })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function tokenFromBody(text: string): string | undefined {
  if (text.trim() === '') return undefined

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    // Header-only servers answer with HTML or plain text here
    return undefined
  }

  const result = AuthBodySchema.safeParse(parsed)
  if (!result.success) return undefined
  return result.data.authToken ?? result.data.token
}
