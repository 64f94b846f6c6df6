/**
 * In-process stand-in for an AMEE server
 *
 * Replaces global fetch. Routes are keyed by "METHOD /pathname" and answer
 * with a fixed reply or a handler. POST /auth is built in.
 */

import { vi, type Mock } from 'vitest'

export const TEST_SERVER = 'https://amee.test'
export const TEST_USERNAME = 'test-user'
export const TEST_PASSWORD = 'test-secret'
export const TEST_TOKEN = 'test-token'

export interface RecordedCall {
  method: string
  url: URL
  path: string
  headers: Headers
  body: unknown
}

export interface FakeReply {
  status?: number
  /** Serialized as JSON unless already a string */
  body?: unknown
  headers?: Record<string, string>
}

export type RouteHandler = (call: RecordedCall) => FakeReply

export interface FakeAmeeOptions {
  routes?: Record<string, FakeReply | RouteHandler>
  /** Tokens handed out by successive auth calls (default: always TEST_TOKEN) */
  tokens?: string[]
}

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface FakeAmee {
  fetch: Mock<FetchFn>
  calls: RecordedCall[]
  authCalls: () => RecordedCall[]
  apiCalls: () => RecordedCall[]
  route: (key: string, reply: FakeReply | RouteHandler) => void
}

const NULL_BODY_STATUSES = new Set([204, 205, 304])

function toResponse(reply: FakeReply): Response {
  const status = reply.status ?? 200
  const headers = new Headers(reply.headers)

  if (NULL_BODY_STATUSES.has(status) || reply.body === undefined) {
    return new Response(NULL_BODY_STATUSES.has(status) ? null : '', { status, headers })
  }

  const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body)
  return new Response(text, { status, headers })
}

function inputUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input)
  if (input instanceof URL) return input
  return new URL(input.url)
}

/**
 * Create the fake and install it as global fetch
 *
 * Call `vi.unstubAllGlobals()` in afterEach to restore the real fetch.
 */
export function installFakeAmee(options: FakeAmeeOptions = {}): FakeAmee {
  const calls: RecordedCall[] = []
  const routes = new Map<string, FakeReply | RouteHandler>(Object.entries(options.routes ?? {}))
  const tokens = [...(options.tokens ?? [])]

  routes.set('POST /auth', (call) => {
    const credentials = call.body
    const accepted =
      typeof credentials === 'object' &&
      credentials !== null &&
      'username' in credentials &&
      'password' in credentials &&
      credentials.username === TEST_USERNAME &&
      credentials.password === TEST_PASSWORD

    if (!accepted) {
      return { status: 401, body: 'Unauthorized' }
    }
    return { status: 200, headers: { authToken: tokens.shift() ?? TEST_TOKEN } }
  })

  const fetchMock = vi.fn<FetchFn>(
    async (input, init) => {
      const url = inputUrl(input)
      const rawBody = typeof init?.body === 'string' ? init.body : undefined
      const call: RecordedCall = {
        method: init?.method ?? 'GET',
        url,
        path: url.pathname,
        headers: new Headers(init?.headers),
        body: rawBody === undefined ? undefined : JSON.parse(rawBody),
      }
      calls.push(call)

      const route = routes.get(`${call.method} ${call.path}`)
      if (route === undefined) {
        return toResponse({ status: 404, body: { error: 'not found' } })
      }
      return toResponse(typeof route === 'function' ? route(call) : route)
    }
  )

  vi.stubGlobal('fetch', fetchMock)

  return {
    fetch: fetchMock,
    calls,
    authCalls: () => calls.filter((call) => call.path === '/auth'),
    apiCalls: () => calls.filter((call) => call.path !== '/auth'),
    route: (key, reply) => {
      routes.set(key, reply)
    },
  }
}
