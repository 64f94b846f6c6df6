/**
 * Tests for AmeeTransport: authentication, dispatch, decoding and error mapping
 */

import { afterEach, describe, expect, it, vi } from 'vitest'
import { AmeeTransport, decodeDocument, type TransportOptions } from '../../src/api/transport.js'
import {
  ApiError,
  AuthError,
  DecodeError,
  NetworkError,
  ValidationError,
} from '../../src/errors/index.js'
import { silentLogger } from '../../src/utils/logger.js'
import {
  TEST_PASSWORD,
  TEST_SERVER,
  TEST_TOKEN,
  TEST_USERNAME,
  installFakeAmee,
  type FetchFn,
} from '../fixtures/fake-amee.js'

function createTransport(overrides: Partial<TransportOptions> = {}): AmeeTransport {
  return new AmeeTransport({
    server: TEST_SERVER,
    username: TEST_USERNAME,
    password: TEST_PASSWORD,
    timeout: 1000,
    logger: silentLogger,
    ...overrides,
  })
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('decodeDocument', () => {
  it('should decode an empty body as an empty object', () => {
    expect(decodeDocument('')).toEqual({})
    expect(decodeDocument('  \n')).toEqual({})
  })

  it('should decode a JSON object', () => {
    expect(decodeDocument('{"amount":1.5}')).toEqual({ amount: 1.5 })
  })

  it('should reject text that is not JSON', () => {
    expect(() => decodeDocument('<html>', { method: 'GET', path: '/profiles' })).toThrow(
      'Response from GET /profiles is not valid JSON'
    )
  })

  it('should reject JSON that is not an object', () => {
    let caught: unknown
    try {
      decodeDocument('[1,2]', { method: 'GET', path: '/profiles' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(DecodeError)
    expect(caught).toMatchObject({
      message: 'Response from GET /profiles is not a JSON object',
      context: { method: 'GET', path: '/profiles', body: '[1,2]' },
    })
  })
})

describe('AmeeTransport', () => {
  describe('authenticate', () => {
    it('should exchange credentials for the authToken header', async () => {
      const fake = installFakeAmee()
      const transport = createTransport()

      await expect(transport.authenticate()).resolves.toBe(TEST_TOKEN)

      const [call] = fake.authCalls()
      expect(call.method).toBe('POST')
      expect(call.url.href).toBe('https://amee.test/auth')
      expect(call.body).toEqual({ username: TEST_USERNAME, password: TEST_PASSWORD })
      expect(call.headers.get('Content-Type')).toBe('application/json')
      expect(call.headers.get('AuthToken')).toBeNull()
      expect(transport.hasToken()).toBe(true)
    })

    it('should reuse the held token', async () => {
      const fake = installFakeAmee()
      const transport = createTransport()

      await transport.authenticate()
      await transport.authenticate()

      expect(fake.authCalls()).toHaveLength(1)
    })

    it('should share one exchange between concurrent callers', async () => {
      const fake = installFakeAmee()
      const transport = createTransport()

      const tokens = await Promise.all([transport.authenticate(), transport.authenticate()])

      expect(tokens).toEqual([TEST_TOKEN, TEST_TOKEN])
      expect(fake.authCalls()).toHaveLength(1)
    })

    it('should read the token from the body when the header is absent', async () => {
      const fake = installFakeAmee()
      fake.route('POST /auth', { status: 200, body: { authToken: 'body-token' } })

      await expect(createTransport().authenticate()).resolves.toBe('body-token')
    })

    it('should raise AuthError and hold no token when credentials are rejected', async () => {
      installFakeAmee()
      const transport = createTransport({ password: 'wrong-secret' })

      const error = await transport.authenticate().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthError)
      expect(error).toMatchObject({
        message: 'Failed to authenticate with AMEE: status 401',
        statusCode: 401,
      })
      expect(transport.hasToken()).toBe(false)
    })

    it('should raise AuthError when a successful answer carries no token', async () => {
      const fake = installFakeAmee()
      fake.route('POST /auth', { status: 200, body: {} })

      await expect(createTransport().authenticate()).rejects.toThrow(
        'Failed to authenticate with AMEE: no token in response'
      )
    })

    it('should let a caller retry after a failed exchange', async () => {
      const fake = installFakeAmee()
      fake.route('POST /auth', { status: 503 })
      const transport = createTransport()

      await expect(transport.authenticate()).rejects.toBeInstanceOf(AuthError)

      fake.route('POST /auth', { status: 200, headers: { authToken: 'second-token' } })
      await expect(transport.authenticate()).resolves.toBe('second-token')
    })
  })

  describe('send', () => {
    it('should attach the session token and default headers', async () => {
      const fake = installFakeAmee({
        routes: { 'GET /profiles': { body: { profiles: [] } } },
      })

      const document = await createTransport().send({ path: '/profiles' })

      expect(document).toEqual({ profiles: [] })
      const [call] = fake.apiCalls()
      expect(call.headers.get('AuthToken')).toBe(TEST_TOKEN)
      expect(call.headers.get('Accept')).toBe('application/json')
      expect(call.headers.get('Cache-Control')).toBe('max-age=0')
      expect(call.headers.get('Content-Type')).toBeNull()
    })

    it('should encode query parameters and JSON bodies', async () => {
      const fake = installFakeAmee({
        routes: {
          'GET /data/business/energy/electricity/drill': { body: {} },
          'POST /profiles': { body: { uid: 'P1' } },
        },
      })
      const transport = createTransport()

      await transport.send({
        path: '/data/business/energy/electricity/drill',
        query: { country: 'United Kingdom' },
      })
      await transport.send({ method: 'POST', path: '/profiles', body: { profile: 'true' } })

      const [drill, create] = fake.apiCalls()
      expect(drill.url.search).toBe('?country=United+Kingdom')
      expect(create.body).toEqual({ profile: 'true' })
      expect(create.headers.get('Content-Type')).toBe('application/json')
    })

    it('should accept an absolute URL as the path', async () => {
      const fake = installFakeAmee({ routes: { 'GET /profiles/P1': { body: { uid: 'P1' } } } })

      await createTransport().send({ path: 'https://amee.test/profiles/P1' })

      expect(fake.apiCalls()[0].url.href).toBe('https://amee.test/profiles/P1')
    })

    it('should decode an empty 204 answer as an empty object', async () => {
      installFakeAmee({ routes: { 'DELETE /profiles/P1': { status: 204 } } })

      await expect(createTransport().send({ method: 'DELETE', path: '/profiles/P1' })).resolves.toEqual(
        {}
      )
    })

    it('should expose the Location header of a 201 answer', async () => {
      installFakeAmee({
        routes: {
          'POST /profiles/P1/home/appliances': {
            status: 201,
            headers: { Location: '/profiles/P1/home/appliances/ITEM9' },
          },
        },
      })

      const document = await createTransport().send({
        method: 'POST',
        path: '/profiles/P1/home/appliances',
        body: { dataItemUid: 'D1' },
      })

      expect(document).toEqual({ location: '/profiles/P1/home/appliances/ITEM9' })
    })

    it('should raise ApiError carrying status and body for a non-2xx answer', async () => {
      installFakeAmee({ routes: { 'GET /profiles': { status: 500, body: 'Internal failure' } } })

      const error = await createTransport()
        .send({ path: '/profiles' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ApiError)
      expect(error).toMatchObject({
        message: 'Status code 500 from GET to /profiles',
        statusCode: 500,
        body: 'Internal failure',
        context: { method: 'GET', path: '/profiles', statusCode: 500 },
      })
    })

    it('should raise DecodeError for a body that is not JSON', async () => {
      installFakeAmee({ routes: { 'GET /profiles': { body: 'plain text' } } })

      await expect(createTransport().send({ path: '/profiles' })).rejects.toBeInstanceOf(
        DecodeError
      )
    })

    it('should re-authenticate once and retry on an expired token', async () => {
      const fake = installFakeAmee({
        tokens: ['token-1', 'token-2'],
        routes: {
          'GET /profiles': (call) =>
            call.headers.get('AuthToken') === 'token-1'
              ? { status: 401 }
              : { body: { profiles: [] } },
        },
      })

      const document = await createTransport().send({ path: '/profiles' })

      expect(document).toEqual({ profiles: [] })
      expect(fake.authCalls()).toHaveLength(2)
      expect(fake.apiCalls().map((call) => call.headers.get('AuthToken'))).toEqual([
        'token-1',
        'token-2',
      ])
    })

    it('should raise AuthError when the fresh token is rejected too', async () => {
      const fake = installFakeAmee({ routes: { 'GET /profiles': { status: 401 } } })

      const error = await createTransport()
        .send({ path: '/profiles' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthError)
      expect(error).toMatchObject({
        message: 'AMEE rejected fresh authentication token',
        statusCode: 401,
      })
      expect(fake.apiCalls()).toHaveLength(2)
    })

    it('should reject a relative path without a leading slash before any call', async () => {
      const fake = installFakeAmee()

      await expect(createTransport().send({ path: 'profiles' })).rejects.toBeInstanceOf(
        ValidationError
      )
      expect(fake.calls).toHaveLength(0)
    })

    it('should wrap a failed fetch in NetworkError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))

      const error = await createTransport()
        .send({ path: '/profiles' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({
        message: 'Request to https://amee.test/auth failed: fetch failed',
      })
    })

    it('should abort a call that outlives the timeout', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          (_input: string, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
            })
        )
      )

      await expect(createTransport({ timeout: 20 }).authenticate()).rejects.toThrow(
        'Request to https://amee.test/auth timed out after 20ms'
      )
    })

    it('should time out a body that stalls after the headers arrive', async () => {
      const fake = installFakeAmee()
      vi.stubGlobal(
        'fetch',
        vi.fn<FetchFn>(async (input, init) =>
          String(input).endsWith('/profiles')
            ? new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 })
            : fake.fetch(input, init)
        )
      )

      const error = await createTransport({ timeout: 50 })
        .send({ path: '/profiles' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({
        message: 'Request to https://amee.test/profiles timed out after 50ms',
      })
    })
  })
})
