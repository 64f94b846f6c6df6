import { afterEach, describe, expect, it, vi } from 'vitest'
import { LogLevel, createLogger, formatLogEntry } from '../src/utils/logger.js'

describe('formatLogEntry', () => {
  const timestamp = '2026-01-01T00:00:00.000Z'

  it('should prefix the namespace', () => {
    expect(
      formatLogEntry(
        { level: LogLevel.WARN, timestamp, namespace: 'client', message: 'Cache get failed' },
        false
      )
    ).toBe('[amee:client] Cache get failed')
  })

  it('should append context as JSON', () => {
    expect(
      formatLogEntry(
        { level: LogLevel.INFO, timestamp, message: 'Authenticated', context: { server: 'https://amee.test' } },
        false
      )
    ).toBe('[amee] Authenticated {"server":"https://amee.test"}')
  })

  it('should emit one JSON object in json mode', () => {
    const line = formatLogEntry(
      { level: LogLevel.ERROR, timestamp, namespace: 'cli', message: 'failed' },
      true
    )

    expect(JSON.parse(line)).toEqual({
      level: 'ERROR',
      timestamp,
      namespace: 'cli',
      message: 'failed',
    })
  })
})

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('should stay quiet on debug unless DEBUG is set', () => {
    vi.stubEnv('DEBUG', '')
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    createLogger('transport').debug('Response received')

    expect(debug).not.toHaveBeenCalled()
  })

  it('should print debug output when DEBUG is set', () => {
    vi.stubEnv('DEBUG', '1')
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    createLogger('transport').debug('Response received', { status: 200 })

    expect(debug).toHaveBeenCalledWith('[amee:transport] Response received {"status":200}')
  })

  it('should suppress warnings under NODE_ENV=test', () => {
    vi.stubEnv('NODE_ENV', 'test')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('client').warn('Cache set failed')

    expect(warn).not.toHaveBeenCalled()
  })

  it('should print warnings outside tests', () => {
    vi.stubEnv('NODE_ENV', 'production')
    vi.stubEnv('LOG_FORMAT', '')
    vi.stubEnv('LOG_LEVEL', '')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('client').warn('Cache set failed')

    expect(warn).toHaveBeenCalledWith('[amee:client] Cache set failed')
  })

  it('should fall back to warnings when LOG_LEVEL is not a number', () => {
    vi.stubEnv('NODE_ENV', 'production')
    vi.stubEnv('LOG_FORMAT', '')
    vi.stubEnv('LOG_LEVEL', 'verbose')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('client').warn('Cache set failed')
    createLogger('client').error('Cache get failed')

    expect(warn).toHaveBeenCalledWith('[amee:client] Cache set failed')
    expect(error).toHaveBeenCalledWith('[amee:client] Cache get failed')
  })
})
