/**
 * Logger Utility
 *
 * Structured, namespaced console logger. Quiet by default: only warnings and
 * errors are printed unless DEBUG is set.
 */

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace?: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Logger interface accepted by the client and its collaborators
 */
export interface Logger {
  warn: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void
  info: (message: string, context?: Record<string, unknown>) => void
  debug: (message: string, context?: Record<string, unknown>) => void
}

/**
 * Format log entry for output
 */
export function formatLogEntry(entry: LogEntry, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    })
  }

  const prefix = entry.namespace ? `[amee:${entry.namespace}]` : '[amee]'
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `${prefix} ${entry.message}${contextStr}`
}

function createLoggerInstance(namespace?: string): Logger {
  const useJson = process.env.LOG_FORMAT === 'json'
  const parsedLevel = parseInt(process.env.LOG_LEVEL ?? '', 10)
  const minLevel = Number.isNaN(parsedLevel) ? LogLevel.WARN : parsedLevel

  const shouldLog = (level: LogLevel): boolean => {
    // Keep test output clean; errors still show
    if (process.env.NODE_ENV === 'test' && level === LogLevel.WARN) {
      return false
    }
    if (level === LogLevel.DEBUG || level === LogLevel.INFO) {
      return !!process.env.DEBUG
    }
    return level >= minLevel
  }

  const createLogEntry = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry => ({
    level,
    timestamp: new Date().toISOString(),
    namespace,
    message,
    context,
    error,
  })

  return {
    warn: (message: string, context?: Record<string, unknown>) => {
      if (shouldLog(LogLevel.WARN)) {
        console.warn(formatLogEntry(createLogEntry(LogLevel.WARN, message, context), useJson))
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>) => {
      if (shouldLog(LogLevel.ERROR)) {
        console.error(formatLogEntry(createLogEntry(LogLevel.ERROR, message, context, error), useJson))
        if (error && !useJson) {
          console.error(error)
        }
      }
    },

    info: (message: string, context?: Record<string, unknown>) => {
      if (shouldLog(LogLevel.INFO)) {
        console.info(formatLogEntry(createLogEntry(LogLevel.INFO, message, context), useJson))
      }
    },

    debug: (message: string, context?: Record<string, unknown>) => {
      if (shouldLog(LogLevel.DEBUG)) {
        console.debug(formatLogEntry(createLogEntry(LogLevel.DEBUG, message, context), useJson))
      }
    },
  }
}

/**
 * Default logger instance
 *
 * Environment variables:
 * - NODE_ENV=test: Suppress warn output
 * - DEBUG=true: Enable info and debug output
 * - LOG_FORMAT=json: Output logs in JSON format
 * - LOG_LEVEL=0-3: Minimum level for warn/error output
 */
export const logger: Logger = createLoggerInstance()

/**
 * Create a namespaced logger
 *
 * @example
 * ```typescript
 * const log = createLogger('transport')
 * log.info('Authenticated', { server: 'https://stage.co2.dgen.net' })
 * ```
 */
export function createLogger(namespace: string): Logger {
  return createLoggerInstance(namespace)
}

/**
 * No-op logger for testing or silent operation
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
}
