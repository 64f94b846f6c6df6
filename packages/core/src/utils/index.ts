/**
 * Utility exports
 */
export {
  logger,
  createLogger,
  silentLogger,
  formatLogEntry,
  LogLevel,
  type Logger,
  type LogEntry,
} from './logger.js'
