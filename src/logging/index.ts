/**
 * graphform — Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  type LogDestination,
  type LoggingOptions,
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  LoggerImpl,
  createLogger,
  getLogger,
  setGlobalLogger,
} from "./logger.js";
