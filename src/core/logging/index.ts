export type { LogContext, Logger, LogLevel } from "./domain/logger.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, describeError, isLogLevel, isLogLevelEnabled, normalizeLogLevel } from "./domain/logger.js";
export {
  StructuredLogger,
  createNoopLogger,
  type EmittedLogLevel,
  type LogRecord,
  type LogSink
} from "./application/structured-logger.js";
