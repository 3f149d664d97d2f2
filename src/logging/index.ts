/**
 * Logging and run tracing.
 */

export { generateRunId, initRunId, getRunId, RUN_ID_PATTERN } from "./run-id.js";
export {
  consoleSink,
  createLogger,
  fileSink,
  formatLogEntry,
  isLogLevel,
  memorySink,
  silentLogger,
  LOG_LEVELS,
  type LogContext,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogRecord,
  type LogSink,
} from "./logger.js";
