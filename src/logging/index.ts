/**
 * Run logging.
 */

export { generateRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  serializeLogEntry,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";
