/**
 * Run logger.
 *
 * Console entries are single readable lines. The log file under the run's
 * output directory gets one JSON object per entry so a finished migration
 * can be filtered by stage or level. Child loggers share their parent's
 * file sink and extend its scope ("backend:shell").
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  scope: string;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  /** Minimum level written to either sink */
  level?: LogLevel;
  /** Stamped on every entry */
  runId?: string;
  /** Stage or component label */
  scope?: string;
  /** Directory for the log file */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  console?: boolean;
  file?: boolean;
  /** Clock for entry timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger that tags every entry with a nested scope. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console form of an entry:
 * `[2026-01-01T10:00:00.000Z] [INFO ] [run-id] [scope] message {"k":1}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  const scope = entry.scope ? ` [${entry.scope}]` : "";
  const context =
    entry.context && Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context, replaceErrors)}`
      : "";
  return `[${entry.timestamp}] [${level}] [${entry.runId}]${scope} ${entry.message}${context}`;
}

/** File form of an entry: one JSON object, context flattened in. */
export function serializeLogEntry(entry: LogEntry): string {
  const { context, ...fields } = entry;
  return JSON.stringify({ ...context, ...fields }, replaceErrors);
}

function replaceErrors(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

interface FileSink {
  write(line: string): void;
}

function openFileSink(logDir: string, logFile: string): FileSink {
  const path = join(logDir, logFile);
  let ready = false;
  let broken = false;
  return {
    write(line) {
      if (broken) return;
      try {
        if (!ready) {
          mkdirSync(logDir, { recursive: true });
          ready = true;
        }
        appendFileSync(path, `${line}\n`);
      } catch (err) {
        // Report once; later entries go to the console only
        broken = true;
        console.error(`Failed to write to log file ${path}: ${err}`);
      }
    },
  };
}

interface LoggerState {
  level: LogLevel;
  runId: string;
  scope: string;
  console: boolean;
  sink: FileSink | undefined;
  now: () => Date;
}

function buildLogger(state: LoggerState): Logger {
  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: state.now().toISOString(),
      level,
      runId: state.runId,
      scope: state.scope,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };
    if (state.console) {
      writeToConsole(level, formatLogEntry(entry));
    }
    state.sink?.write(serializeLogEntry(entry));
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) =>
      buildLogger({ ...state, scope: state.scope ? `${state.scope}:${scope}` : scope }),
  };
}

/**
 * Create a run logger. The log directory is created on the first write.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const file = options.file ?? true;
  return buildLogger({
    level: options.level ?? "info",
    runId: options.runId ?? "no-run-id",
    scope: options.scope ?? "",
    console: options.console ?? true,
    sink: file
      ? openFileSink(options.logDir ?? "migration-output/logs", options.logFile ?? "migration.log")
      : undefined,
    now: options.now ?? (() => new Date()),
  });
}

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
