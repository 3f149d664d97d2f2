/**
 * Scoped logging.
 *
 * Every entry becomes a LogRecord stamped with the current run ID and the
 * logger's scope, then goes to each configured sink. Loggers are cheap:
 * adapters take a child of whatever logger the caller injects, so one CLI
 * run produces lines like
 *
 *   [2024-01-15T10:00:00.000Z] [WARN ] [20240115-a1b2c3] tools.openalex: HTTP 503 ...
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogContext = Record<string, unknown>;

export interface LogRecord {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly runId: string | null;
  /** Dotted component path, e.g. "tools.pubmed" */
  readonly scope?: string;
  readonly message: string;
  readonly context?: LogContext;
}

/** Receives each record that passes the level filter, with its formatted line */
export type LogSink = (record: LogRecord, line: string) => void;

export interface LoggerOptions {
  /** Minimum level to emit (default "info") */
  level?: LogLevel;
  scope?: string;
  /** Write to the console (default true) */
  console?: boolean;
  /** Append to this file, creating its directory on first use */
  file?: string;
  /** Extra sinks, e.g. an in-memory one in tests */
  sinks?: readonly LogSink[];
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Same sinks and level, scope nested one level deeper */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatLogEntry(record: LogRecord): string {
  const level = record.level.toUpperCase().padEnd(5);
  const scope = record.scope ? ` ${record.scope}:` : "";
  const context =
    record.context && Object.keys(record.context).length > 0
      ? ` ${JSON.stringify(record.context)}`
      : "";
  return (
    `[${record.timestamp.toISOString()}] [${level}] [${record.runId ?? "no-run-id"}]` +
    `${scope} ${record.message}${context}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════════════════

export const consoleSink: LogSink = (record, line) => {
  switch (record.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export function fileSink(filePath: string): LogSink {
  let ready = false;
  return (_record, line) => {
    try {
      if (!ready) {
        mkdirSync(dirname(filePath), { recursive: true });
        ready = true;
      }
      appendFileSync(filePath, line + "\n", "utf-8");
    } catch (err) {
      console.error(`Failed to write to log file ${filePath}: ${String(err)}`);
    }
  };
}

/**
 * Sink that keeps records in memory.
 */
export function memorySink(): { sink: LogSink; records: LogRecord[]; lines: string[] } {
  const records: LogRecord[] = [];
  const lines: string[] = [];
  return {
    records,
    lines,
    sink: (record, line) => {
      records.push(record);
      lines.push(line);
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGERS
// ═══════════════════════════════════════════════════════════════════════════

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function buildLogger(level: LogLevel, sinks: readonly LogSink[], scope?: string): Logger {
  function emit(entryLevel: LogLevel, message: string, context?: LogContext): void {
    if (sinks.length === 0 || LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) {
      return;
    }
    const record: LogRecord = {
      timestamp: new Date(),
      level: entryLevel,
      runId: getRunId(),
      scope,
      message,
      context,
    };
    const line = formatLogEntry(record);
    for (const sink of sinks) {
      sink(record, line);
    }
  }

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (name) => buildLogger(level, sinks, scope ? `${scope}.${name}` : name),
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sinks: LogSink[] = [];
  if (options.console ?? true) {
    sinks.push(consoleSink);
  }
  if (options.file) {
    sinks.push(fileSink(options.file));
  }
  sinks.push(...(options.sinks ?? []));
  return buildLogger(options.level ?? "info", sinks, options.scope);
}

/** Drops every entry; the default wherever no logger is injected */
export const silentLogger: Logger = createLogger({ console: false });
