/**
 * Lightweight logging utility.
 *
 * Entries carry a timestamp, level, run ID and optional scope, and go to the
 * console, to an append-only log file, or to a custom sink.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured log entry, as handed to a sink.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  scope?: string;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Label prefixed to every message (e.g. "codec") */
  scope?: string;
  /** Receives every entry that passes the level filter */
  sink?: (entry: LogEntry) => void;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger with the same settings under another scope */
  child(scope: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, scope, and message.
 */
function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const scope = entry.scope ? ` [${entry.scope}]` : "";

  let line = `[${timestamp}] [${levelStr}] [${runId}]${scope} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 *
 * File output is off unless requested; a library should not write log
 * files on its own.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const logDir = options.logDir ?? "output/logs";
  const logFilePath = join(logDir, options.logFile ?? "fixtures.log");
  const toConsole = options.console ?? true;
  const toFile = options.file ?? false;

  if (toFile && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  function log(entryLevel: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
      return;
    }

    const entry: LogEntry = { level: entryLevel, message, scope: options.scope, context };
    options.sink?.(entry);

    if (!toConsole && !toFile) return;
    const line = formatLogEntry(entry);

    if (toConsole) {
      getConsoleMethod(entryLevel)(line);
    }

    if (toFile) {
      try {
        appendFileSync(logFilePath, line + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) => createLogger({ ...options, scope }),
  };
}
