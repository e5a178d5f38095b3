/**
 * Lightweight logging utility.
 * Writes timestamped entries tagged with the run ID to a log file and,
 * optionally, to stderr. Stdout is reserved for the record channel and is
 * never written here.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Mirror entries to stderr */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component tag prepended to every message */
  component?: string;
  /** Sink for console output (defaults to process.stderr) */
  stream?: { write(chunk: string): unknown };
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "component" | "stream">> = {
  level: "info",
  logDir: "logs",
  logFile: "graphpipe.log",
  console: false,
  file: true,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Same sinks and level, messages tagged with a sub-component */
  child(component: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);
  const stream = options.stream ?? process.stderr;
  let fileBroken = false;

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const text = options.component ? `[${options.component}] ${message}` : message;
    const entry = formatLogEntry(level, text, context);

    if (opts.console) {
      stream.write(entry + "\n");
    }

    if (opts.file && !fileBroken) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Report once, then keep running without the file sink
        fileBroken = true;
        stream.write(`Failed to write to log file ${logFilePath}: ${err}\n`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (component) =>
      createLogger({
        ...options,
        component: options.component ? `${options.component}:${component}` : component,
      }),
  };
}
