/**
 * Structured, level-based logging.
 *
 * The engine never writes to the console directly: components receive a
 * Logger and callers decide where entries go by passing a handler.
 */

import type { LogContext, Logger } from "./interfaces";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Default handler writes one JSON line per entry to stderr. */
export const consoleLogHandler: LogHandler = (entry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  console.error(JSON.stringify(output));
};

export interface LoggerOptions {
  level?: LogLevel;
  handler?: LogHandler;
  context?: LogContext;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level: minLevel = "info", handler = consoleLogHandler, context: baseContext = {} } = options;

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    handler({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
    child: (childCtx) =>
      createLogger({ level: minLevel, handler, context: { ...baseContext, ...childCtx } }),
  };
}

/** Logger that drops every entry */
export const silentLogger: Logger = createLogger({ handler: () => {} });
