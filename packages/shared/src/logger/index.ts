/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log entries (when LOG_FORMAT=json)
 * - Level filtering via LOG_LEVEL, overridable at run time with setLogLevel()
 * - session_id and trace_id fields for correlating one shell session
 * - Child loggers inherit context
 *
 * Everything goes to stderr so log lines never mix with command results.
 */

import { performance } from "node:perf_hooks";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  sessionId?: string;
  traceId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (sessionId, traceId, etc.) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

/** Process-wide level set by the shell's configuration. */
let processLevel: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  processLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

/** Explicit level, then setLogLevel(), then LOG_LEVEL, then "info". */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  if (processLevel) return processLevel;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  let context: LogContext = { ...parentContext };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    // Resolved per call: module-level loggers exist before config is loaded.
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolveMinLevel(minLevel)]) return;

    const timestamp = new Date().toISOString();

    if (isJsonFormat()) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.sessionId) entry.session_id = context.sessionId;
      if (context.traceId) entry.trace_id = context.traceId;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
      if (data && Object.keys(data).length > 0) {
        console.error(`${prefix} ${message} ${JSON.stringify(data)}`);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, minLevel, { ...context }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
