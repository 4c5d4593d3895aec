/**
 * @vnetlab/logger
 *
 * Structured JSON logging with bound context fields
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Minimum level written (default: "info"). "silent" drops everything */
  level?: LogLevel | "silent";
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel | "silent" {
  return value === "silent" || (LOG_LEVELS as readonly string[]).includes(value);
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Create a structured logger bound to a component name
 */
export function createLogger(context: LogContext, options: LoggerOptions = {}): Logger {
  const minimum = LEVEL_RANK[options.level ?? "info"];

  const formatLog = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const fields = { ...context, ...meta };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: context.component,
      message,
      ...Object.fromEntries(
        Object.entries(fields)
          .filter(([key]) => key !== "component")
          .map(([key, value]) => [key, serializeValue(value)])
      ),
    };
    return JSON.stringify(entry);
  };

  const enabled = (level: LogLevel) => LEVEL_RANK[level] >= minimum;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (childContext) => createLogger({ ...context, ...childContext }, options),
  };
}
