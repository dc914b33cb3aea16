/**
 * Process-wide logger
 *
 * Thin wrapper over pino so call sites read `logger.info("[Tag] message", { ...context })`.
 * Everything goes to stderr; stdout is reserved for the CLI's one-line messages.
 */

import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

type LogContext = Record<string, unknown>;

function initialLevel(): LogLevel {
  const verbose = process.env.VERBOSE;
  if (verbose && verbose !== "false" && verbose !== "0") {
    return "debug";
  }
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case "fatal":
    case "error":
    case "warn":
    case "info":
    case "debug":
    case "trace":
      return level;
    default:
      return "info";
  }
}

const base = pino(
  {
    level: initialLevel(),
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  pino.destination({ dest: 2, sync: true })
);

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (context) {
    base[level](context, message);
  } else {
    base[level](message);
  }
}

export const logger = {
  fatal: (message: string, context?: LogContext) => write("fatal", message, context),
  error: (message: string, context?: LogContext) => write("error", message, context),
  warn: (message: string, context?: LogContext) => write("warn", message, context),
  info: (message: string, context?: LogContext) => write("info", message, context),
  debug: (message: string, context?: LogContext) => write("debug", message, context),
  trace: (message: string, context?: LogContext) => write("trace", message, context),
};

export function setLogLevel(level: LogLevel): void {
  base.level = level;
}
