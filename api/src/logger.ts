import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
}

/**
 * Logs go to stderr: the CLI prints metadata JSON on stdout from the same
 * process.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const fromEnv = (process.env.LOG_LEVEL || "").trim().toLowerCase();
  const level = options.level ?? (isLogLevel(fromEnv) ? fromEnv : "info");

  return pino(
    {
      level,
      base: { service: "docmeta" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export const logger = createLogger();
