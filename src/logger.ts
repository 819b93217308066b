/**
 * Pino Logger Factory
 *
 * Structured logging for the sync server, with per-module child loggers.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Human-readable output through pino-pretty (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  pretty: false,
  base: { service: "task-sync-server" },
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/** Logger that discards everything; the default for library callers and tests */
export const silentLogger: Logger = pino({ level: "silent" });

export type { Logger } from "pino";
