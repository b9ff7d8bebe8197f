/**
 * MITS11 Bootstrap Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Silent unless the CLI runs with
 * --debug, in which case records go to stderr so they never mix with the
 * nested installer's stdout.
 *
 * NOTE: We use pino.destination() instead of pino transports because
 * transports spawn worker_threads which break inside bundles.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Bindings attached to every record */
  base?: Record<string, unknown>;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      base: opts.base ?? { pid: process.pid },
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
