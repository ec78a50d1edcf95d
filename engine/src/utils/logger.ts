/**
 * flakedesk Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine module logs through the
 * instance handed to it in its context.
 *
 * The CLI keeps the logger silent unless --debug is set; user-facing text
 * is rendered from engine events instead, so the two never interleave.
 *
 * NOTE: We use pino.destination() instead of pino transports because
 * transports spawn worker_threads which break inside the esbuild bundle
 * shipped in the self-extracting installer.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
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
      name: "flakedesk",
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // stderr, synchronous: no worker threads
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
