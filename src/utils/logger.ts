/**
 * Logger Module
 * Structured logging using pino, pretty-printed in development
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Write JSON lines to `<logDir>/<component>.log` instead of stdout */
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && !isTest();
}

/**
 * Log level from LOG_LEVEL, falling back to a per-environment default.
 * Tests run silent unless LOG_LEVEL asks otherwise.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("index");
 * logger.info({ records: 12 }, "Snapshot swapped");
 * logger.error({ err }, "Failed to load snapshot");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (logDir) {
    fs.mkdirSync(logDir, { recursive: true });
    const destination = pino.destination({
      dest: path.join(logDir, `${component}.log`),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  if (isDevelopment()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions);
}

export type Logger = PinoLogger;
