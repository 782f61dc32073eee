/**
 * Logger Module
 * Structured logging using pino, written to stderr or a log file
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { LogLevelSchema, type LogLevel } from "./validation.js";

export type { LogLevel };

export interface LoggerOptions {
  level?: LogLevel;
  /** Write to this file instead of stderr */
  logFile?: string;
  /** Force pino-pretty on or off (defaults to TTY detection) */
  pretty?: boolean;
}

const DEFAULT_LEVEL: LogLevel = "error";

/**
 * Ensures the directory holding the log file exists
 */
function ensureLogDir(logFile: string): void {
  const dir = path.dirname(logFile);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Pretty printing only makes sense for a human watching stderr
 */
function shouldPrettyPrint(): boolean {
  const env = process.env.NODE_ENV;
  return Boolean(process.stderr.isTTY) && env !== "production" && env !== "test";
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_LEVEL;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "catalog", "menu", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("catalog");
 * logger.warn({ id: "singleton", err }, "Failed to construct demo");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const {
    level = getLogLevel(),
    logFile = process.env.LOG_FILE,
    pretty = shouldPrettyPrint(),
  } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (logFile) {
    ensureLogDir(logFile);
    return pino(baseOptions, pino.destination({ dest: logFile, sync: true }));
  }

  if (pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  parent: PinoLogger,
  bindings: Record<string, unknown>
): PinoLogger {
  return parent.child(bindings);
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
