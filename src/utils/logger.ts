/**
 * Scoped stderr logger.
 *
 * stdout belongs to the MCP stdio transport, so every level goes through
 * console.error. The threshold comes from MIXER_LOG_LEVEL.
 */

import { z } from "zod";

const levelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof levelSchema>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let threshold: LogLevel = parseLevel(process.env.MIXER_LOG_LEVEL);

/** Parse a level name; unknown or missing values fall back to "warn". */
export function parseLevel(value: string | undefined): LogLevel {
  const parsed = levelSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : "warn";
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]) => {
    if (RANK[level] < RANK[threshold]) return;
    console.error(`[${scope}] ${level}: ${message}`, ...details);
  };
  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
