/**
 * Minimal structured logging utility
 *
 * One JSON object per line. `LOG_LEVEL` drops entries below the given level.
 */

import { randomUUID } from "node:crypto";

export type LogLevel = "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["info", "warn", "error"];

export interface LogEntry {
  level: LogLevel;
  message: string;
  ts: string;
  errorId?: string;
  ctx?: Record<string, unknown>;
}

let minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

export function parseLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((l) => l === normalized) ?? null;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function log(
  level: LogLevel,
  message: string,
  ctx?: Record<string, unknown>,
  error?: unknown
): string | undefined {
  const entry: LogEntry = {
    level,
    message,
    ts: new Date().toISOString(),
    ctx,
  };

  // errorId is returned even when the entry is filtered out, so callers can still echo it
  if (error !== undefined) {
    entry.errorId = randomUUID().slice(0, 8);
    entry.ctx = error instanceof Error
      ? { ...ctx, error: error.message, stack: error.stack }
      : { ...ctx, error: String(error) };
  }

  if (LEVELS.indexOf(level) < LEVELS.indexOf(minLevel)) {
    return entry.errorId;
  }

  const out = JSON.stringify(entry);
  if (level === "error") {
    console.error(out);
  } else if (level === "warn") {
    console.warn(out);
  } else {
    console.log(out);
  }

  return entry.errorId;
}

export const logger = {
  info: (msg: string, ctx?: Record<string, unknown>) => log("info", msg, ctx),
  warn: (msg: string, ctx?: Record<string, unknown>) => log("warn", msg, ctx),
  error: (msg: string, ctx?: Record<string, unknown>, err?: unknown) =>
    log("error", msg, ctx, err),
};
