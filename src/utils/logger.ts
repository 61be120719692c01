/**
 * File logger
 *
 * Set STATUSKIT_DEBUG=1 to record debug and info lines. Warnings and errors
 * are always written. Lines go to <cache dir>/logs/statuskit.log, never to
 * stdout, since stdout is the status line itself.
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getLogPath } from "./paths";

export type LogLevel = "debug" | "info" | "warn" | "error";

function isDebugEnabled(): boolean {
  return process.env.STATUSKIT_DEBUG === "1";
}

function write(level: LogLevel, scope: string, message: string): void {
  if ((level === "debug" || level === "info") && !isDebugEnabled()) return;
  try {
    const logPath = getLogPath();
    const logDir = dirname(logPath);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString();
    appendFileSync(logPath, `[${timestamp}] [${level}] [${scope}] ${message}\n`);
  } catch {
    // Logging must not break the status line
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  debug: (scope: string, message: string) => write("debug", scope, message),
  info: (scope: string, message: string) => write("info", scope, message),
  warn: (scope: string, message: string) => write("warn", scope, message),
  error: (scope: string, message: string) => write("error", scope, message),
};
