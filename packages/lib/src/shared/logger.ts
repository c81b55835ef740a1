/**
 * Structured JSON logger with optional file persistence.
 *
 * Usage:
 *   import { createLogger } from "@slipway/lib/shared/logger.ts";
 *   const log = createLogger("pipeline");
 *   log.info("step completed", { step: "purge_toolchain" });
 *   // => {"ts":"2026-02-21T...","level":"info","service":"pipeline","msg":"step completed","extra":{"step":"purge_toolchain"}}
 *
 * Log level filtering:
 *   Set LOG_LEVEL=debug|info|warn|error (default: "info").
 *   DEBUG=1 is a shorthand for LOG_LEVEL=debug.
 *
 * File logging:
 *   Set LOG_DIR to a writable directory path. Entries are also appended as
 *   JSONL to ${LOG_DIR}/service.log, rotated at 50 MB (renamed to .log.1).
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "node:fs";
import { dirname, join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_LOG_FILE_SIZE = 50 * 1024 * 1024; // 50 MB

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

function getMinLevel(): LogLevel {
  if (process.env.DEBUG === "1") return "debug";
  const raw = process.env.LOG_LEVEL;
  if (raw && isLogLevel(raw)) return raw;
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function getLogFilePath(): string | null {
  const dir = process.env.LOG_DIR;
  if (!dir) return null;
  return join(dir, "service.log");
}

let logDirInitialized = false;
let fileWriteFailed = false;

function writeToFile(filePath: string, line: string): void {
  if (!logDirInitialized) {
    mkdirSync(dirname(filePath), { recursive: true });
    logDirInitialized = true;
  }
  if (existsSync(filePath) && statSync(filePath).size >= MAX_LOG_FILE_SIZE) {
    renameSync(filePath, `${filePath}.1`);
  }
  try {
    appendFileSync(filePath, line + "\n", "utf8");
  } catch (err) {
    // reported once on stderr; logging it through emit() would loop
    if (!fileWriteFailed) {
      fileWriteFailed = true;
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`log file write failed: ${message}\n`);
    }
  }
}

function emit(level: LogLevel, service: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    service,
    msg,
  };
  if (extra !== undefined && Object.keys(extra).length > 0) {
    entry.extra = extra;
  }
  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  const filePath = getLogFilePath();
  if (filePath) writeToFile(filePath, line);
}

export function createLogger(service: string): Logger {
  return {
    debug(msg: string, extra?: Record<string, unknown>): void {
      emit("debug", service, msg, extra);
    },
    info(msg: string, extra?: Record<string, unknown>): void {
      emit("info", service, msg, extra);
    },
    warn(msg: string, extra?: Record<string, unknown>): void {
      emit("warn", service, msg, extra);
    },
    error(msg: string, extra?: Record<string, unknown>): void {
      emit("error", service, msg, extra);
    },
  };
}

/** Reset internal state. For testing only. */
export function _resetLogDirState(): void {
  logDirInitialized = false;
  fileWriteFailed = false;
}
