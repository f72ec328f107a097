/**
 * Debug logging utilities for the triage engine
 *
 * Console logging plus an optional append-only log file.
 * Configured from `config.logging` or via environment variables.
 *
 * @module triage/debug
 */

import * as fs from "fs";
import * as path from "path";

import type { LoggingSettings } from "../config-schemas";

// ============================================================================
// CONFIGURATION
// ============================================================================

export type LogLevel = LoggingSettings["level"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

interface DebugLogState {
  level: LogLevel;
  filePath: string | null;
}

function initialState(): DebugLogState {
  const fileEnabled = (process.env.TRIAGE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
  return {
    level: "info",
    filePath: fileEnabled
      ? process.env.TRIAGE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-triage.log")
      : null,
  };
}

let state: DebugLogState = initialState();

/**
 * Apply logging settings from the resolved app config.
 * A relative `file` is placed under `logDir` (default `logs/`).
 */
export function configureDebugLog(settings: LoggingSettings, logDir = "logs"): string | null {
  let filePath = state.filePath;
  if (settings.file) {
    filePath = path.isAbsolute(settings.file) ? settings.file : path.join(logDir, settings.file);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  state = { level: settings.level, filePath };
  return filePath;
}

// Exposed for unit tests (no production usage).
export function __resetDebugLog(): void {
  state = initialState();
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

function formatPayload(data: unknown): string {
  let payload: string;
  try {
    payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  } catch {
    payload = "[unserializable]";
  }
  if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
    payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
  }
  return payload;
}

export function formatLogLine(level: LogLevel, message: string, data?: unknown, now = new Date()): string {
  let logLine = `[${now.toISOString()}] [${level.toUpperCase()}] ${message}`;
  if (data !== undefined) {
    logLine += ` | ${formatPayload(data)}`;
  }
  return logLine;
}

function writeLine(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[state.level]) return;

  const logLine = formatLogLine(level, message, data);

  if (state.filePath) {
    const target = state.filePath;
    // Async append so long runs do not block on disk I/O
    fs.promises.appendFile(target, logLine + "\n").catch((err: unknown) => {
      console.error(`[Triage] Failed to append to log file ${target}: ${String(err)}`);
    });
  }

  if (level === "error") {
    console.error(logLine);
  } else if (level === "warn") {
    console.warn(logLine);
  } else {
    console.log(logLine);
  }
}

/**
 * Log a message to the console and (when configured) the log file
 */
export function debugLog(message: string, data?: unknown): void {
  writeLine("debug", message, data);
}

export function infoLog(message: string, data?: unknown): void {
  writeLine("info", message, data);
}

export function warnLog(message: string, data?: unknown): void {
  writeLine("warn", message, data);
}

export function errorLog(message: string, data?: unknown): void {
  writeLine("error", message, data);
}
