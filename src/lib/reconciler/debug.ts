/**
 * Debug logging utilities for the reconciler
 *
 * Provides file-based and console logging for debugging reconciliation runs.
 * Can be configured via environment variables.
 *
 * @module reconciler/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH =
  process.env.TR_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-reconcile.log");

const DEBUG_LOG_FILE_ENABLED =
  (process.env.TR_DEBUG_LOG_FILE ?? "true").toLowerCase() === "true";

const DEBUG_LOG_CLEAR_ON_START =
  (process.env.TR_DEBUG_LOG_CLEAR_ON_START ?? "false").toLowerCase() === "true";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

let fileWriteWarned = false;

function warnFileWriteFailure(err: unknown): void {
  if (fileWriteWarned) return;
  fileWriteWarned = true;
  console.warn(`[Debug] Could not write ${DEBUG_LOG_PATH}; continuing with console only`, err);
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Format one log line: timestamp, message, optional JSON payload.
 * Payloads are truncated at 8000 characters.
 */
export function formatLogLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatLogLine(message, data);

  // Async append so long documents never block on the log file
  if (DEBUG_LOG_FILE_ENABLED) {
    fs.promises.appendFile(DEBUG_LOG_PATH, logLine + "\n").catch(warnFileWriteFailure);
  }

  console.log(logLine);
}

/**
 * Clear the debug log file at startup
 */
export function clearDebugLog(): void {
  if (!DEBUG_LOG_FILE_ENABLED) return;
  if (!DEBUG_LOG_CLEAR_ON_START) return;

  fs.promises
    .writeFile(DEBUG_LOG_PATH, `=== Reconciler Debug Log Started at ${new Date().toISOString()} ===\n`)
    .catch(warnFileWriteFailure);
}
