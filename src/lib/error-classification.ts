/**
 * Error Classification
 *
 * Classifies storage failures (SQLite driver errors) and extraction-service
 * failures (LLM provider errors) so callers can decide whether a retry or a
 * per-record error count is appropriate.
 *
 * @module error-classification
 */

// ============================================================================
// ERROR TYPES
// ============================================================================

export type StoreErrorCategory = "constraint" | "busy" | "readonly" | "io" | "unknown";

export type ExtractionErrorCategory = "provider_outage" | "rate_limit" | "input_error" | "timeout" | "unknown";

/** A store operation rejected by the database driver. */
export class FactStoreError extends Error {
  readonly category: StoreErrorCategory;

  constructor(
    readonly operation: string,
    readonly cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Fact store ${operation} failed: ${detail}`);
    this.name = "FactStoreError";
    this.category = classifyStoreError(cause);
  }
}

/** The extraction service failed after the allowed attempts. */
export class ExtractionServiceError extends Error {
  constructor(
    message: string,
    readonly category: ExtractionErrorCategory,
    readonly attempts: number,
  ) {
    super(message);
    this.name = "ExtractionServiceError";
  }
}

// ============================================================================
// STORAGE
// ============================================================================

function readStringProp(error: unknown, key: string): string | null {
  if (typeof error !== "object" || error === null || !(key in error)) return null;
  const value: unknown = Reflect.get(error, key);
  return typeof value === "string" ? value : null;
}

function readNumberProp(error: unknown, key: string): number | null {
  if (typeof error !== "object" || error === null || !(key in error)) return null;
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : null;
}

/**
 * Classify a storage error by its SQLite result code
 * (e.g. SQLITE_CONSTRAINT, SQLITE_BUSY), falling back to the message.
 */
export function classifyStoreError(error: unknown): StoreErrorCategory {
  if (error instanceof FactStoreError) return error.category;

  const code = readStringProp(error, "code") ?? "";
  const msg = error instanceof Error ? error.message : String(error);
  const probe = `${code} ${msg}`;

  if (/SQLITE_CONSTRAINT|constraint failed/i.test(probe)) return "constraint";
  if (/SQLITE_BUSY|SQLITE_LOCKED|database is locked/i.test(probe)) return "busy";
  if (/SQLITE_READONLY|readonly database/i.test(probe)) return "readonly";
  if (/SQLITE_IOERR|SQLITE_FULL|SQLITE_CANTOPEN|disk I\/O error/i.test(probe)) return "io";
  return "unknown";
}

// ============================================================================
// EXTRACTION SERVICE
// ============================================================================

export type ClassifiedExtractionError = {
  category: ExtractionErrorCategory;
  message: string;
  retriable: boolean;
};

/** Patterns indicating LLM provider rate limiting or outage */
const LLM_RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const LLM_AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const LLM_INPUT_PATTERNS = [
  /context\s*length/i,
  /maximum\s*context/i,
  /too\s*many\s*tokens/i,
  /invalid\s*request/i,
  /status\s*(?:code\s*)?400/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

/**
 * Classify an extraction-service error. Only rate limits, timeouts and
 * transient outages are retriable.
 */
export function classifyExtractionError(error: unknown): ClassifiedExtractionError {
  if (error instanceof ExtractionServiceError) {
    return { category: error.category, message: error.message, retriable: false };
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", message: msg, retriable: true };
  }

  if (LLM_AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg, retriable: false };
  }

  if (LLM_RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", message: msg, retriable: true };
  }

  if (LLM_INPUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "input_error", message: msg, retriable: false };
  }

  // Status code on the error object (AI SDK APICallError)
  const statusCode = readNumberProp(error, "statusCode") ?? readNumberProp(error, "status");
  if (statusCode !== null) {
    if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
      return { category: "rate_limit", message: msg, retriable: true };
    }
    if (statusCode === 401 || statusCode === 403) {
      return { category: "provider_outage", message: msg, retriable: false };
    }
    if (statusCode >= 500) {
      return { category: "provider_outage", message: msg, retriable: true };
    }
    if (statusCode >= 400) {
      return { category: "input_error", message: msg, retriable: false };
    }
  }

  return { category: "unknown", message: msg, retriable: false };
}
