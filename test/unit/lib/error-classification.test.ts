/**
 * Error Classification Tests
 *
 * Store errors by SQLite result code; extraction errors into provider
 * outage, rate limit, input error and timeout.
 */

import { describe, it, expect } from "vitest";
import {
  ExtractionServiceError,
  FactStoreError,
  classifyExtractionError,
  classifyStoreError,
} from "@/lib/error-classification";

function sqliteError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("error-classification", () => {
  describe("classifyStoreError", () => {
    it("maps SQLite result codes", () => {
      expect(classifyStoreError(sqliteError("SQLITE_CONSTRAINT", "FOREIGN KEY constraint failed"))).toBe("constraint");
      expect(classifyStoreError(sqliteError("SQLITE_BUSY", "database is locked"))).toBe("busy");
      expect(classifyStoreError(sqliteError("SQLITE_READONLY", "attempt to write a readonly database"))).toBe("readonly");
      expect(classifyStoreError(sqliteError("SQLITE_IOERR", "disk I/O error"))).toBe("io");
    });

    it("falls back to the message", () => {
      expect(classifyStoreError(new Error("UNIQUE constraint failed: documents.document_id"))).toBe("constraint");
      expect(classifyStoreError("something odd")).toBe("unknown");
    });

    it("reuses the category of a wrapped error", () => {
      const err = new FactStoreError("update", sqliteError("SQLITE_BUSY", "database is locked"));
      expect(err.category).toBe("busy");
      expect(err.message).toBe("Fact store update failed: database is locked");
      expect(err.name).toBe("FactStoreError");
      expect(classifyStoreError(err)).toBe("busy");
    });
  });

  describe("classifyExtractionError", () => {
    it("classifies timeouts as retriable", () => {
      const err = Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
      expect(classifyExtractionError(err)).toEqual({
        category: "timeout",
        message: "The operation was aborted",
        retriable: true,
      });
      expect(classifyExtractionError(new Error("connect ETIMEDOUT")).category).toBe("timeout");
    });

    it("classifies authentication failures as non-retriable outages", () => {
      const result = classifyExtractionError(new Error("Incorrect API key provided"));
      expect(result.category).toBe("provider_outage");
      expect(result.retriable).toBe(false);
    });

    it("classifies rate limits by message", () => {
      const result = classifyExtractionError(new Error("Rate limit reached for requests"));
      expect(result.category).toBe("rate_limit");
      expect(result.retriable).toBe(true);
    });

    it("classifies oversized input as an input error", () => {
      const result = classifyExtractionError(new Error("This model's maximum context length is 128000 tokens"));
      expect(result).toMatchObject({ category: "input_error", retriable: false });
    });

    it("falls back to the status code", () => {
      const status = (statusCode: number) => Object.assign(new Error("Request failed"), { statusCode });
      expect(classifyExtractionError(status(529))).toMatchObject({ category: "rate_limit", retriable: true });
      expect(classifyExtractionError(status(403))).toMatchObject({ category: "provider_outage", retriable: false });
      expect(classifyExtractionError(status(502))).toMatchObject({ category: "provider_outage", retriable: true });
      expect(classifyExtractionError(status(422))).toMatchObject({ category: "input_error", retriable: false });
      expect(classifyExtractionError(Object.assign(new Error("Busy"), { status: 503 })).category).toBe("rate_limit");
    });

    it("keeps the category of an ExtractionServiceError", () => {
      const err = new ExtractionServiceError("empty response", "unknown", 3);
      expect(classifyExtractionError(err)).toEqual({ category: "unknown", message: "empty response", retriable: false });
    });

    it("returns unknown for anything else", () => {
      expect(classifyExtractionError(new Error("Unexpected token"))).toEqual({
        category: "unknown",
        message: "Unexpected token",
        retriable: false,
      });
    });
  });
});
