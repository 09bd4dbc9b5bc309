/**
 * Recovery parser for serialized extraction output.
 *
 * The extraction service returns JSON that is frequently wrapped in markdown
 * fences, truncated mid-record or littered with trailing commas. These helpers
 * turn that text into the best-effort list of candidate records it still holds.
 * They never throw: the worst outcome is an empty list flagged "empty".
 *
 * @module reconciler/json
 */

import { z } from "zod";
import { debugLog } from "./debug";
import type { RawCandidateRecord } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type ParseQuality = "clean" | "repaired" | "salvaged" | "empty";

export interface ParsedPayload {
  items: RawCandidateRecord[];
  /** Top-level product-code list (two-pass extraction), in payload order. */
  codes: string[];
  quality: ParseQuality;
}

export interface ParseOptions {
  /** Name of the list-valued field holding the records. */
  itemsField?: string;
  /** Name of the list-valued field holding product codes. */
  codesField?: string;
}

const DEFAULT_ITEMS_FIELD = "items";
const DEFAULT_CODES_FIELD = "hs_codes";

// ============================================================================
// RECORD SCHEMA
// ============================================================================

const textField = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .catch(null)
  .transform((value): string | null => (value === undefined || value === null ? null : String(value)));

const rateField = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .catch(null)
  .transform((value): number | string | null => value ?? null);

/** Unknown keys are stripped; wrong-typed values become null. */
export const CandidateRecordSchema = z.object({
  issuingCountry: textField,
  country: textField,
  hsCode: textField,
  tariffType: textField,
  tariffRate: rateField,
  effectiveDateFrom: textField,
  effectiveDateTo: textField,
  investigationPeriodFrom: textField,
  investigationPeriodTo: textField,
  basisLaw: textField,
  company: textField,
  caseNumber: textField,
  productDescription: textField,
  note: textField,
});

/** Payload key (snake_case or camelCase) → record field. */
const PAYLOAD_KEYS: Record<string, keyof RawCandidateRecord> = {
  issuing_country: "issuingCountry",
  issuingCountry: "issuingCountry",
  country: "country",
  hs_code: "hsCode",
  hsCode: "hsCode",
  tariff_type: "tariffType",
  tariffType: "tariffType",
  tariff_rate: "tariffRate",
  tariffRate: "tariffRate",
  effective_date_from: "effectiveDateFrom",
  effectiveDateFrom: "effectiveDateFrom",
  effective_date_to: "effectiveDateTo",
  effectiveDateTo: "effectiveDateTo",
  investigation_period_from: "investigationPeriodFrom",
  investigationPeriodFrom: "investigationPeriodFrom",
  investigation_period_to: "investigationPeriodTo",
  investigationPeriodTo: "investigationPeriodTo",
  basis_law: "basisLaw",
  basisLaw: "basisLaw",
  company: "company",
  case_number: "caseNumber",
  caseNumber: "caseNumber",
  product_description: "productDescription",
  productDescription: "productDescription",
  note: "note",
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map one payload entry onto the record schema.
 * Returns null for entries that are not objects.
 */
export function toRawCandidateRecord(entry: unknown): RawCandidateRecord | null {
  if (!isPlainObject(entry)) return null;
  const mapped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    const field = PAYLOAD_KEYS[key];
    // First spelling wins when a payload carries both forms.
    if (field && !(field in mapped)) mapped[field] = value;
  }
  return CandidateRecordSchema.parse(mapped);
}

// ============================================================================
// TEXT CLEANUP
// ============================================================================

/** Drop control characters below code point 32 except newline, carriage return and tab. */
export function stripControlCharacters(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (code >= 32 || ch === "\n" || ch === "\r" || ch === "\t") out += ch;
  }
  return out;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Span of the first balanced JSON object in `text`, or null when the object
 * never closes. Braces inside quoted strings are ignored.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; continue; }

    if (ch === "{") depth++;
    if (ch === "}") depth--;

    if (depth === 0) return text.slice(start, i + 1);
  }

  return null;
}

/**
 * Unwrap a fenced code block; otherwise take the first balanced object,
 * or everything from the first "{" when the object is truncated.
 */
export function unwrapPayload(text: string): string {
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) return fenced[1].trim();

  const start = text.indexOf("{");
  if (start < 0) return text.trim();

  // Bare list of records
  const list = /\[\s*\{/.exec(text);
  if (list && list.index < start) {
    const end = text.lastIndexOf("]");
    return (end > list.index ? text.slice(list.index, end + 1) : text.slice(list.index)).trim();
  }

  return (extractFirstJsonObject(text) ?? text.slice(start)).trim();
}

export function removeTrailingCommas(text: string): string {
  return text.replace(/,(\s*[}\]])/g, "$1");
}

function countChar(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

/**
 * Append the "]" then "}" characters implied by opener/closer counts
 * when the text does not already end with "}".
 */
export function balanceClosers(text: string): string {
  if (text.endsWith("}")) return text;
  const missingBrackets = Math.max(0, countChar(text, "[") - countChar(text, "]"));
  const missingBraces = Math.max(0, countChar(text, "{") - countChar(text, "}"));
  return text + "]".repeat(missingBrackets) + "}".repeat(missingBraces);
}

// ============================================================================
// STRUCTURAL SALVAGE
// ============================================================================

/**
 * Index just past the "[" that opens the list value of `field`, or -1.
 */
function findListStart(text: string, field: string): number {
  const escaped = field.replace(/[.*+?^$()|[\]\\{}]/g, "\\$&");
  const keyPattern = new RegExp(`"${escaped}"\\s*:\\s*\\[`);
  const match = keyPattern.exec(text);
  return match ? match.index + match[0].length : -1;
}

/**
 * Scan a list's contents and return every top-level `{...}` span.
 * Honours string quoting, escapes and nesting; stops at the list's own "]".
 */
export function scanObjectSpans(text: string, from: number): string[] {
  const spans: string[] = [];
  let depth = 0;
  let inString = false;
  let escape = false;
  let spanStart = -1;

  for (let i = from; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; continue; }

    if (ch === "{" || ch === "[") {
      if (depth === 0 && ch === "{") spanStart = i;
      depth++;
      continue;
    }

    if (ch === "}" || ch === "]") {
      if (depth === 0) {
        if (ch === "]") break;
        continue;
      }
      depth--;
      if (depth === 0 && ch === "}" && spanStart >= 0) {
        spans.push(text.slice(spanStart, i + 1));
        spanStart = -1;
      }
    }
  }

  return spans;
}

/** Complete string literals of the list value of `field`, up to the list's "]". */
function salvageStringList(text: string, field: string): string[] {
  const start = findListStart(text, field);
  if (start < 0) return [];
  const values: string[] = [];
  const literal = /"((?:[^"\\]|\\.)*)"|(\])/g;
  literal.lastIndex = start;
  let match: RegExpExecArray | null;
  while ((match = literal.exec(text)) !== null) {
    if (match[2]) break;
    try {
      const value: unknown = JSON.parse(`"${match[1]}"`);
      if (typeof value === "string") values.push(value);
    } catch {
      // Malformed escape inside a single literal: skip that code only.
      continue;
    }
  }
  return values;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

function collectItems(list: unknown): RawCandidateRecord[] {
  if (!Array.isArray(list)) return [];
  const items: RawCandidateRecord[] = [];
  for (const entry of list) {
    const record = toRawCandidateRecord(entry);
    if (record) items.push(record);
  }
  return items;
}

function collectCodes(list: unknown): string[] {
  if (!Array.isArray(list)) return [];
  return list.filter((code): code is string => typeof code === "string");
}

/**
 * Parse a raw extraction payload into candidate records.
 *
 * Strict parse after cleanup; structural salvage of the items list when the
 * strict parse fails. Output order follows the payload.
 */
export function parseExtractionPayload(raw: string, options: ParseOptions = {}): ParsedPayload {
  const itemsField = options.itemsField ?? DEFAULT_ITEMS_FIELD;
  const codesField = options.codesField ?? DEFAULT_CODES_FIELD;

  const stripped = stripControlCharacters(raw);
  const unwrapped = unwrapPayload(stripped);
  if (!unwrapped) return { items: [], codes: [], quality: "empty" };

  // Closers appended after a dangling comma leave a new trailing comma behind
  const cleaned = removeTrailingCommas(balanceClosers(removeTrailingCommas(unwrapped)));
  const parsed = tryParse(cleaned);

  if (parsed.ok) {
    const quality: ParseQuality = cleaned === stripped.trim() ? "clean" : "repaired";
    if (Array.isArray(parsed.value)) {
      return { items: collectItems(parsed.value), codes: [], quality };
    }
    if (isPlainObject(parsed.value)) {
      return {
        items: collectItems(parsed.value[itemsField]),
        codes: collectCodes(parsed.value[codesField]),
        quality,
      };
    }
  }

  // A bare list is salvaged from its own opening bracket
  const listStart = cleaned.startsWith("[") ? 1 : findListStart(cleaned, itemsField);
  const items: RawCandidateRecord[] = [];
  if (listStart >= 0) {
    for (const span of scanObjectSpans(cleaned, listStart)) {
      const piece = tryParse(span);
      if (!piece.ok) continue;
      const record = toRawCandidateRecord(piece.value);
      if (record) items.push(record);
    }
  }
  const codes = salvageStringList(cleaned, codesField);

  if (items.length === 0 && codes.length === 0) {
    debugLog("[Recovery] Payload unrecoverable", { length: unwrapped.length, preview: unwrapped.slice(0, 200) });
    return { items: [], codes: [], quality: "empty" };
  }

  debugLog("[Recovery] Salvaged payload", { items: items.length, codes: codes.length });
  return { items, codes, quality: "salvaged" };
}
