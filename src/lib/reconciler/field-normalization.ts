/**
 * Field Normalization Module
 *
 * Canonicalizes scalar fields of candidate records: country names, case
 * identifiers, duty rates, dates and product codes. A value that cannot be
 * canonicalized is nulled and reported as an annotation; it never fails the
 * record. normalize(normalize(r)) equals normalize(r).
 *
 * @module reconciler/field-normalization
 */

import { CountryDirectory, getCountryDirectory } from "./country-names";
import { debugLog } from "./debug";
import { getJurisdictionStrategy, type JurisdictionStrategy } from "./jurisdictions";
import {
  DATE_FIELDS,
  MIN_PRICE_SENTINEL,
  type CandidateRecord,
  type FactField,
  type NormalizationAnnotation,
  type RawCandidateRecord,
  type TariffRate,
} from "./types";

// ============================================================================
// TEXT
// ============================================================================

/** Trim; blanks and the literal "null" become null. */
export function cleanText(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === "null") return null;
  return trimmed;
}

const TARIFF_TYPES: Array<{ pattern: RegExp; canonical: string }> = [
  { pattern: /anti[\s-]?dumping|^ad$/i, canonical: "Antidumping" },
  { pattern: /countervail|subsid|^cvds?$/i, canonical: "Countervailing" },
  { pattern: /safeguard/i, canonical: "Safeguard" },
];

export function normalizeTariffType(value: string | null): string | null {
  const text = cleanText(value);
  if (text === null) return null;
  return TARIFF_TYPES.find((t) => t.pattern.test(text))?.canonical ?? text;
}

// ============================================================================
// CASE IDENTIFIERS
// ============================================================================

const CASE_NUMBER_PATTERN = /^[A-Z]-\d{3}-\d{3}$/;

/**
 * Canonical case identifier `{LETTER}-{3 digits}-{3 digits}`, or null.
 * Of several identifiers joined by "," or ";" the first is kept.
 */
export function normalizeCaseNumber(value: string | null): string | null {
  const text = cleanText(value);
  if (text === null) return null;
  const first = text.split(/[,;]/)[0] ?? "";
  const cleaned = first
    .replace(/[\u2010-\u2015\u2212]/g, "-")
    .replace(/\s+/g, "")
    .toUpperCase();
  return CASE_NUMBER_PATTERN.test(cleaned) ? cleaned : null;
}

// ============================================================================
// RATES
// ============================================================================

const MIN_PRICE_PATTERNS = [
  /minimum\s+(?:import\s+)?price/i,
  /\bMIP\b/,
  /price\s+undertaking/i,
  /floor\s+price/i,
];

export type RateParse =
  | { kind: "rate"; rate: TariffRate | null }
  | { kind: "min_price"; text: string }
  | { kind: "unparseable"; text: string };

export function parseTariffRate(value: number | string | null): RateParse {
  if (value === null) return { kind: "rate", rate: null };
  if (typeof value === "number") {
    return { kind: "rate", rate: Number.isFinite(value) ? value : null };
  }

  const text = value.trim();
  if (!text || text.toLowerCase() === "null") return { kind: "rate", rate: null };
  if (text === MIN_PRICE_SENTINEL) return { kind: "rate", rate: MIN_PRICE_SENTINEL };
  if (/^nil$/i.test(text)) return { kind: "rate", rate: 0 };
  if (MIN_PRICE_PATTERNS.some((p) => p.test(text))) return { kind: "min_price", text };

  let compact = text.replace(/per\s*cent|percent|%/gi, "").replace(/\s+/g, "");
  if (/^[-+]?\d+,\d+$/.test(compact)) compact = compact.replace(",", ".");
  if (/^[-+]?\d+(?:\.\d+)?$/.test(compact)) return { kind: "rate", rate: Number(compact) };

  return { kind: "unparseable", text };
}

// ============================================================================
// DATES
// ============================================================================

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, sept: 9, oct: 10, nov: 11, dec: 12,
};

function monthNumber(name: string): number | null {
  const key = name.toLowerCase();
  return MONTHS[key] ?? MONTHS[key.slice(0, 3)] ?? null;
}

function formatDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * YYYY-MM-DD from ISO, YYYY/MM/DD, DD.MM.YYYY, "Month D, YYYY" or
 * "D Month YYYY". Anything else (or an impossible date) is null.
 */
export function normalizeDate(value: string | null): string | null {
  const text = cleanText(value);
  if (text === null) return null;

  let m = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ][\d:.]+Z?)?$/.exec(text);
  if (m) return formatDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(text);
  if (m) return formatDate(Number(m[3]), Number(m[2]), Number(m[1]));

  m = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(text);
  if (m) {
    const month = monthNumber(m[1]);
    return month === null ? null : formatDate(Number(m[3]), month, Number(m[2]));
  }

  m = /^(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})$/.exec(text);
  if (m) {
    const month = monthNumber(m[2]);
    return month === null ? null : formatDate(Number(m[3]), month, Number(m[1]));
  }

  return null;
}

// ============================================================================
// NORMALIZER
// ============================================================================

export interface NormalizationResult {
  record: CandidateRecord;
  annotations: NormalizationAnnotation[];
}

export interface FieldNormalizerOptions {
  countries?: CountryDirectory;
  strategy?: JurisdictionStrategy;
  /** Two-digit chapters accepted for product codes; empty accepts all. */
  chapterAllowlist?: readonly string[];
}

/**
 * Field Normalizer class
 *
 * Provides methods for:
 * - Country / jurisdiction synonym canonicalization
 * - Case identifier, rate, date and product-code canonicalization
 * - Jurisdiction-specific record cleanup
 */
export class FieldNormalizer {
  private readonly countries: CountryDirectory;
  private readonly strategy: JurisdictionStrategy;
  private readonly chapterAllowlist: readonly string[];

  constructor(options: FieldNormalizerOptions = {}) {
    this.countries = options.countries ?? getCountryDirectory();
    this.strategy = options.strategy ?? getJurisdictionStrategy("default");
    this.chapterAllowlist = options.chapterAllowlist ?? [];
  }

  normalizeCountry(value: string | null): string | null {
    return this.countries.canonicalize(value);
  }

  normalize(raw: RawCandidateRecord): NormalizationResult {
    const annotations: NormalizationAnnotation[] = [];
    const reject = (field: FactField, value: string, reason: NormalizationAnnotation["reason"], detail?: string) => {
      annotations.push(detail === undefined ? { field, value, reason } : { field, value, reason, detail });
    };

    const record: CandidateRecord = {
      issuingCountry: this.canonicalCountry("issuingCountry", raw.issuingCountry, reject),
      country: this.canonicalCountry("country", raw.country, reject),
      hsCode: null,
      tariffType: normalizeTariffType(raw.tariffType),
      tariffRate: null,
      effectiveDateFrom: null,
      effectiveDateTo: null,
      investigationPeriodFrom: null,
      investigationPeriodTo: null,
      basisLaw: cleanText(raw.basisLaw),
      company: cleanText(raw.company),
      caseNumber: null,
      productDescription: cleanText(raw.productDescription),
      note: cleanText(raw.note),
    };

    const caseText = cleanText(raw.caseNumber);
    if (caseText !== null) {
      record.caseNumber = normalizeCaseNumber(caseText);
      if (record.caseNumber === null) reject("caseNumber", caseText, "invalid_case_number");
    }

    const codeText = cleanText(raw.hsCode);
    if (codeText !== null) {
      const check = this.strategy.normalizeCode(codeText, this.chapterAllowlist);
      if (check.ok) record.hsCode = check.code;
      else reject("hsCode", codeText, "invalid_code", check.reason);
    }

    const rate = parseTariffRate(raw.tariffRate);
    if (rate.kind === "rate") {
      record.tariffRate = rate.rate;
    } else if (rate.kind === "min_price") {
      record.tariffRate = MIN_PRICE_SENTINEL;
      record.note ??= rate.text;
    } else {
      record.note ??= rate.text;
      reject("tariffRate", rate.text, "unparseable_rate");
    }

    for (const field of DATE_FIELDS) {
      const dateText = cleanText(raw[field]);
      if (dateText === null) continue;
      record[field] = normalizeDate(dateText);
      if (record[field] === null) reject(field, dateText, "invalid_date");
    }

    const adjusted = this.strategy.normalizeRecord(record);
    annotations.push(...adjusted.annotations);

    if (annotations.length > 0) {
      debugLog(`[Normalizer] ${annotations.length} value(s) nulled`, annotations);
    }
    return { record: adjusted.record, annotations };
  }

  private canonicalCountry(
    field: FactField,
    value: string | null,
    reject: (field: FactField, value: string, reason: NormalizationAnnotation["reason"]) => void,
  ): string | null {
    const text = cleanText(value);
    if (text === null) return null;
    const canonical = this.countries.canonicalize(text);
    if (canonical === null) reject(field, text, "placeholder");
    return canonical;
  }
}
