/**
 * Reconciler - Shared Types
 *
 * Fixed record schema for extracted tariff facts. Payload keys arrive in
 * snake_case from the extraction service and are mapped onto these fields;
 * anything else is ignored.
 *
 * @module reconciler/types
 */

// ============================================================================
// FIELDS
// ============================================================================

/** Every field a candidate record or canonical fact carries, in output order. */
export const FACT_FIELDS = [
  "issuingCountry",
  "country",
  "hsCode",
  "tariffType",
  "tariffRate",
  "effectiveDateFrom",
  "effectiveDateTo",
  "investigationPeriodFrom",
  "investigationPeriodTo",
  "basisLaw",
  "company",
  "caseNumber",
  "productDescription",
  "note",
] as const;

export type FactField = (typeof FACT_FIELDS)[number];

/** Identity tuple positions (the owning document is implied by scope). */
export const IDENTITY_FIELDS = ["country", "company", "hsCode", "caseNumber"] as const satisfies readonly FactField[];

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export const DATE_FIELDS = [
  "effectiveDateFrom",
  "effectiveDateTo",
  "investigationPeriodFrom",
  "investigationPeriodTo",
] as const satisfies readonly FactField[];

/** Stored in place of a numeric rate when the duty is a minimum-price scheme. */
export const MIN_PRICE_SENTINEL = "MIN_PRICE";

export type TariffRate = number | typeof MIN_PRICE_SENTINEL;

/**
 * Field set shared by candidate records and canonical facts.
 * `R` is the rate representation: raw records may still hold rate text.
 */
export interface TariffRecordFields<R> {
  issuingCountry: string | null;
  country: string | null;
  hsCode: string | null;
  tariffType: string | null;
  tariffRate: R | null;
  effectiveDateFrom: string | null;
  effectiveDateTo: string | null;
  investigationPeriodFrom: string | null;
  investigationPeriodTo: string | null;
  basisLaw: string | null;
  company: string | null;
  caseNumber: string | null;
  productDescription: string | null;
  note: string | null;
}

/** Record as recovered from a payload, before normalization. */
export type RawCandidateRecord = TariffRecordFields<number | string>;

/** Normalized candidate record. */
export type CandidateRecord = TariffRecordFields<TariffRate>;

/** Persisted fact row. */
export interface CanonicalFact extends CandidateRecord {
  id: number;
  documentId: string;
  createdAt: string;
}

/** Null → non-null fills staged against an existing fact. */
export type FactPatch = Partial<CandidateRecord>;

export function emptyRecord(): CandidateRecord {
  return {
    issuingCountry: null,
    country: null,
    hsCode: null,
    tariffType: null,
    tariffRate: null,
    effectiveDateFrom: null,
    effectiveDateTo: null,
    investigationPeriodFrom: null,
    investigationPeriodTo: null,
    basisLaw: null,
    company: null,
    caseNumber: null,
    productDescription: null,
    note: null,
  };
}

/** Copy only the record fields (drops id / documentId / createdAt from facts). */
export function toCandidateRecord(source: CandidateRecord): CandidateRecord {
  const record = emptyRecord();
  for (const field of FACT_FIELDS) {
    copyField(record, source, field);
  }
  return record;
}

export function copyField<K extends FactField>(
  target: FactPatch,
  source: CandidateRecord,
  field: K,
): void {
  target[field] = source[field];
}

// ============================================================================
// ANNOTATIONS
// ============================================================================

export type AnnotationReason =
  | "placeholder"
  | "invalid_case_number"
  | "invalid_code"
  | "invalid_date"
  | "unparseable_rate"
  | "non_latin_company";

/** A value that failed canonicalization and was nulled on the record. */
export interface NormalizationAnnotation {
  field: FactField;
  value: string;
  reason: AnnotationReason;
  /** Extra detail, e.g. which code check failed. */
  detail?: string;
}

// ============================================================================
// DOCUMENTS
// ============================================================================

export type JurisdictionId = "default" | "usa" | "eu" | "malaysia" | "australia";

export type DeterminationStage = "preliminary" | "final";

export interface DocumentMetadata {
  /** Owning-document reference; the source file name. */
  documentId: string;
  fileName: string;
  issuingCountry: string | null;
  jurisdiction: JurisdictionId;
  caseNumber: string | null;
  stage: DeterminationStage | null;
}

// ============================================================================
// STATISTICS
// ============================================================================

export type MergeOutcome = "inserted" | "merged" | "unchanged" | "error";

export type MergeStats = Record<MergeOutcome, number>;

export function emptyMergeStats(): MergeStats {
  return { inserted: 0, merged: 0, unchanged: 0, error: 0 };
}

export interface BackfillStats {
  /** Facts that received at least one inherited value. */
  factsUpdated: number;
  /** Individual field fills. */
  fieldsFilled: number;
  /** Copies inserted by code-set inheritance ("expand" mode). */
  factsInserted: number;
  /** Fills skipped because they would duplicate an identity tuple. */
  collisionsSkipped: number;
  errors: number;
}

export function emptyBackfillStats(): BackfillStats {
  return { factsUpdated: 0, fieldsFilled: 0, factsInserted: 0, collisionsSkipped: 0, errors: 0 };
}
