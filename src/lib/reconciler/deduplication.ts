/**
 * Record Deduplication
 *
 * Collapses records that are field-wise identical on the full output field
 * set. The first occurrence is kept and order is preserved.
 *
 * @module reconciler/deduplication
 */

import { FACT_FIELDS, type CandidateRecord } from "./types";

/** Deduplication key over every output field. */
export function recordKey(record: CandidateRecord): string {
  return JSON.stringify(FACT_FIELDS.map((field) => record[field]));
}

export function dedupeRecords<T extends CandidateRecord>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}
