/**
 * Combinatorial Expansion
 *
 * Extraction often reports one record per company while the product-code
 * list lives in a separate table. Expansion crosses the distinct party
 * templates with the code set so every persisted record names exactly one
 * (country, company, code) combination.
 *
 * @module reconciler/expansion
 */

import { debugLog } from "./debug";
import type { CandidateRecord } from "./types";

function templateKey(record: CandidateRecord): string {
  return JSON.stringify([record.country, record.company, record.tariffRate]);
}

/** Distinct values in first-seen order. */
export function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Unique party templates keyed by (country, company, rate).
 * The first record seen for a key is the template.
 */
export function collectTemplates(records: readonly CandidateRecord[]): CandidateRecord[] {
  const seen = new Set<string>();
  const templates: CandidateRecord[] = [];
  for (const record of records) {
    const key = templateKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    templates.push(record);
  }
  return templates;
}

/**
 * Cross `codes` with the record templates.
 *
 * Output is code-major: for each code (deduplicated, given order) every
 * template in first-seen order, with `hsCode` replaced. An empty code set
 * returns the input unchanged.
 */
export function expandByCodes(
  records: readonly CandidateRecord[],
  codes: readonly string[],
): CandidateRecord[] {
  const codeSet = uniqueInOrder(codes);
  if (codeSet.length === 0) return [...records];

  const templates = collectTemplates(records);
  const expanded: CandidateRecord[] = [];
  for (const code of codeSet) {
    for (const template of templates) {
      expanded.push({ ...template, hsCode: code });
    }
  }

  if (templates.length > 0) {
    debugLog("[Expansion] Expanded records", {
      records: records.length,
      templates: templates.length,
      codes: codeSet.length,
      output: expanded.length,
    });
  }
  return expanded;
}
