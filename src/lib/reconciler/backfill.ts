/**
 * Grouping-Key Back-fill
 *
 * Facts from different documents of the same case (grouping key) inherit
 * missing values from each other: a preliminary determination names the
 * product codes, the final one the definitive rates. Only null fields are
 * filled; a fill that would give a fact the identity tuple of another fact
 * of the same document is skipped.
 *
 * @module reconciler/backfill
 */

import type { FactSession } from "../fact-store";
import { classifyStoreError } from "../error-classification";
import { debugLog } from "./debug";
import { describeIdentity, identityKey } from "./reconciliation-merger";
import {
  FACT_FIELDS,
  IDENTITY_FIELDS,
  copyField,
  emptyBackfillStats,
  toCandidateRecord,
  type BackfillStats,
  type CanonicalFact,
  type FactField,
  type FactPatch,
} from "./types";

// ============================================================================
// CONFIGURATION
// ============================================================================

export type CodeInheritanceMode = "fill" | "expand";

/** Fields that identify the party or the case are never inherited. */
export const DEFAULT_BACKFILL_FIELDS: readonly FactField[] = FACT_FIELDS.filter(
  (field) => field !== "company" && field !== "country" && field !== "caseNumber",
);

export interface BackfillOptions {
  fields?: readonly FactField[];
  /**
   * "fill": a null code is filled like any other field.
   * "expand": a null code takes the first distinct code of the case and
   * copies of the fact are inserted for the remaining codes.
   */
  codeInheritance?: CodeInheritanceMode;
}

const IDENTITY_SET: ReadonlySet<FactField> = new Set<FactField>(IDENTITY_FIELDS);

// ============================================================================
// DONOR SELECTION
// ============================================================================

/**
 * Sibling supplying `field` for `fact`: same company and country first,
 * then same company, then the first sibling holding a value.
 */
export function pickDonor(
  facts: readonly CanonicalFact[],
  fact: CanonicalFact,
  field: FactField,
): CanonicalFact | undefined {
  const candidates = facts.filter((other) => other.id !== fact.id && other[field] !== null);
  return (
    candidates.find((other) => other.company === fact.company && other.country === fact.country) ??
    candidates.find((other) => other.company === fact.company) ??
    candidates[0]
  );
}

/** Another fact of the same document already has this identity tuple. */
function collides(facts: readonly CanonicalFact[], candidate: CanonicalFact): boolean {
  const key = identityKey(candidate);
  return facts.some(
    (other) => other.id !== candidate.id && other.documentId === candidate.documentId && identityKey(other) === key,
  );
}

function distinctCodes(facts: readonly CanonicalFact[]): string[] {
  const codes: string[] = [];
  for (const fact of facts) {
    if (fact.hsCode !== null && !codes.includes(fact.hsCode)) codes.push(fact.hsCode);
  }
  return codes;
}

// ============================================================================
// BACK-FILL
// ============================================================================

/**
 * Fill null fields across every fact sharing `groupingKey`.
 * Per-fact store failures are logged and counted; the pass continues.
 */
export async function backfillGroup(
  session: FactSession,
  groupingKey: string,
  options: BackfillOptions = {},
): Promise<BackfillStats> {
  const fields = options.fields ?? DEFAULT_BACKFILL_FIELDS;
  const mode = options.codeInheritance ?? "fill";
  const stats = emptyBackfillStats();

  let facts = await session.fetchByGroupingKey(groupingKey);
  if (facts.length < 2) return stats;

  const caseCodes = distinctCodes(facts);
  const snapshot = [...facts];

  for (const original of snapshot) {
    let current = facts.find((f) => f.id === original.id) ?? original;
    const patch: FactPatch = {};

    for (const field of fields) {
      if (current[field] !== null) continue;

      if (field === "hsCode" && mode === "expand") {
        const code = caseCodes.find((c) => !collides(facts, { ...current, hsCode: c }));
        if (code === undefined) {
          if (caseCodes.length > 0) stats.collisionsSkipped++;
          continue;
        }
        patch.hsCode = code;
        current = { ...current, hsCode: code };
        continue;
      }

      const donor = pickDonor(facts, current, field);
      if (!donor) continue;

      const next: CanonicalFact = { ...current };
      copyField(next, donor, field);
      if (IDENTITY_SET.has(field) && collides(facts, next)) {
        stats.collisionsSkipped++;
        continue;
      }
      copyField(patch, donor, field);
      current = next;
    }

    const filled = Object.keys(patch).length;
    if (filled === 0) continue;

    try {
      await session.update(current.id, patch);
      facts = facts.map((f) => (f.id === current.id ? current : f));
      stats.factsUpdated++;
      stats.fieldsFilled += filled;
    } catch (err) {
      stats.errors++;
      console.error(
        `[Backfill] Update rejected for fact ${current.id} of ${current.documentId} (${classifyStoreError(err)})`,
        describeIdentity(current),
        err,
      );
      continue;
    }

    if (mode === "expand" && patch.hsCode !== undefined) {
      const inserted = await insertCodeCopies(session, current, caseCodes, facts, stats);
      facts = [...facts, ...inserted];
    }
  }

  if (stats.fieldsFilled > 0 || stats.errors > 0) {
    debugLog(`[Backfill] Group ${groupingKey}`, stats);
  }
  return stats;
}

/** "expand" mode: one copy of `fact` per remaining case code. */
async function insertCodeCopies(
  session: FactSession,
  fact: CanonicalFact,
  caseCodes: readonly string[],
  facts: readonly CanonicalFact[],
  stats: BackfillStats,
): Promise<CanonicalFact[]> {
  const inserted: CanonicalFact[] = [];
  for (const code of caseCodes) {
    if (code === fact.hsCode) continue;
    const copy: CanonicalFact = { ...fact, id: -1, hsCode: code };
    if (collides([...facts, ...inserted], copy)) {
      stats.collisionsSkipped++;
      continue;
    }
    try {
      inserted.push(await session.insert(fact.documentId, toCandidateRecord(copy)));
      stats.factsInserted++;
    } catch (err) {
      stats.errors++;
      console.error(
        `[Backfill] Copy rejected for ${fact.documentId} (${classifyStoreError(err)})`,
        describeIdentity(copy),
        err,
      );
    }
  }
  return inserted;
}
