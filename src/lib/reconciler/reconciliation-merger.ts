/**
 * Reconciliation Merger
 *
 * Folds normalized candidate records into the canonical facts of their
 * owning document. A record either creates a fact, fills null fields of an
 * existing one, or changes nothing. Non-null fact values are never
 * overwritten.
 *
 * @module reconciler/reconciliation-merger
 */

import type { FactSession } from "../fact-store";
import { classifyStoreError } from "../error-classification";
import {
  FACT_FIELDS,
  IDENTITY_FIELDS,
  copyField,
  emptyMergeStats,
  type CandidateRecord,
  type CanonicalFact,
  type FactPatch,
  type IdentityField,
  type MergeOutcome,
  type MergeStats,
} from "./types";

// ============================================================================
// IDENTITY
// ============================================================================

/** Identity tuple within a document; both-null positions compare equal. */
export function identityKey(record: CandidateRecord): string {
  return JSON.stringify(IDENTITY_FIELDS.map((field) => record[field]));
}

export function describeIdentity(record: CandidateRecord): Record<string, string | null> {
  return {
    country: record.country,
    company: record.company,
    hsCode: record.hsCode,
    caseNumber: record.caseNumber,
  };
}

/** Identity positions that must always match exactly; only the code may differ. */
const PARTY_FIELDS = ["country", "company", "caseNumber"] as const satisfies readonly IdentityField[];

function isSameParty(fact: CandidateRecord, record: CandidateRecord): boolean {
  return PARTY_FIELDS.every((field) => fact[field] === record[field]);
}

/**
 * True when the record names the code of a same-party fact whose code is
 * still null. Country, company and case number never refine.
 */
export function isRefinementOf(fact: CandidateRecord, record: CandidateRecord): boolean {
  return isSameParty(fact, record) && fact.hsCode === null && record.hsCode !== null;
}

/**
 * True when the record lacks only the code of a same-party fact that has one.
 * A record seen again after back-fill completed its fact matches this way.
 */
export function isSubsumedBy(fact: CandidateRecord, record: CandidateRecord): boolean {
  return isSameParty(fact, record) && record.hsCode === null && fact.hsCode !== null;
}

/** Null → non-null fills `record` offers `fact`, across every field. */
export function collectNullFills(fact: CandidateRecord, record: CandidateRecord): FactPatch {
  const patch: FactPatch = {};
  for (const field of FACT_FIELDS) {
    if (fact[field] === null && record[field] !== null) copyField(patch, record, field);
  }
  return patch;
}

export function isEmptyPatch(patch: FactPatch): boolean {
  return Object.keys(patch).length === 0;
}

// ============================================================================
// MERGER
// ============================================================================

export interface MergerOptions {
  /**
   * Besides exact identity matches, let a record match a same-party fact
   * when one of the two lacks the product code.
   */
  refinementMatch: boolean;
}

/**
 * Reconciliation Merger class
 *
 * One instance per document per session. Loads the document's facts once
 * and keeps the cached copy in step with every write it makes.
 */
export class ReconciliationMerger {
  private facts: CanonicalFact[] = [];
  private loaded = false;
  private readonly groups = new Set<string>();
  private readonly counts: MergeStats = emptyMergeStats();

  constructor(
    private readonly session: FactSession,
    readonly documentId: string,
    private readonly options: MergerOptions = { refinementMatch: true },
  ) {}

  get stats(): MergeStats {
    return { ...this.counts };
  }

  /** Grouping keys of every record merged so far. */
  get touchedGroups(): string[] {
    return [...this.groups];
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    this.facts = await this.session.fetchByDocument(this.documentId);
    this.loaded = true;
  }

  private findMatch(record: CandidateRecord): CanonicalFact | undefined {
    const key = identityKey(record);
    const exact = this.facts.find((fact) => identityKey(fact) === key);
    if (exact || !this.options.refinementMatch) return exact;
    return (
      this.facts.find((fact) => isRefinementOf(fact, record)) ??
      this.facts.find((fact) => isSubsumedBy(fact, record))
    );
  }

  /**
   * Merge one record. Store rejections are logged with the document and
   * identity tuple and reported as "error"; they never propagate.
   */
  async merge(record: CandidateRecord, groupingKey: string | null): Promise<MergeOutcome> {
    if (groupingKey !== null) this.groups.add(groupingKey);
    const outcome = await this.apply(record);
    this.counts[outcome]++;
    return outcome;
  }

  private async apply(record: CandidateRecord): Promise<MergeOutcome> {
    try {
      await this.load();
      const match = this.findMatch(record);

      if (!match) {
        const fact = await this.session.insert(this.documentId, record);
        this.facts.push(fact);
        return "inserted";
      }

      const patch = collectNullFills(match, record);
      if (isEmptyPatch(patch)) return "unchanged";

      await this.session.update(match.id, patch);
      this.facts = this.facts.map((fact) => (fact.id === match.id ? { ...fact, ...patch } : fact));
      return "merged";
    } catch (err) {
      console.error(
        `[Merger] Record rejected for document ${this.documentId} (${classifyStoreError(err)})`,
        describeIdentity(record),
        err,
      );
      return "error";
    }
  }
}

/**
 * Merge a single record into `documentId`'s facts.
 * Convenience wrapper over ReconciliationMerger for one-off merges.
 */
export async function mergeRecord(
  session: FactSession,
  record: CandidateRecord,
  documentId: string,
  groupingKey: string | null,
  options?: MergerOptions,
): Promise<MergeOutcome> {
  const merger = new ReconciliationMerger(session, documentId, options);
  return merger.merge(record, groupingKey);
}
