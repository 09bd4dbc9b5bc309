/**
 * Reconciliation Pipeline
 *
 * Per document: recover payloads → normalize fields → expand by code set →
 * dedupe candidates → merge into the document's facts → back-fill every case
 * the document touched → dedupe the final fact set.
 *
 * Writes for one case identifier are serialized through a GroupLock; every
 * store write runs inside a FactStore session (one transaction).
 *
 * @module reconciler/reconciliation-pipeline
 */

import type { FactSession, FactStore } from "../fact-store";
import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from "../config-schemas";
import type { CountryDirectory } from "./country-names";
import { backfillGroup } from "./backfill";
import { debugLog } from "./debug";
import { dedupeRecords } from "./deduplication";
import { detectDocumentMetadata } from "./document-metadata";
import { FieldNormalizer } from "./field-normalization";
import { GroupLock } from "./group-lock";
import { discoverCodes, getJurisdictionStrategy, type JurisdictionStrategy } from "./jurisdictions";
import { parseExtractionPayload, type ParseQuality } from "./json";
import { ReconciliationMerger } from "./reconciliation-merger";
import {
  emptyBackfillStats,
  emptyMergeStats,
  type BackfillStats,
  type CandidateRecord,
  type CanonicalFact,
  type DocumentMetadata,
  type MergeStats,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface DocumentInput {
  fileName: string;
  /** Raw extraction payloads, one per page batch, in page order. */
  batches: readonly string[];
  /** Page text used for product-code discovery. */
  documentText?: string;
  /** Delete the document's facts before merging (full reprocessing). */
  replace?: boolean;
}

export interface BatchReport {
  index: number;
  quality: ParseQuality;
  items: number;
  codes: number;
  annotations: number;
}

export type DocumentReconciliationResult =
  | {
      ok: true;
      documentId: string;
      issuingCountry: string | null;
      metadata: DocumentMetadata;
      batches: BatchReport[];
      merge: MergeStats;
      backfill: BackfillStats;
      annotations: number;
      facts: CanonicalFact[];
    }
  | {
      ok: false;
      documentId: string;
      reason: "no_candidates";
      batches: BatchReport[];
    };

export interface ReconcileOptions {
  config?: ReconciliationConfig;
  lock?: GroupLock;
  countries?: CountryDirectory;
}

/** Shared across documents processed in this process. */
const defaultGroupLock = new GroupLock();

const MERGE_OUTCOMES = ["inserted", "merged", "unchanged", "error"] as const;
const BACKFILL_COUNTS = ["factsUpdated", "fieldsFilled", "factsInserted", "collisionsSkipped", "errors"] as const;

function addCounts<K extends string>(target: Record<K, number>, delta: Record<K, number>, keys: readonly K[]): void {
  for (const key of keys) target[key] += delta[key];
}

// ============================================================================
// DOCUMENT RECONCILER
// ============================================================================

/**
 * Document Reconciler class
 *
 * Holds the state of one document across its page batches. Batches may be
 * ingested and merged as they arrive; finalize() runs the back-fill and
 * returns the final fact set.
 */
export class DocumentReconciler {
  readonly metadata: DocumentMetadata;
  readonly strategy: JurisdictionStrategy;

  private readonly config: ReconciliationConfig;
  private readonly lock: GroupLock;
  private readonly normalizer: FieldNormalizer;
  private readonly replace: boolean;

  private pending: CandidateRecord[] = [];
  private codes: string[] = [];
  private issuingCountry: string | null;
  private issuerResolved = false;
  private registered = false;
  private readonly groups = new Set<string>();

  readonly batches: BatchReport[] = [];
  readonly mergeStats: MergeStats = emptyMergeStats();
  readonly backfillStats: BackfillStats = emptyBackfillStats();
  annotationCount = 0;

  constructor(
    private readonly store: FactStore,
    fileName: string,
    options: ReconcileOptions & { replace?: boolean } = {},
  ) {
    this.config = options.config ?? DEFAULT_RECONCILIATION_CONFIG;
    this.lock = options.lock ?? defaultGroupLock;
    this.replace = options.replace ?? false;
    this.metadata = detectDocumentMetadata(fileName);
    this.strategy = getJurisdictionStrategy(this.metadata.jurisdiction);
    this.normalizer = new FieldNormalizer({
      countries: options.countries,
      strategy: this.strategy,
      chapterAllowlist: this.config.codeChapterAllowlist,
    });
    this.issuingCountry = this.normalizer.normalizeCountry(this.metadata.issuingCountry);
    this.issuerResolved = this.issuingCountry !== null;
  }

  get documentId(): string {
    return this.metadata.documentId;
  }

  get resolvedIssuingCountry(): string | null {
    return this.issuingCountry;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get knownCodes(): string[] {
    return [...this.codes];
  }

  private addCodes(codes: readonly string[]): void {
    for (const code of codes) {
      if (!this.codes.includes(code)) this.codes.push(code);
    }
  }

  /** Add codes found in page text with the jurisdiction's pattern. */
  scanText(text: string): string[] {
    const found = discoverCodes(text, this.strategy, this.config.codeChapterAllowlist);
    this.addCodes(found);
    return found;
  }

  /**
   * Recover and normalize one raw payload; records wait in the pending set
   * until the next merge.
   */
  ingest(raw: string): BatchReport {
    const parsed = parseExtractionPayload(raw, { itemsField: this.config.itemsField });

    const payloadCodes: string[] = [];
    for (const code of parsed.codes) {
      const check = this.strategy.normalizeCode(code, this.config.codeChapterAllowlist);
      if (check.ok) payloadCodes.push(check.code);
    }
    this.addCodes(payloadCodes);

    let annotations = 0;
    for (const item of parsed.items) {
      const { record, annotations: notes } = this.normalizer.normalize(item);
      annotations += notes.length;
      this.pending.push(record);
    }
    this.annotationCount += annotations;

    const report: BatchReport = {
      index: this.batches.length,
      quality: parsed.quality,
      items: parsed.items.length,
      codes: payloadCodes.length,
      annotations,
    };
    this.batches.push(report);
    return report;
  }

  /**
   * The document's issuing jurisdiction: from the file name, else the first
   * one a record names. Fixed once resolved.
   */
  private resolveIssuingCountry(records: readonly CandidateRecord[]): string | null {
    if (!this.issuerResolved) {
      const named = records.find((r) => r.issuingCountry !== null);
      if (named) {
        this.issuingCountry = named.issuingCountry;
        this.issuerResolved = true;
      }
    }
    return this.issuingCountry;
  }

  /** Expand and dedupe the pending records; empties the pending set. */
  private takePrepared(): CandidateRecord[] {
    const pending = this.pending;
    this.pending = [];
    const issuer = this.resolveIssuingCountry(pending);
    const scoped = pending.map((record) => ({
      ...record,
      issuingCountry: issuer,
      caseNumber: record.caseNumber ?? this.metadata.caseNumber,
    }));
    return dedupeRecords(this.strategy.expand(scoped, this.codes));
  }

  private async mergeUnlocked(session: FactSession, records: readonly CandidateRecord[]): Promise<MergeStats> {
    if (!this.registered) {
      await session.registerDocument(this.metadata, this.replace ? "replace" : "merge");
      if (this.replace) {
        const removed = await session.deleteByDocument(this.documentId);
        debugLog(`[Merger] Cleared ${removed} fact(s) of ${this.documentId} for reprocessing`);
      }
      this.registered = true;
    }

    const merger = new ReconciliationMerger(session, this.documentId, {
      refinementMatch: this.config.refinementMatch,
    });
    for (const record of records) {
      await merger.merge(record, record.caseNumber);
    }
    for (const group of merger.touchedGroups) this.groups.add(group);

    const stats = merger.stats;
    addCounts(this.mergeStats, stats, MERGE_OUTCOMES);
    return stats;
  }

  private async backfillUnlocked(session: FactSession): Promise<BackfillStats> {
    const total = emptyBackfillStats();
    if (!this.config.backfillEnabled) return total;
    for (const group of this.groups) {
      addCounts(total, await backfillGroup(session, group, { codeInheritance: this.config.codeInheritance }), BACKFILL_COUNTS);
    }
    addCounts(this.backfillStats, total, BACKFILL_COUNTS);
    return total;
  }

  private groupKeysOf(records: readonly CandidateRecord[]): string[] {
    const keys = new Set(this.groups);
    for (const record of records) {
      if (record.caseNumber !== null) keys.add(record.caseNumber);
    }
    return [...keys];
  }

  /**
   * Merge the pending records now (incremental batches).
   * Uses the codes known so far for expansion.
   */
  async reconcileBatch(): Promise<MergeStats> {
    const records = this.takePrepared();
    return this.lock.runExclusive(this.groupKeysOf(records), () =>
      this.store.withSession((session) => this.mergeUnlocked(session, records)),
    );
  }

  /**
   * Merge anything still pending, back-fill every touched case and return
   * the document's deduplicated fact set.
   */
  async finalize(): Promise<CanonicalFact[]> {
    const records = this.takePrepared();
    return this.lock.runExclusive(this.groupKeysOf(records), () =>
      this.store.withSession(async (session) => {
        if (records.length > 0 || !this.registered) await this.mergeUnlocked(session, records);
        await this.backfillUnlocked(session);
        return dedupeRecords(await session.fetchByDocument(this.documentId));
      }),
    );
  }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Reconcile a whole document: every batch is recovered and normalized first
 * so expansion sees the full code set, then merged and back-filled under the
 * locks of the cases it touches.
 */
export async function reconcileDocument(
  store: FactStore,
  input: DocumentInput,
  options: ReconcileOptions = {},
): Promise<DocumentReconciliationResult> {
  const reconciler = new DocumentReconciler(store, input.fileName, { ...options, replace: input.replace });

  if (input.documentText) reconciler.scanText(input.documentText);
  for (const batch of input.batches) reconciler.ingest(batch);

  if (reconciler.pendingCount === 0) {
    console.warn(`[Recovery] No candidate records recovered for ${reconciler.documentId}`);
    return { ok: false, documentId: reconciler.documentId, reason: "no_candidates", batches: reconciler.batches };
  }

  const facts = await reconciler.finalize();

  debugLog(`[Merger] Document ${reconciler.documentId} reconciled`, {
    merge: reconciler.mergeStats,
    backfill: reconciler.backfillStats,
    annotations: reconciler.annotationCount,
    facts: facts.length,
  });

  return {
    ok: true,
    documentId: reconciler.documentId,
    issuingCountry: reconciler.resolvedIssuingCountry,
    metadata: reconciler.metadata,
    batches: reconciler.batches,
    merge: { ...reconciler.mergeStats },
    backfill: { ...reconciler.backfillStats },
    annotations: reconciler.annotationCount,
    facts,
  };
}

/** Merge one incoming batch for a document being processed incrementally. */
export async function reconcileBatch(reconciler: DocumentReconciler, raw: string): Promise<MergeStats> {
  reconciler.ingest(raw);
  return reconciler.reconcileBatch();
}

/** Back-fill and final fact set for an incrementally processed document. */
export async function finalizeDocument(reconciler: DocumentReconciler): Promise<CanonicalFact[]> {
  return reconciler.finalize();
}
