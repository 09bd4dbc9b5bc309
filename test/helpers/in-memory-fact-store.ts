/**
 * In-process FactStore for unit tests. Sessions apply writes directly;
 * a rejected session restores the snapshot taken when it started.
 */

import type { FactSession, FactStore, StoreStats, StoredDocument } from "@/lib/fact-store";
import { FactStoreError } from "@/lib/error-classification";
import type { CandidateRecord, CanonicalFact, DocumentMetadata, FactPatch } from "@/lib/reconciler/types";

export type FailurePredicate = (operation: "insert" | "update", detail: { record?: CandidateRecord; factId?: number }) => boolean;

function constraintError(): Error {
  return Object.assign(new Error("SQLITE_CONSTRAINT: constraint failed"), { code: "SQLITE_CONSTRAINT" });
}

export class InMemoryFactSession implements FactSession {
  constructor(private readonly store: InMemoryFactStore) {}

  async fetchByDocument(documentId: string): Promise<CanonicalFact[]> {
    return this.store.facts.filter((f) => f.documentId === documentId).map((f) => ({ ...f }));
  }

  async fetchByGroupingKey(groupingKey: string): Promise<CanonicalFact[]> {
    return this.store.facts.filter((f) => f.caseNumber === groupingKey).map((f) => ({ ...f }));
  }

  async insert(documentId: string, record: CandidateRecord): Promise<CanonicalFact> {
    if (this.store.failWhen?.("insert", { record })) throw new FactStoreError("insert", constraintError());
    const fact: CanonicalFact = { ...record, id: this.store.nextId++, documentId, createdAt: "2024-01-01T00:00:00.000Z" };
    this.store.facts.push(fact);
    return { ...fact };
  }

  async update(factId: number, patch: FactPatch): Promise<void> {
    if (this.store.failWhen?.("update", { factId })) throw new FactStoreError("update", constraintError());
    this.store.facts = this.store.facts.map((f) => (f.id === factId ? { ...f, ...patch } : f));
    this.store.updates.push({ factId, patch });
  }

  async count(documentId?: string): Promise<number> {
    return documentId === undefined
      ? this.store.facts.length
      : this.store.facts.filter((f) => f.documentId === documentId).length;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const before = this.store.facts.length;
    this.store.facts = this.store.facts.filter((f) => f.documentId !== documentId);
    return before - this.store.facts.length;
  }

  async registerDocument(document: DocumentMetadata, processingMode: string): Promise<void> {
    this.store.documents.set(document.documentId, {
      documentId: document.documentId,
      issuingCountry: document.issuingCountry,
      jurisdiction: document.jurisdiction,
      caseNumber: document.caseNumber,
      stage: document.stage,
      processingMode,
      registeredAt: "2024-01-01T00:00:00.000Z",
    });
  }
}

export class InMemoryFactStore implements FactStore {
  facts: CanonicalFact[] = [];
  nextId = 1;
  readonly documents = new Map<string, StoredDocument>();
  readonly updates: Array<{ factId: number; patch: FactPatch }> = [];
  failWhen: FailurePredicate | null = null;

  session(): InMemoryFactSession {
    return new InMemoryFactSession(this);
  }

  async withSession<T>(fn: (session: FactSession) => Promise<T>): Promise<T> {
    const snapshot = this.facts.map((f) => ({ ...f }));
    const nextId = this.nextId;
    try {
      return await fn(this.session());
    } catch (err) {
      this.facts = snapshot;
      this.nextId = nextId;
      throw err;
    }
  }

  async getStats(): Promise<StoreStats> {
    const factsByIssuingCountry: Record<string, number> = {};
    for (const fact of this.facts) {
      const key = fact.issuingCountry ?? "unknown";
      factsByIssuingCountry[key] = (factsByIssuingCountry[key] ?? 0) + 1;
    }
    return { documents: this.documents.size, facts: this.facts.length, factsByIssuingCountry };
  }

  async getDocument(documentId: string): Promise<StoredDocument | null> {
    return this.documents.get(documentId) ?? null;
  }

  async close(): Promise<void> {
    this.facts = [];
  }
}
