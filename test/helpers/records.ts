import { emptyRecord, type CandidateRecord, type CanonicalFact, type RawCandidateRecord } from "@/lib/reconciler/types";

export function makeRecord(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
  return { ...emptyRecord(), ...overrides };
}

export function makeRawRecord(overrides: Partial<RawCandidateRecord> = {}): RawCandidateRecord {
  return { ...emptyRecord(), ...overrides };
}

export function makeFact(id: number, documentId: string, overrides: Partial<CandidateRecord> = {}): CanonicalFact {
  return { ...makeRecord(overrides), id, documentId, createdAt: "2024-01-01T00:00:00.000Z" };
}
