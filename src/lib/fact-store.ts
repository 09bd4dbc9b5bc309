/**
 * Tariff Fact Store
 *
 * SQLite-based storage for canonical tariff facts and the documents they
 * came from. Two tables: documents (one row per processed file) and
 * tariff_facts (one row per canonical fact). All reconciliation writes go
 * through a FactSession, which wraps one transaction.
 *
 * @module fact-store
 */

import sqlite3 from "sqlite3";
import { open, Database } from "sqlite";
import path from "path";
import { FactStoreError } from "./error-classification";
import { GroupLock } from "./reconciler/group-lock";
import {
  FACT_FIELDS,
  MIN_PRICE_SENTINEL,
  type CandidateRecord,
  type CanonicalFact,
  type DeterminationStage,
  type DocumentMetadata,
  type FactField,
  type FactPatch,
  type JurisdictionId,
  type TariffRate,
} from "./reconciler/types";

// ============================================================================
// TYPES
// ============================================================================

/** Read/write contract used by the reconciler. One session = one transaction. */
export interface FactSession {
  fetchByDocument(documentId: string): Promise<CanonicalFact[]>;
  fetchByGroupingKey(groupingKey: string): Promise<CanonicalFact[]>;
  insert(documentId: string, record: CandidateRecord): Promise<CanonicalFact>;
  update(factId: number, patch: FactPatch): Promise<void>;
  count(documentId?: string): Promise<number>;
  deleteByDocument(documentId: string): Promise<number>;
  registerDocument(document: DocumentMetadata, processingMode: string): Promise<void>;
}

export interface StoreStats {
  documents: number;
  facts: number;
  /** Fact count per issuing jurisdiction (null jurisdiction keyed "unknown"). */
  factsByIssuingCountry: Record<string, number>;
}

export interface FactStore {
  /**
   * Run `fn` inside one transaction. Commits when `fn` resolves, rolls back
   * and rethrows when it rejects. Sessions never overlap.
   */
  withSession<T>(fn: (session: FactSession) => Promise<T>): Promise<T>;
  getStats(): Promise<StoreStats>;
  getDocument(documentId: string): Promise<StoredDocument | null>;
  close(): Promise<void>;
}

export interface StoredDocument {
  documentId: string;
  issuingCountry: string | null;
  jurisdiction: JurisdictionId;
  caseNumber: string | null;
  stage: DeterminationStage | null;
  processingMode: string;
  registeredAt: string;
}

interface TariffFactRow {
  fact_id: number;
  document_id: string;
  issuing_country: string | null;
  country: string | null;
  hs_code: string | null;
  tariff_type: string | null;
  tariff_rate: number | string | null;
  effective_date_from: string | null;
  effective_date_to: string | null;
  investigation_period_from: string | null;
  investigation_period_to: string | null;
  basis_law: string | null;
  company: string | null;
  case_number: string | null;
  product_description: string | null;
  note: string | null;
  created_at: string;
}

interface DocumentRow {
  document_id: string;
  issuing_country: string | null;
  jurisdiction: string;
  case_number: string | null;
  stage: string | null;
  processing_mode: string;
  registered_at: string;
}

/** Record field → column. */
const FIELD_COLUMNS: Record<FactField, string> = {
  issuingCountry: "issuing_country",
  country: "country",
  hsCode: "hs_code",
  tariffType: "tariff_type",
  tariffRate: "tariff_rate",
  effectiveDateFrom: "effective_date_from",
  effectiveDateTo: "effective_date_to",
  investigationPeriodFrom: "investigation_period_from",
  investigationPeriodTo: "investigation_period_to",
  basisLaw: "basis_law",
  company: "company",
  caseNumber: "case_number",
  productDescription: "product_description",
  note: "note",
};

const JURISDICTIONS: readonly JurisdictionId[] = ["default", "usa", "eu", "malaysia", "australia"];

// ============================================================================
// DATABASE SETUP
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    document_id TEXT PRIMARY KEY,
    issuing_country TEXT,
    jurisdiction TEXT NOT NULL,
    case_number TEXT,
    stage TEXT,
    processing_mode TEXT NOT NULL,
    registered_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tariff_facts (
    fact_id INTEGER PRIMARY KEY AUTOINCREMENT,
    document_id TEXT NOT NULL,
    issuing_country TEXT,
    country TEXT,
    hs_code TEXT,
    tariff_type TEXT,
    tariff_rate REAL,
    effective_date_from TEXT,
    effective_date_to TEXT,
    investigation_period_from TEXT,
    investigation_period_to TEXT,
    basis_law TEXT,
    company TEXT,
    case_number TEXT,
    product_description TEXT,
    note TEXT,
    created_at TEXT NOT NULL,
    FOREIGN KEY (document_id) REFERENCES documents(document_id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_tariff_facts_document
    ON tariff_facts(document_id);
  CREATE INDEX IF NOT EXISTS idx_tariff_facts_case
    ON tariff_facts(case_number);
`;

// ============================================================================
// ROW MAPPING
// ============================================================================

function toTariffRate(value: number | string | null): TariffRate | null {
  if (value === null) return null;
  if (typeof value === "number") return value;
  if (value === MIN_PRICE_SENTINEL) return MIN_PRICE_SENTINEL;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function rowToFact(row: TariffFactRow): CanonicalFact {
  return {
    id: row.fact_id,
    documentId: row.document_id,
    issuingCountry: row.issuing_country,
    country: row.country,
    hsCode: row.hs_code,
    tariffType: row.tariff_type,
    tariffRate: toTariffRate(row.tariff_rate),
    effectiveDateFrom: row.effective_date_from,
    effectiveDateTo: row.effective_date_to,
    investigationPeriodFrom: row.investigation_period_from,
    investigationPeriodTo: row.investigation_period_to,
    basisLaw: row.basis_law,
    company: row.company,
    caseNumber: row.case_number,
    productDescription: row.product_description,
    note: row.note,
    createdAt: row.created_at,
  };
}

function toJurisdictionId(value: string): JurisdictionId {
  return JURISDICTIONS.find((id) => id === value) ?? "default";
}

function toStage(value: string | null): DeterminationStage | null {
  return value === "preliminary" || value === "final" ? value : null;
}

function rowToDocument(row: DocumentRow): StoredDocument {
  return {
    documentId: row.document_id,
    issuingCountry: row.issuing_country,
    jurisdiction: toJurisdictionId(row.jurisdiction),
    caseNumber: row.case_number,
    stage: toStage(row.stage),
    processingMode: row.processing_mode,
    registeredAt: row.registered_at,
  };
}

function patchEntries(patch: FactPatch): Array<[FactField, string | number | null]> {
  const entries: Array<[FactField, string | number | null]> = [];
  for (const field of FACT_FIELDS) {
    const value = patch[field];
    if (value !== undefined) entries.push([field, value]);
  }
  return entries;
}

// ============================================================================
// SESSION
// ============================================================================

class SqliteFactSession implements FactSession {
  constructor(private readonly db: Database) {}

  async fetchByDocument(documentId: string): Promise<CanonicalFact[]> {
    try {
      const rows = await this.db.all<TariffFactRow[]>(
        "SELECT * FROM tariff_facts WHERE document_id = ? ORDER BY fact_id",
        [documentId],
      );
      return rows.map(rowToFact);
    } catch (err) {
      throw new FactStoreError("fetchByDocument", err);
    }
  }

  async fetchByGroupingKey(groupingKey: string): Promise<CanonicalFact[]> {
    try {
      const rows = await this.db.all<TariffFactRow[]>(
        "SELECT * FROM tariff_facts WHERE case_number = ? ORDER BY fact_id",
        [groupingKey],
      );
      return rows.map(rowToFact);
    } catch (err) {
      throw new FactStoreError("fetchByGroupingKey", err);
    }
  }

  async insert(documentId: string, record: CandidateRecord): Promise<CanonicalFact> {
    const createdAt = new Date().toISOString();
    const columns = FACT_FIELDS.map((field) => FIELD_COLUMNS[field]);
    const values = FACT_FIELDS.map((field) => record[field]);
    try {
      const result = await this.db.run(
        `INSERT INTO tariff_facts (document_id, ${columns.join(", ")}, created_at)
         VALUES (?, ${columns.map(() => "?").join(", ")}, ?)`,
        [documentId, ...values, createdAt],
      );
      if (result.lastID === undefined) {
        throw new Error("insert returned no row id");
      }
      return { ...record, id: result.lastID, documentId, createdAt };
    } catch (err) {
      throw new FactStoreError("insert", err);
    }
  }

  async update(factId: number, patch: FactPatch): Promise<void> {
    const entries = patchEntries(patch);
    if (entries.length === 0) return;
    const assignments = entries.map(([field]) => `${FIELD_COLUMNS[field]} = ?`).join(", ");
    try {
      await this.db.run(
        `UPDATE tariff_facts SET ${assignments} WHERE fact_id = ?`,
        [...entries.map(([, value]) => value), factId],
      );
    } catch (err) {
      throw new FactStoreError("update", err);
    }
  }

  async count(documentId?: string): Promise<number> {
    try {
      const row =
        documentId === undefined
          ? await this.db.get<{ n: number }>("SELECT COUNT(*) AS n FROM tariff_facts")
          : await this.db.get<{ n: number }>(
              "SELECT COUNT(*) AS n FROM tariff_facts WHERE document_id = ?",
              [documentId],
            );
      return row?.n ?? 0;
    } catch (err) {
      throw new FactStoreError("count", err);
    }
  }

  async deleteByDocument(documentId: string): Promise<number> {
    try {
      const result = await this.db.run("DELETE FROM tariff_facts WHERE document_id = ?", [documentId]);
      return result.changes ?? 0;
    } catch (err) {
      throw new FactStoreError("deleteByDocument", err);
    }
  }

  async registerDocument(document: DocumentMetadata, processingMode: string): Promise<void> {
    try {
      await this.db.run(
        `INSERT INTO documents (document_id, issuing_country, jurisdiction, case_number, stage, processing_mode, registered_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(document_id) DO UPDATE SET
           issuing_country = excluded.issuing_country,
           jurisdiction = excluded.jurisdiction,
           case_number = excluded.case_number,
           stage = excluded.stage,
           processing_mode = excluded.processing_mode,
           registered_at = excluded.registered_at`,
        [
          document.documentId,
          document.issuingCountry,
          document.jurisdiction,
          document.caseNumber,
          document.stage,
          processingMode,
          new Date().toISOString(),
        ],
      );
    } catch (err) {
      throw new FactStoreError("registerDocument", err);
    }
  }
}

// ============================================================================
// STORE
// ============================================================================

const SESSION_KEY = "session";

export class SqliteFactStore implements FactStore {
  private readonly sessionLock = new GroupLock();

  private constructor(private readonly db: Database) {}

  /**
   * Open (and create if needed) a fact database. Pass ":memory:" for an
   * in-process database.
   */
  static async open(dbPath: string): Promise<SqliteFactStore> {
    const filename = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
    console.log(`[Fact-Store] Opening database at ${filename}`);

    const db = await open({
      filename,
      driver: sqlite3.Database,
    });

    if (filename !== ":memory:") {
      await db.exec("PRAGMA journal_mode=WAL");
    }
    await db.exec("PRAGMA foreign_keys=ON");
    await db.exec(SCHEMA_SQL);

    return new SqliteFactStore(db);
  }

  async withSession<T>(fn: (session: FactSession) => Promise<T>): Promise<T> {
    return this.sessionLock.runExclusive([SESSION_KEY], async () => {
      await this.db.exec("BEGIN");
      try {
        const result = await fn(new SqliteFactSession(this.db));
        await this.db.exec("COMMIT");
        return result;
      } catch (err) {
        try {
          await this.db.exec("ROLLBACK");
        } catch (rollbackErr) {
          console.error("[Fact-Store] Rollback failed", rollbackErr);
        }
        throw err;
      }
    });
  }

  async getStats(): Promise<StoreStats> {
    try {
      const documents = await this.db.get<{ n: number }>("SELECT COUNT(*) AS n FROM documents");
      const facts = await this.db.get<{ n: number }>("SELECT COUNT(*) AS n FROM tariff_facts");
      const grouped = await this.db.all<Array<{ issuing_country: string | null; n: number }>>(
        `SELECT issuing_country, COUNT(*) AS n FROM tariff_facts
         GROUP BY issuing_country ORDER BY issuing_country`,
      );
      const factsByIssuingCountry: Record<string, number> = {};
      for (const row of grouped) {
        factsByIssuingCountry[row.issuing_country ?? "unknown"] = row.n;
      }
      return {
        documents: documents?.n ?? 0,
        facts: facts?.n ?? 0,
        factsByIssuingCountry,
      };
    } catch (err) {
      throw new FactStoreError("getStats", err);
    }
  }

  async getDocument(documentId: string): Promise<StoredDocument | null> {
    try {
      const row = await this.db.get<DocumentRow>("SELECT * FROM documents WHERE document_id = ?", [documentId]);
      return row ? rowToDocument(row) : null;
    } catch (err) {
      throw new FactStoreError("getDocument", err);
    }
  }

  /**
   * Close database connection (for cleanup)
   */
  async close(): Promise<void> {
    await this.db.close();
  }
}

/** Store statistics: documents, facts, and facts per issuing jurisdiction. */
export async function getStoreStats(store: FactStore): Promise<StoreStats> {
  return store.getStats();
}
