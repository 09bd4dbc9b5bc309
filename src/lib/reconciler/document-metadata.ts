/**
 * Document Metadata
 *
 * Derives issuing jurisdiction, case identifier and determination stage from
 * a source file name such as `USA_A-580-881_Prelim.pdf`.
 *
 * @module reconciler/document-metadata
 */

import * as path from "path";
import { normalizeCaseNumber } from "./field-normalization";
import type { DeterminationStage, DocumentMetadata, JurisdictionId } from "./types";

/** File-name prefix token → issuing jurisdiction and strategy. */
const ISSUER_PREFIXES: Record<string, { issuingCountry: string; jurisdiction: JurisdictionId }> = {
  USA: { issuingCountry: "USA", jurisdiction: "usa" },
  US: { issuingCountry: "USA", jurisdiction: "usa" },
  EU: { issuingCountry: "EU", jurisdiction: "eu" },
  MALAYSIA: { issuingCountry: "Malaysia", jurisdiction: "malaysia" },
  AUSTRALIA: { issuingCountry: "Australia", jurisdiction: "australia" },
  BRAZIL: { issuingCountry: "Brazil", jurisdiction: "default" },
  INDIA: { issuingCountry: "India", jurisdiction: "default" },
  TURKEY: { issuingCountry: "Turkey", jurisdiction: "default" },
  CANADA: { issuingCountry: "Canada", jurisdiction: "default" },
  PAKISTAN: { issuingCountry: "Pakistan", jurisdiction: "default" },
};

const STAGE_TOKENS: Record<string, DeterminationStage> = {
  PRE: "preliminary",
  PRELIM: "preliminary",
  PRELIMINARY: "preliminary",
  F: "final",
  FINAL: "final",
};

const CASE_TOKEN = /[A-Za-z][-\u2013\u2014]\d{3}[-\u2013\u2014]\d{3}/;

export function detectDocumentMetadata(fileName: string): DocumentMetadata {
  const base = path.basename(fileName);
  const stem = base.replace(/\.[A-Za-z0-9]+$/, "");
  const tokens = stem.split(/[_\s.]+/).filter(Boolean).map((t) => t.toUpperCase());

  const issuer = ISSUER_PREFIXES[tokens[0] ?? ""] ?? null;
  const caseMatch = CASE_TOKEN.exec(stem);

  let stage: DeterminationStage | null = null;
  for (const token of tokens) {
    const hit = STAGE_TOKENS[token];
    if (hit) {
      stage = hit;
      break;
    }
  }

  return {
    documentId: base,
    fileName: base,
    issuingCountry: issuer?.issuingCountry ?? null,
    jurisdiction: issuer?.jurisdiction ?? "default",
    caseNumber: caseMatch ? normalizeCaseNumber(caseMatch[0]) : null,
    stage,
  };
}
