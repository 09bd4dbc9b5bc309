/**
 * Jurisdiction Strategy
 *
 * Capability interface for everything that differs per issuing jurisdiction:
 * product-code grammar, code discovery in document text, expansion order,
 * record post-processing and the extraction prompt.
 *
 * @module reconciler/jurisdictions/strategy
 */

import { expandByCodes } from "../expansion";
import type {
  CandidateRecord,
  JurisdictionId,
  NormalizationAnnotation,
} from "../types";

// ============================================================================
// TYPES
// ============================================================================

export type CodeRejection = "non_numeric" | "pattern" | "chapter";

export type CodeCheck =
  | { ok: true; code: string }
  | { ok: false; reason: CodeRejection };

export interface JurisdictionStrategy {
  readonly id: JurisdictionId;
  /** Full-match grammar for a cleaned product code. */
  readonly codePattern: RegExp;
  /** Global pattern used to find code candidates in document text. */
  readonly discoveryPattern: RegExp;
  normalizeCode(raw: string, chapterAllowlist: readonly string[]): CodeCheck;
  /** Jurisdiction-specific cleanup after generic field normalization. */
  normalizeRecord(record: CandidateRecord): { record: CandidateRecord; annotations: NormalizationAnnotation[] };
  expand(records: readonly CandidateRecord[], codes: readonly string[]): CandidateRecord[];
  extractPrompt(): string;
}

export interface StrategyDefinition {
  id: JurisdictionId;
  codePattern: RegExp;
  discoveryPattern: RegExp;
  prompt: () => string;
  /** Order the code set before expansion. */
  orderCodes?: (codes: readonly string[]) => string[];
  normalizeRecord?: JurisdictionStrategy["normalizeRecord"];
}

// ============================================================================
// FACTORY
// ============================================================================

/** Two-digit chapter of a code, from its leading digits. */
export function codeChapter(code: string): string {
  return code.replace(/\D/g, "").slice(0, 2);
}

export function createStrategy(definition: StrategyDefinition): JurisdictionStrategy {
  const { id, codePattern, discoveryPattern, prompt } = definition;
  return {
    id,
    codePattern,
    discoveryPattern,
    normalizeCode(raw: string, chapterAllowlist: readonly string[]): CodeCheck {
      const cleaned = raw.trim().replace(/\s+/g, " ");
      if (/[A-Za-z]/.test(cleaned)) return { ok: false, reason: "non_numeric" };
      if (!codePattern.test(cleaned)) return { ok: false, reason: "pattern" };
      if (chapterAllowlist.length > 0 && !chapterAllowlist.includes(codeChapter(cleaned))) {
        return { ok: false, reason: "chapter" };
      }
      return { ok: true, code: cleaned };
    },
    normalizeRecord: definition.normalizeRecord ?? ((record) => ({ record, annotations: [] })),
    expand(records, codes) {
      return expandByCodes(records, definition.orderCodes ? definition.orderCodes(codes) : codes);
    },
    extractPrompt: prompt,
  };
}

// ============================================================================
// CODE DISCOVERY
// ============================================================================

/**
 * Scan document text for product codes in the strategy's format.
 * Each match is validated; output is unique in first-seen order.
 */
export function discoverCodes(
  text: string,
  strategy: JurisdictionStrategy,
  chapterAllowlist: readonly string[] = [],
): string[] {
  const found = new Set<string>();
  const pattern = new RegExp(strategy.discoveryPattern.source, "g");
  for (const match of text.matchAll(pattern)) {
    const check = strategy.normalizeCode(match[0], chapterAllowlist);
    if (check.ok) found.add(check.code);
  }
  return [...found];
}
