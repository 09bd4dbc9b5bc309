/**
 * Jurisdiction strategies and their lookup table.
 *
 * Issuing jurisdictions without a dedicated entry use the default strategy.
 *
 * @module reconciler/jurisdictions
 */

import type { CandidateRecord, JurisdictionId, NormalizationAnnotation } from "../types";
import { getExtractPromptBase } from "./extract-prompt-base";
import { createStrategy, type JurisdictionStrategy } from "./strategy";

export { createStrategy, discoverCodes, codeChapter } from "./strategy";
export type { CodeCheck, CodeRejection, JurisdictionStrategy } from "./strategy";

// ============================================================================
// STRATEGIES
// ============================================================================

const defaultStrategy = createStrategy({
  id: "default",
  codePattern: /^(?:\d{4}\.\d{2}(?:\.\d{2}(?:\d{2})?)?|\d{6}(?:\d{2}){0,2})$/,
  discoveryPattern: /\b\d{4}\.\d{2}(?:\.\d{2}(?:\d{2})?)?\b/,
  prompt: () =>
    getExtractPromptBase({
      issuingCountry: "trade-remedy authority",
      codeFormat: "HS codes with dots, e.g. 7210.49 or 7210.49.00",
    }),
});

const usaStrategy = createStrategy({
  id: "usa",
  codePattern: /^\d{4}\.\d{2}(?:\.?\d{2}(?:\d{2})?)?$/,
  discoveryPattern: /\b\d{4}\.\d{2}\.\d{2}(?:\d{2})?\b/,
  orderCodes: (codes) => [...codes].sort(),
  prompt: () =>
    getExtractPromptBase({
      issuingCountry: "United States",
      codeFormat: "HTSUS subheadings, e.g. 7210.49.0030",
      notes: [
        "Case numbers look like A-580-881 (antidumping) or C-580-882 (countervailing).",
        "Cash-deposit rates per exporter are the tariff_rate; 'all others' is a company.",
      ],
    }),
});

const euStrategy = createStrategy({
  id: "eu",
  codePattern: /^(?:\d{4}(?: \d{2}){1,3}|\d{4}\.\d{2}(?:\.\d{2}){0,2}|\d{6}(?:\d{2}){0,2})$/,
  discoveryPattern: /\b\d{4}(?: \d{2}){1,3}\b/,
  prompt: () =>
    getExtractPromptBase({
      issuingCountry: "European Union",
      codeFormat: "CN / TARIC codes as printed, e.g. 7210 49 00 or 7210 49 00 30",
      notes: ["basis_law is the implementing regulation number, e.g. (EU) 2023/123."],
    }),
});

/** CJK, kana, Hangul, Thai and Arabic script ranges. */
const NON_LATIN_SCRIPT = /[\u0600-\u06ff\u0e00-\u0e7f\u3040-\u30ff\u3400-\u9fff\uac00-\ud7af]/;

function dropNonLatinCompany(record: CandidateRecord): {
  record: CandidateRecord;
  annotations: NormalizationAnnotation[];
} {
  if (record.company === null || !NON_LATIN_SCRIPT.test(record.company)) {
    return { record, annotations: [] };
  }
  return {
    record: { ...record, company: null },
    annotations: [{ field: "company", value: record.company, reason: "non_latin_company" }],
  };
}

const malaysiaStrategy = createStrategy({
  id: "malaysia",
  codePattern: /^\d{4}\.\d{2}\.\d{2}(?: \d{2})?$/,
  discoveryPattern: /\b\d{4}\.\d{2}\.\d{2}\s+\d{2}\b/,
  normalizeRecord: dropNonLatinCompany,
  prompt: () =>
    getExtractPromptBase({
      issuingCountry: "Malaysia",
      codeFormat: "AHTN codes with a spaced suffix, e.g. 7210.49.11 00",
      notes: ["A rate written as 'Nil' is 0.", "Company names are in Latin script."],
    }),
});

const australiaStrategy = createStrategy({
  id: "australia",
  codePattern: /^\d{4}\.\d{2}\.\d{2}$/,
  discoveryPattern: /\b\d{4}\.\d{2}\.\d{2}\b/,
  prompt: () =>
    getExtractPromptBase({
      issuingCountry: "Australia",
      codeFormat: "tariff classifications, e.g. 7210.49.00",
      notes: ["Dumping duty notices give interim duty as a percentage; that is tariff_rate."],
    }),
});

// ============================================================================
// LOOKUP
// ============================================================================

const STRATEGIES: Record<JurisdictionId, JurisdictionStrategy> = {
  default: defaultStrategy,
  usa: usaStrategy,
  eu: euStrategy,
  malaysia: malaysiaStrategy,
  australia: australiaStrategy,
};

export function getJurisdictionStrategy(id: JurisdictionId): JurisdictionStrategy {
  return STRATEGIES[id];
}
