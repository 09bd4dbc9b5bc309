/**
 * Country Names
 *
 * Canonical country / jurisdiction names backed by the synonym table in
 * `data/country-synonyms.json`. Lookups ignore case, punctuation and a
 * leading "the".
 *
 * @module reconciler/country-names
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEFAULT_SYNONYMS_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../data/country-synonyms.json",
);

const SynonymTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export type SynonymTable = z.infer<typeof SynonymTableSchema>;

/** Values the extraction service emits when it has nothing to say. */
const PLACEHOLDER_KEYS = new Set([
  "country name",
  "country",
  "n/a",
  "na",
  "null",
  "none",
  "unknown",
  "not specified",
  "-",
]);

// ============================================================================
// LOOKUP
// ============================================================================

/** Case- and punctuation-insensitive lookup key. */
export function countryKey(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[.'’]/g, "")
    .replace(/[,()]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^the /, "");
}

export class CountryDirectory {
  private readonly byKey = new Map<string, string>();

  constructor(table: SynonymTable) {
    for (const [canonical, synonyms] of Object.entries(table)) {
      this.byKey.set(countryKey(canonical), canonical);
      for (const synonym of synonyms) {
        const key = countryKey(synonym);
        if (!this.byKey.has(key)) this.byKey.set(key, canonical);
      }
    }
  }

  static fromFile(filePath: string = DEFAULT_SYNONYMS_PATH): CountryDirectory {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return new CountryDirectory(SynonymTableSchema.parse(raw));
  }

  get size(): number {
    return this.byKey.size;
  }

  /**
   * Canonical name for `value`. Unmapped names pass through trimmed;
   * blanks and placeholders become null.
   */
  canonicalize(value: string | null): string | null {
    if (value === null) return null;
    const trimmed = value.trim();
    if (this.isPlaceholder(trimmed)) return null;
    return this.byKey.get(countryKey(trimmed)) ?? trimmed;
  }

  /** Blank or a known placeholder such as "Country name" or "N/A". */
  isPlaceholder(value: string): boolean {
    const key = countryKey(value);
    return !key || PLACEHOLDER_KEYS.has(key);
  }
}

let defaultDirectory: CountryDirectory | null = null;

/** Shared directory loaded from the bundled synonym table. */
export function getCountryDirectory(): CountryDirectory {
  if (!defaultDirectory) defaultDirectory = CountryDirectory.fromFile();
  return defaultDirectory;
}
