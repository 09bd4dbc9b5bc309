/**
 * Configuration Schemas
 *
 * Zod schema and defaults for the reconciliation pipeline.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// EXTRACTION SERVICE CONFIG
// ============================================================================

export const ExtractionConfigSchema = z.object({
  provider: z.enum(["openai", "anthropic"]),
  model: z.string().min(1),
  /** Retries after the first attempt, for retriable failures only. */
  maxRetries: z.number().int().min(0).max(5),
  maxOutputTokens: z.number().int().min(256).max(32768),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

// ============================================================================
// RECONCILIATION CONFIG
// ============================================================================

export const ReconciliationConfigSchema = z.object({
  dbPath: z.string().min(1),
  /** Name of the list-valued payload field holding candidate records. */
  itemsField: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  /** Two-digit product-code chapters accepted; empty accepts every chapter. */
  codeChapterAllowlist: z.array(z.string().regex(/^\d{2}$/)).max(99),
  codeInheritance: z.enum(["fill", "expand"]),
  backfillEnabled: z.boolean(),
  refinementMatch: z.boolean(),
  extraction: ExtractionConfigSchema,
});

export type ReconciliationConfig = z.infer<typeof ReconciliationConfigSchema>;

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  provider: "openai",
  model: "gpt-4o-mini",
  maxRetries: 2,
  maxOutputTokens: 8192,
};

export const DEFAULT_RECONCILIATION_CONFIG: ReconciliationConfig = {
  dbPath: "./tariff-facts.db",
  itemsField: "items",
  codeChapterAllowlist: ["72", "73"],
  codeInheritance: "fill",
  backfillEnabled: true,
  refinementMatch: true,
  extraction: DEFAULT_EXTRACTION_CONFIG,
};

// ============================================================================
// VALIDATION
// ============================================================================

export type ValidationResult =
  | { valid: true; config: ReconciliationConfig }
  | { valid: false; errors: string[] };

export function validateReconciliationConfig(content: unknown): ValidationResult {
  const parsed = ReconciliationConfigSchema.safeParse(content);
  if (parsed.success) return { valid: true, config: parsed.data };
  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
  };
}
