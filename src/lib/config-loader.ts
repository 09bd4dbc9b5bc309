/**
 * Configuration Loader
 *
 * Resolves the reconciliation config from defaults plus environment
 * variable overrides. Each override is validated against the schema on its
 * own; an invalid one is skipped with a warning and reported.
 *
 * @module config-loader
 */

import {
  DEFAULT_RECONCILIATION_CONFIG,
  ReconciliationConfigSchema,
  type ReconciliationConfig,
} from "./config-schemas";

export type { ReconciliationConfig } from "./config-schemas";
export { DEFAULT_RECONCILIATION_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

// "on" | "off" | "allowlist:VAR1,VAR2"
type OverridePolicy = string;

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue?: string | number | boolean;
}

export interface ResolvedConfig {
  config: ReconciliationConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

type Env = Record<string, string | undefined>;

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

const splitList = (v: string) => v.split(",").map((s) => s.trim()).filter(Boolean);
const parseBool = (v: string): boolean | string => {
  const lower = v.trim().toLowerCase();
  if (lower === "true" || lower === "1" || lower === "on") return true;
  if (lower === "false" || lower === "0" || lower === "off") return false;
  return v;
};

const ENV_MAP: Record<string, { fieldPath: string; parser: (v: string) => unknown }> = {
  TR_FACTS_DB_PATH: { fieldPath: "dbPath", parser: (v) => v },
  TR_ITEMS_FIELD: { fieldPath: "itemsField", parser: (v) => v.trim() },
  TR_CODE_CHAPTERS: { fieldPath: "codeChapterAllowlist", parser: splitList },
  TR_CODE_INHERITANCE: { fieldPath: "codeInheritance", parser: (v) => v.trim().toLowerCase() },
  TR_BACKFILL_ENABLED: { fieldPath: "backfillEnabled", parser: parseBool },
  TR_REFINEMENT_MATCH: { fieldPath: "refinementMatch", parser: parseBool },
  TR_EXTRACTION_PROVIDER: { fieldPath: "extraction.provider", parser: (v) => v.trim().toLowerCase() },
  TR_EXTRACTION_MODEL: { fieldPath: "extraction.model", parser: (v) => v.trim() },
  TR_EXTRACTION_MAX_RETRIES: { fieldPath: "extraction.maxRetries", parser: (v) => Number(v) },
  TR_EXTRACTION_MAX_OUTPUT_TOKENS: { fieldPath: "extraction.maxOutputTokens", parser: (v) => Number(v) },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Copy of `source` with `value` set at a dotted path. */
function setNestedValue(source: unknown, fieldPath: string, value: unknown): Record<string, unknown> {
  const root: Record<string, unknown> = isRecord(source) ? { ...source } : {};
  const parts = fieldPath.split(".");
  let current = root;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    const copy: Record<string, unknown> = isRecord(next) ? { ...next } : {};
    current[part] = copy;
    current = copy;
  }

  current[parts[parts.length - 1]] = value;
  return root;
}

function scalarValue(value: unknown): string | number | boolean | undefined {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean" ? value : undefined;
}

export function applyOverrides(base: ReconciliationConfig, env: Env = process.env): ResolvedConfig {
  const policy: OverridePolicy = env.TR_CONFIG_ENV_OVERRIDES || "on";
  const skippedOverrides: string[] = [];
  const overrides: OverrideRecord[] = [];

  if (policy === "off") {
    return { config: base, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(splitList(policy.slice("allowlist:".length)));
  }

  let config = base;
  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const validation = ReconciliationConfigSchema.safeParse(setNestedValue(config, mapping.fieldPath, parsed));
    if (!validation.success) {
      console.warn(
        `[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ` +
          validation.error.issues.map((i) => i.message).join(", "),
      );
      skippedOverrides.push(`${envVar} (invalid: ${validation.error.issues[0]?.message})`);
      continue;
    }

    config = validation.data;
    overrides.push({ envVar, fieldPath: mapping.fieldPath, appliedValue: scalarValue(parsed) });
  }

  return { config, overrides, skippedOverrides };
}

/**
 * Load the reconciliation config: defaults, then env overrides.
 */
export function loadReconciliationConfig(env: Env = process.env): ResolvedConfig {
  const resolved = applyOverrides(DEFAULT_RECONCILIATION_CONFIG, env);
  if (resolved.overrides.length > 0) {
    console.log(
      `[Config-Loader] Applied ${resolved.overrides.length} env override(s): ` +
        resolved.overrides.map((o) => o.envVar).join(", "),
    );
  }
  return resolved;
}
