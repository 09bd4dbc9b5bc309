#!/usr/bin/env npx tsx
/**
 * Reconcile one document's extraction payloads into the fact store.
 *
 * Usage:
 *   npx tsx scripts/reconcile-document.ts --file USA_A-580-881_Final.pdf \
 *     --payload batch1.json [--payload batch2.json] [--text pages.txt] \
 *     [--replace] [--db ./tariff-facts.db] [--extract]
 *
 * --extract sends the page text to the configured extraction model instead
 * of reading payload files.
 */

import * as fs from "fs";
import { loadReconciliationConfig } from "../src/lib/config-loader";
import { ExtractionServiceError } from "../src/lib/error-classification";
import { requestExtraction } from "../src/lib/extraction-service";
import { SqliteFactStore, getStoreStats } from "../src/lib/fact-store";
import { clearDebugLog } from "../src/lib/reconciler/debug";
import { detectDocumentMetadata } from "../src/lib/reconciler/document-metadata";
import { getJurisdictionStrategy } from "../src/lib/reconciler/jurisdictions";
import { reconcileDocument } from "../src/lib/reconciler/reconciliation-pipeline";

interface CliArgs {
  file: string;
  payloads: string[];
  text: string | null;
  replace: boolean;
  db: string | null;
  extract: boolean;
}

function usage(message: string): never {
  console.error(message);
  console.error(
    "Usage: npx tsx scripts/reconcile-document.ts --file <name> --payload <path>... [--text <path>] [--replace] [--db <path>] [--extract]",
  );
  process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { file: "", payloads: [], text: null, replace: false, db: null, extract: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = () => argv[++i] ?? usage(`Missing value for ${arg}`);
    switch (arg) {
      case "--file":
        args.file = next();
        break;
      case "--payload":
        args.payloads.push(next());
        break;
      case "--text":
        args.text = next();
        break;
      case "--db":
        args.db = next();
        break;
      case "--replace":
        args.replace = true;
        break;
      case "--extract":
        args.extract = true;
        break;
      default:
        usage(`Unknown argument: ${arg}`);
    }
  }
  if (!args.file) usage("--file is required");
  if (args.extract && !args.text) usage("--extract needs --text");
  if (!args.extract && args.payloads.length === 0) usage("At least one --payload is required");
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const { config, skippedOverrides } = loadReconciliationConfig();
  if (skippedOverrides.length > 0) {
    console.warn(`[Config-Loader] Skipped overrides: ${skippedOverrides.join("; ")}`);
  }
  clearDebugLog();

  const documentText = args.text ? fs.readFileSync(args.text, "utf-8") : undefined;
  const batches = args.payloads.map((p) => fs.readFileSync(p, "utf-8"));

  if (args.extract && documentText) {
    const strategy = getJurisdictionStrategy(detectDocumentMetadata(args.file).jurisdiction);
    const outcome = await requestExtraction({ prompt: strategy.extractPrompt(), documentText }, config.extraction);
    if (!outcome.ok) {
      throw new ExtractionServiceError(outcome.reason, outcome.category, outcome.attempts);
    }
    batches.push(outcome.text);
  }

  const store = await SqliteFactStore.open(args.db ?? config.dbPath);
  try {
    const result = await reconcileDocument(
      store,
      { fileName: args.file, batches, documentText, replace: args.replace },
      { config },
    );

    if (!result.ok) {
      console.error(`[Reconcile] ${result.documentId}: ${result.reason}`);
      process.exitCode = 2;
      return;
    }

    console.log(`[Reconcile] ${result.documentId} (${result.issuingCountry ?? "unknown issuer"})`);
    for (const batch of result.batches) {
      console.log(`  batch ${batch.index}: ${batch.quality}, ${batch.items} item(s), ${batch.annotations} annotation(s)`);
    }
    console.log(
      `  merge: ${result.merge.inserted} inserted, ${result.merge.merged} merged, ` +
        `${result.merge.unchanged} unchanged, ${result.merge.error} error(s)`,
    );
    console.log(
      `  back-fill: ${result.backfill.fieldsFilled} field(s) on ${result.backfill.factsUpdated} fact(s), ` +
        `${result.backfill.factsInserted} copy(ies), ${result.backfill.collisionsSkipped} collision(s) skipped`,
    );
    console.log(`  facts: ${result.facts.length}`);

    const stats = await getStoreStats(store);
    console.log(`[Reconcile] Store: ${stats.documents} document(s), ${stats.facts} fact(s)`);
  } finally {
    await store.close();
  }
}

main().catch((err: unknown) => {
  console.error("[Reconcile] Failed", err);
  process.exit(1);
});
