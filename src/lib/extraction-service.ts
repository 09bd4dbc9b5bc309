/**
 * Extraction Service
 *
 * Adapter around the external inference service that turns document text
 * into a raw candidate payload. Failures come back as a typed result; only
 * retriable failures (rate limits, timeouts, transient outages) are retried,
 * up to the configured bound.
 *
 * @module extraction-service
 */

import { generateText } from "ai";
import { classifyExtractionError, type ExtractionErrorCategory } from "./error-classification";
import type { ExtractionConfig } from "./config-schemas";
import { debugLog } from "./reconciler/debug";
import { getExtractionModel } from "./reconciler/llm";

// ============================================================================
// TYPES
// ============================================================================

export interface ExtractionInput {
  /** System prompt; usually the jurisdiction strategy's extract prompt. */
  prompt: string;
  /** Page text of the document (or page batch). */
  documentText: string;
}

export type ExtractionOutcome =
  | { ok: true; text: string; attempts: number }
  | { ok: false; reason: string; category: ExtractionErrorCategory; attempts: number };

export interface ExtractionRequestOptions {
  /** Base delay between attempts; doubles each retry. */
  retryDelayMs?: number;
}

const DEFAULT_RETRY_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// REQUEST
// ============================================================================

/**
 * Request one extraction payload.
 * Never throws; the caller receives `{ ok: false }` with the classified cause.
 */
export async function requestExtraction(
  input: ExtractionInput,
  config: ExtractionConfig,
  options: ExtractionRequestOptions = {},
): Promise<ExtractionOutcome> {
  const modelInfo = getExtractionModel(config);
  const baseDelay = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const maxAttempts = config.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await generateText({
        model: modelInfo.model,
        system: input.prompt,
        messages: [{ role: "user", content: input.documentText }],
        temperature: 0,
        maxOutputTokens: config.maxOutputTokens,
        maxRetries: 0,
      });

      if (!result.text.trim()) {
        return { ok: false, reason: "empty response", category: "unknown", attempts: attempt };
      }
      return { ok: true, text: result.text, attempts: attempt };
    } catch (err) {
      const classified = classifyExtractionError(err);
      debugLog(`[Extraction] Attempt ${attempt}/${maxAttempts} failed (${classified.category})`, {
        provider: modelInfo.provider,
        model: modelInfo.modelName,
        message: classified.message,
      });

      if (!classified.retriable || attempt >= maxAttempts) {
        return { ok: false, reason: classified.message, category: classified.category, attempts: attempt };
      }
      await sleep(baseDelay * 2 ** (attempt - 1));
    }
  }
}
