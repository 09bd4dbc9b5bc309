/**
 * Reconciler - LLM Provider Selection
 *
 * Maps the extraction config onto an AI SDK language model.
 *
 * @module reconciler/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import type { ExtractionConfig } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: ExtractionConfig["provider"];
  modelName: string;
  model: ReturnType<typeof openai> | ReturnType<typeof anthropic>;
}

export function getExtractionModel(config: Pick<ExtractionConfig, "provider" | "model">): ModelInfo {
  if (config.provider === "anthropic") {
    return { provider: "anthropic", modelName: config.model, model: anthropic(config.model) };
  }
  return { provider: "openai", modelName: config.model, model: openai(config.model) };
}
