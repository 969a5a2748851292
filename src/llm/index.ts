/**
 * LLM client factory
 * Builds one client bound to the resolved provider and a token preset
 */

import { logger } from "../core/logger.js";
import type { ResolvedProvider } from "../providers/types.js";
import { createAnthropicClient } from "./anthropic.js";
import { createOpenAICompatibleClient } from "./openai-compatible.js";
import { buildLlmConfig } from "./presets.js";
import type { BoundLlm, CustomLimits, LlmClient, LlmPreset } from "./types.js";

export function createLlmClient(resolved: ResolvedProvider): LlmClient {
  switch (resolved.descriptor.api) {
    case "anthropic-messages":
      return createAnthropicClient(resolved);
    case "openai-chat":
      return createOpenAICompatibleClient(resolved);
  }
}

export function createBoundLlm(
  resolved: ResolvedProvider,
  preset: LlmPreset,
  custom?: CustomLimits
): BoundLlm {
  const config = buildLlmConfig(resolved, preset, custom);

  logger.info("LLM client ready", {
    provider: config.provider,
    model: config.model,
    preset: config.preset,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
  });

  return Object.freeze({
    provider: resolved,
    config,
    client: createLlmClient(resolved),
  });
}

export { buildLlmConfig, PRESETS, HARD_LIMITS } from "./presets.js";
export { classifyProviderError } from "./errors.js";
export type { BoundLlm, CustomLimits, LlmClient, LlmConfig, LlmPreset } from "./types.js";
