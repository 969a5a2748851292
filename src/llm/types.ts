/**
 * LLM Client Types
 * One capability interface shared by every provider adapter
 */

import type { ProviderId, ResolvedProvider } from "../providers/types.js";

export type LlmPreset = "strict" | "standard" | "custom";

export interface LlmConfig {
  readonly provider: ProviderId;
  readonly model: string;
  /** 0.0 - 1.0 */
  readonly temperature: number;
  /** Output token ceiling sent as max_tokens */
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly preset: LlmPreset;
}

/**
 * Caller-supplied limits for the custom preset
 */
export interface CustomLimits {
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

/**
 * A client bound to one provider. `generate` performs exactly one
 * outbound request and returns the raw model text.
 */
export interface LlmClient {
  readonly provider: ProviderId;
  generate(prompt: string, config: LlmConfig): Promise<string>;
}

/**
 * Client plus the immutable config it runs with for a whole pipeline run
 */
export interface BoundLlm {
  readonly provider: ResolvedProvider;
  readonly config: LlmConfig;
  readonly client: LlmClient;
}
