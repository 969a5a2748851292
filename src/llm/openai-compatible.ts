import OpenAI from "openai";
import { MalformedOutputError } from "../core/errors.js";
import type { ResolvedProvider } from "../providers/types.js";
import { classifyProviderError } from "./errors.js";
import type { LlmClient, LlmConfig } from "./types.js";

/**
 * Chat-completions adapter. Serves OpenAI itself and the providers that
 * expose an OpenAI-compatible endpoint (Gemini, Mistral) through `baseUrl`.
 */
export function createOpenAICompatibleClient(resolved: ResolvedProvider): LlmClient {
  const { descriptor } = resolved;
  const sdk = new OpenAI({
    apiKey: resolved.apiKey,
    baseURL: descriptor.baseUrl,
    // Retries belong to the output validator
    maxRetries: 0,
  });

  return {
    provider: descriptor.id,

    async generate(prompt: string, config: LlmConfig): Promise<string> {
      let content: string | null | undefined;

      try {
        const response = await sdk.chat.completions.create(
          {
            model: config.model,
            messages: [{ role: "user", content: prompt }],
            max_tokens: config.maxTokens,
            temperature: config.temperature,
          },
          { timeout: config.timeoutMs }
        );
        content = response.choices[0]?.message?.content;
      } catch (error) {
        throw classifyProviderError(error, descriptor.id, config.timeoutMs);
      }

      if (!content || !content.trim()) {
        throw new MalformedOutputError(`${descriptor.name} returned an empty completion`);
      }
      return content;
    },
  };
}
