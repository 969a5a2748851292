import Anthropic from "@anthropic-ai/sdk";
import { MalformedOutputError } from "../core/errors.js";
import type { ResolvedProvider } from "../providers/types.js";
import { classifyProviderError } from "./errors.js";
import type { LlmClient, LlmConfig } from "./types.js";

/**
 * Anthropic Messages API adapter
 */
export function createAnthropicClient(resolved: ResolvedProvider): LlmClient {
  const { descriptor } = resolved;
  const sdk = new Anthropic({ apiKey: resolved.apiKey, maxRetries: 0 });

  return {
    provider: descriptor.id,

    async generate(prompt: string, config: LlmConfig): Promise<string> {
      let text = "";

      try {
        const response = await sdk.messages.create(
          {
            model: config.model,
            max_tokens: config.maxTokens,
            temperature: config.temperature,
            messages: [{ role: "user", content: prompt }],
          },
          { timeout: config.timeoutMs }
        );

        for (const block of response.content) {
          if (block.type === "text") {
            text += block.text;
          }
        }
      } catch (error) {
        throw classifyProviderError(error, descriptor.id, config.timeoutMs);
      }

      if (!text.trim()) {
        throw new MalformedOutputError(`${descriptor.name} returned no text content`);
      }
      return text;
    },
  };
}
