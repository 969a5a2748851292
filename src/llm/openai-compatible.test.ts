import { beforeEach, describe, expect, it, vi } from "vitest";
import { MalformedOutputError, RateLimitedError } from "../core/errors.js";
import { resolvedFor } from "../testing/scripted-llm.js";
import { createOpenAICompatibleClient } from "./openai-compatible.js";
import { buildLlmConfig } from "./presets.js";

const sdk = vi.hoisted(() => ({
  create: vi.fn(),
  options: [] as unknown[],
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: sdk.create } };
    constructor(options: unknown) {
      sdk.options.push(options);
    }
  },
}));

function completion(content: string | null) {
  return { choices: [{ message: { role: "assistant", content } }] };
}

describe("createOpenAICompatibleClient", () => {
  beforeEach(() => {
    sdk.create.mockReset();
    sdk.options.length = 0;
  });

  it("sends one chat completion with the bound limits", async () => {
    const resolved = resolvedFor("openai");
    const config = buildLlmConfig(resolved, "strict");
    sdk.create.mockResolvedValueOnce(completion('{"ok":true}'));

    const client = createOpenAICompatibleClient(resolved);
    const text = await client.generate("Summarize the market", config);

    expect(text).toBe('{"ok":true}');
    expect(sdk.create).toHaveBeenCalledTimes(1);
    expect(sdk.create).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        messages: [{ role: "user", content: "Summarize the market" }],
        max_tokens: 150,
        temperature: 0.1,
      },
      { timeout: 60_000 }
    );
  });

  it("points Gemini at its OpenAI-compatible endpoint with SDK retries off", () => {
    createOpenAICompatibleClient(resolvedFor("gemini"));

    expect(sdk.options).toEqual([
      {
        apiKey: "test-secret",
        baseURL: "https://generativelanguage.googleapis.com/v1beta/openai/",
        maxRetries: 0,
      },
    ]);
  });

  it("rejects an empty completion as malformed", async () => {
    const resolved = resolvedFor("mistral");
    sdk.create.mockResolvedValueOnce(completion(null));

    const client = createOpenAICompatibleClient(resolved);
    await expect(client.generate("x", buildLlmConfig(resolved, "standard"))).rejects.toThrow(
      new MalformedOutputError("Mistral AI returned an empty completion")
    );
  });

  it("classifies SDK failures", async () => {
    const resolved = resolvedFor("openai");
    sdk.create.mockRejectedValueOnce(Object.assign(new Error("Too many requests"), { status: 429 }));

    const client = createOpenAICompatibleClient(resolved);
    await expect(client.generate("x", buildLlmConfig(resolved, "standard"))).rejects.toBeInstanceOf(
      RateLimitedError
    );
  });
});
