import { describe, expect, it } from "vitest";
import { getConfig, loadConfig, resetConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      defaults: {
        logLevel: "info",
        dataDir: "./data",
        profilePath: "config/company_profile.json",
      },
      llm: {
        provider: undefined,
        preset: "standard",
        custom: { maxTokens: undefined, temperature: undefined, timeoutMs: undefined },
        tokenCounter: "estimate",
      },
      pipeline: { maxRetries: 2 },
    });
  });

  it("reads custom limits and converts the timeout to milliseconds", () => {
    const config = loadConfig({
      LLM_PRESET: "custom",
      LLM_MAX_TOKENS: "512",
      LLM_TEMPERATURE: "0.6",
      LLM_TIMEOUT_SECONDS: "45",
      TASK_MAX_RETRIES: "4",
      TOKEN_COUNTER: "tiktoken",
    });

    expect(config.llm).toMatchObject({
      preset: "custom",
      custom: { maxTokens: 512, temperature: 0.6, timeoutMs: 45_000 },
      tokenCounter: "tiktoken",
    });
    expect(config.pipeline.maxRetries).toBe(4);
  });

  it("selects the custom preset when limits are set without a preset", () => {
    expect(loadConfig({ LLM_TEMPERATURE: "0.9" }).llm.preset).toBe("custom");
    expect(loadConfig({ LLM_PRESET: "", LLM_TIMEOUT_SECONDS: "30" }).llm.preset).toBe("custom");
    expect(loadConfig({ LLM_PRESET: "strict" }).llm.preset).toBe("strict");
  });

  it("rejects limits under a named preset", () => {
    expect(() => loadConfig({ LLM_PRESET: "standard", LLM_MAX_TOKENS: "800", LLM_TEMPERATURE: "0.9" })).toThrow(
      "LLM_MAX_TOKENS, LLM_TEMPERATURE only apply with LLM_PRESET=custom (got 'standard')"
    );
  });

  it("treats a blank provider as unset", () => {
    expect(loadConfig({ LLM_PROVIDER: " " }).llm.provider).toBeUndefined();
    expect(loadConfig({ LLM_PROVIDER: "mistral" }).llm.provider).toBe("mistral");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ LLM_PROVIDER: "cohere", TASK_MAX_RETRIES: "-1" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      context: { variables: ["LLM_PROVIDER", "TASK_MAX_RETRIES"] },
    });
  });

  it("rejects non-numeric limits", () => {
    expect(() => loadConfig({ LLM_MAX_TOKENS: "lots" })).toThrow(ConfigError);
  });
});

describe("getConfig", () => {
  it("caches until reset", () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
