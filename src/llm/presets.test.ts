import { describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors.js";
import { resolvedFor } from "../testing/scripted-llm.js";
import { buildLlmConfig, HARD_LIMITS } from "./presets.js";

const gemini = resolvedFor("gemini");

describe("buildLlmConfig", () => {
  it("applies the strict preset", () => {
    expect(buildLlmConfig(gemini, "strict")).toEqual({
      provider: "gemini",
      model: "gemini-2.0-flash-lite",
      preset: "strict",
      maxTokens: 150,
      temperature: 0.1,
      timeoutMs: 60_000,
    });
  });

  it("applies the standard preset", () => {
    const config = buildLlmConfig(resolvedFor("anthropic"), "standard");
    expect(config.maxTokens).toBe(300);
    expect(config.temperature).toBe(0.3);
    expect(config.model).toBe("claude-3-haiku-20240307");
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(buildLlmConfig(gemini, "standard"))).toBe(true);
  });

  it("ignores custom limits for named presets", () => {
    expect(buildLlmConfig(gemini, "strict", { maxTokens: 900 }).maxTokens).toBe(150);
  });

  it("uses caller values for the custom preset", () => {
    const config = buildLlmConfig(gemini, "custom", {
      maxTokens: 512,
      temperature: 0.7,
      timeoutMs: 30_000,
    });
    expect(config).toMatchObject({ preset: "custom", maxTokens: 512, temperature: 0.7, timeoutMs: 30_000 });
  });

  it("falls back to standard values for missing custom limits", () => {
    const config = buildLlmConfig(gemini, "custom", { temperature: 0.5 });
    expect(config).toMatchObject({ maxTokens: 300, temperature: 0.5, timeoutMs: 60_000 });
  });

  it("caps custom limits at the hard ceilings", () => {
    const config = buildLlmConfig(gemini, "custom", {
      maxTokens: 50_000,
      temperature: 1.8,
      timeoutMs: 600_000,
    });
    expect(config.maxTokens).toBe(HARD_LIMITS.maxTokens);
    expect(config.timeoutMs).toBe(HARD_LIMITS.timeoutMs);
    expect(config.temperature).toBe(1);
  });

  it("clamps negative temperatures to zero", () => {
    expect(buildLlmConfig(gemini, "custom", { temperature: -0.4 }).temperature).toBe(0);
  });

  it("rejects non-positive token ceilings and timeouts", () => {
    expect(() => buildLlmConfig(gemini, "custom", { maxTokens: 0 })).toThrow(ConfigError);
    expect(() => buildLlmConfig(gemini, "custom", { timeoutMs: -5 })).toThrow(ConfigError);
    expect(() => buildLlmConfig(gemini, "custom", { maxTokens: Number.NaN })).toThrow(
      "Custom maxTokens must be a positive number, got NaN"
    );
  });
});
