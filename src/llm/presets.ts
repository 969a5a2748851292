/**
 * Token budget presets
 */

import { ConfigError } from "../core/errors.js";
import type { ResolvedProvider } from "../providers/types.js";
import type { CustomLimits, LlmConfig, LlmPreset } from "./types.js";

interface PresetValues {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export const PRESETS: Record<Exclude<LlmPreset, "custom">, PresetValues> = {
  strict: { maxTokens: 150, temperature: 0.1, timeoutMs: 60_000 },
  standard: { maxTokens: 300, temperature: 0.3, timeoutMs: 60_000 },
};

/** Absolute ceilings a custom preset can never exceed */
export const HARD_LIMITS = {
  maxTokens: 1024,
  timeoutMs: 120_000,
} as const;

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Custom ${name} must be a positive number, got ${value}`, { [name]: value });
  }
  return value;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Build the immutable config a bound client uses for the whole run
 */
export function buildLlmConfig(
  resolved: ResolvedProvider,
  preset: LlmPreset,
  custom: CustomLimits = {}
): LlmConfig {
  let values: PresetValues;

  if (preset === "custom") {
    const base = PRESETS.standard;
    const temperature = custom.temperature ?? base.temperature;
    if (!Number.isFinite(temperature)) {
      throw new ConfigError(`Custom temperature must be a number, got ${temperature}`);
    }

    values = {
      maxTokens: Math.min(
        HARD_LIMITS.maxTokens,
        Math.max(1, Math.floor(requirePositive("maxTokens", custom.maxTokens ?? base.maxTokens)))
      ),
      temperature: clamp(temperature, 0, 1),
      timeoutMs: Math.min(
        HARD_LIMITS.timeoutMs,
        requirePositive("timeoutMs", custom.timeoutMs ?? base.timeoutMs)
      ),
    };
  } else {
    values = PRESETS[preset];
  }

  return Object.freeze({
    provider: resolved.descriptor.id,
    model: resolved.descriptor.defaultModel,
    preset,
    ...values,
  });
}
