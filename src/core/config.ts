import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";
import { PROVIDER_IDS, type ProviderId } from "../providers/types.js";
import type { CustomLimits, LlmPreset } from "../llm/types.js";

/**
 * Configuration Management
 * Loads and validates all config from environment variables.
 * Credential slots are deliberately absent: the credential resolver
 * reads them from the environment on its own.
 */

// Unset and empty variables both mean "not configured"
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());

const envSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  PROFILE_PATH: z.string().default("config/company_profile.json"),

  LLM_PROVIDER: z.preprocess(blankToUndefined, z.enum(PROVIDER_IDS).optional()),
  LLM_PRESET: z.preprocess(blankToUndefined, z.enum(["strict", "standard", "custom"]).optional()),
  LLM_MAX_TOKENS: optionalNumber,
  LLM_TEMPERATURE: optionalNumber,
  LLM_TIMEOUT_SECONDS: optionalNumber,

  TASK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  TOKEN_COUNTER: z.enum(["estimate", "tiktoken"]).default("estimate"),
});

export type TokenCounterKind = "estimate" | "tiktoken";

export interface Config {
  defaults: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    profilePath: string;
  };

  llm: {
    /** Pin a provider instead of picking the best-ranked one */
    provider?: ProviderId;
    preset: LlmPreset;
    custom: CustomLimits;
    tokenCounter: TokenCounterKind;
  };

  pipeline: {
    maxRetries: number;
  };
}

/**
 * Load and validate configuration from an environment record
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      variables: parseResult.error.errors.map((e) => e.path.join(".")),
    });
  }

  const parsed = parseResult.data;

  // Limits only apply to the custom preset; setting them selects it
  const limitVariables = (["LLM_MAX_TOKENS", "LLM_TEMPERATURE", "LLM_TIMEOUT_SECONDS"] as const).filter(
    (name) => parsed[name] !== undefined
  );
  if (limitVariables.length > 0 && parsed.LLM_PRESET !== undefined && parsed.LLM_PRESET !== "custom") {
    throw new ConfigError(
      `${limitVariables.join(", ")} only apply with LLM_PRESET=custom (got '${parsed.LLM_PRESET}')`,
      { variables: limitVariables }
    );
  }
  const preset: LlmPreset = parsed.LLM_PRESET ?? (limitVariables.length > 0 ? "custom" : "standard");

  return {
    defaults: {
      logLevel: parsed.LOG_LEVEL,
      dataDir: parsed.DATA_DIR,
      profilePath: parsed.PROFILE_PATH,
    },

    llm: {
      provider: parsed.LLM_PROVIDER,
      preset,
      custom: {
        maxTokens: parsed.LLM_MAX_TOKENS,
        temperature: parsed.LLM_TEMPERATURE,
        timeoutMs:
          parsed.LLM_TIMEOUT_SECONDS === undefined ? undefined : parsed.LLM_TIMEOUT_SECONDS * 1000,
      },
      tokenCounter: parsed.TOKEN_COUNTER,
    },

    pipeline: {
      maxRetries: parsed.TASK_MAX_RETRIES,
    },
  };
}

let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
