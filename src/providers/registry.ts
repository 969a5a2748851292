/**
 * Provider Registry
 * Credential resolution and deterministic provider selection
 *
 * FLOW:
 * =====
 * resolveCredentials(PROVIDERS, env)  → providers whose slot is filled, by rank
 *   ↓
 * selectProvider(qualifying)          → lowest rank, first listed on ties
 *   ↓
 * ResolvedProvider                    → handed to the LLM client factory
 *
 * Everything here is a pure function of the environment record passed in.
 */

import { CredentialMissingError } from "../core/errors.js";
import type {
  ProviderDescriptor,
  ProviderId,
  ProviderInfo,
  ResolvedProvider,
} from "./types.js";

export const PROVIDERS: readonly ProviderDescriptor[] = Object.freeze([
  {
    id: "gemini",
    name: "Google Gemini",
    credentialSlot: "GEN_MODEL_API",
    defaultModel: "gemini-2.0-flash-lite",
    costEfficiency: "high",
    priority: 1,
    api: "openai-chat",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta/openai/",
  },
  {
    id: "openai",
    name: "OpenAI",
    credentialSlot: "OPENAI_API_KEY",
    defaultModel: "gpt-4o-mini",
    costEfficiency: "medium",
    priority: 2,
    api: "openai-chat",
  },
  {
    id: "anthropic",
    name: "Anthropic",
    credentialSlot: "ANTHROPIC_API_KEY",
    defaultModel: "claude-3-haiku-20240307",
    costEfficiency: "high",
    priority: 3,
    api: "anthropic-messages",
  },
  {
    id: "mistral",
    name: "Mistral AI",
    credentialSlot: "MISTRAL_API_KEY",
    defaultModel: "mistral-large-latest",
    costEfficiency: "medium",
    priority: 4,
    api: "openai-chat",
    baseUrl: "https://api.mistral.ai/v1",
  },
] satisfies ProviderDescriptor[]);

/**
 * Find a descriptor by id
 */
export function getDescriptor(
  id: ProviderId,
  descriptors: readonly ProviderDescriptor[] = PROVIDERS
): ProviderDescriptor | undefined {
  return descriptors.find((d) => d.id === id);
}

/**
 * Return the providers whose credential slot holds a non-blank value,
 * ordered by rank. Never throws; an empty list means nothing qualifies.
 */
export function resolveCredentials(
  descriptors: readonly ProviderDescriptor[],
  env: NodeJS.ProcessEnv
): ResolvedProvider[] {
  const resolved: ResolvedProvider[] = [];

  for (const descriptor of descriptors) {
    const value = env[descriptor.credentialSlot]?.trim();
    if (value) {
      resolved.push({ descriptor, apiKey: value });
    }
  }

  // Array.prototype.sort is stable, so equal ranks keep list order
  return resolved.sort((a, b) => a.descriptor.priority - b.descriptor.priority);
}

/**
 * Pick the qualifying provider with the lowest rank
 */
export function selectProvider(
  qualifying: readonly ResolvedProvider[],
  descriptors: readonly ProviderDescriptor[] = PROVIDERS
): ResolvedProvider {
  let best: ResolvedProvider | undefined;

  for (const candidate of qualifying) {
    if (!best || candidate.descriptor.priority < best.descriptor.priority) {
      best = candidate;
    }
  }

  if (!best) {
    throw new CredentialMissingError(descriptors.map((d) => d.credentialSlot));
  }

  return best;
}

/**
 * Resolve credentials and select a provider in one step.
 * A preferred provider is honoured only when its own credential is present.
 */
export function resolveProvider(
  env: NodeJS.ProcessEnv,
  preferred?: ProviderId,
  descriptors: readonly ProviderDescriptor[] = PROVIDERS
): ResolvedProvider {
  const qualifying = resolveCredentials(descriptors, env);

  if (preferred) {
    const pinned = qualifying.find((p) => p.descriptor.id === preferred);
    if (!pinned) {
      const slot = getDescriptor(preferred, descriptors)?.credentialSlot ?? preferred;
      throw new CredentialMissingError([slot], preferred);
    }
    return pinned;
  }

  return selectProvider(qualifying, descriptors);
}

/**
 * Describe the current provider setup
 */
export function getProviderInfo(
  env: NodeJS.ProcessEnv,
  descriptors: readonly ProviderDescriptor[] = PROVIDERS
): ProviderInfo {
  const qualifying = resolveCredentials(descriptors, env);
  const available = qualifying.map((p) => p.descriptor.id);
  const missingSlots = descriptors
    .filter((d) => !available.includes(d.id))
    .map((d) => d.credentialSlot);

  if (qualifying.length === 0) {
    return { available, selected: null, missingSlots };
  }

  const { descriptor } = selectProvider(qualifying, descriptors);
  return {
    available,
    selected: descriptor.id,
    name: descriptor.name,
    model: descriptor.defaultModel,
    costEfficiency: descriptor.costEfficiency,
    missingSlots,
  };
}
