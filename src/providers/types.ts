/**
 * Provider Types
 * Static descriptions of the supported generation backends
 */

export const PROVIDER_IDS = ["gemini", "openai", "anthropic", "mistral"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export type CostEfficiency = "low" | "medium" | "high";

/**
 * Wire format the provider's generation endpoint speaks
 */
export type RequestShape = "openai-chat" | "anthropic-messages";

export interface ProviderDescriptor {
  readonly id: ProviderId;
  /** Human-readable provider name */
  readonly name: string;
  /** Environment variable holding the API key */
  readonly credentialSlot: string;
  readonly defaultModel: string;
  readonly costEfficiency: CostEfficiency;
  /** Lower rank wins when several providers qualify */
  readonly priority: number;
  readonly api: RequestShape;
  /** Endpoint override for OpenAI-compatible APIs */
  readonly baseUrl?: string;
}

/**
 * A descriptor paired with the credential found at runtime.
 * Never persisted, never logged.
 */
export interface ResolvedProvider {
  readonly descriptor: ProviderDescriptor;
  readonly apiKey: string;
}

export interface ProviderInfo {
  available: ProviderId[];
  selected: ProviderId | null;
  name?: string;
  model?: string;
  costEfficiency?: CostEfficiency;
  missingSlots: string[];
}
