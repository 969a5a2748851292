/**
 * Context Injector
 * Renders a bounded "Company Context" block from the caller profile and
 * appends it to a task's base prompt.
 *
 * BUDGET RULE:
 * ============
 *   tokens(block)        <= contextShare
 *   tokens(final prompt) <= tokens(base prompt) + contextShare
 *
 * When the block is too large, whole fields are dropped starting from the
 * lowest retention priority. A field value is never cut.
 */

import type { CallerProfile, ProfileField } from "../schemas/profile.js";
import { estimateTokens, type TokenCounter } from "./tokens.js";

/**
 * Retention priority, most important first. Fields are dropped from the end.
 */
export const FIELD_RETENTION_ORDER: readonly ProfileField[] = [
  "companyName",
  "industry",
  "companyDescription",
  "targetCustomers",
  "competitors",
  "productsServices",
  "businessModel",
  "competitiveAdvantages",
  "marketPosition",
  "strategicGoals",
  "challenges",
  "researchFocusAreas",
];

const FIELD_LABELS: Record<ProfileField, string> = {
  companyName: "Company",
  industry: "Industry",
  companyDescription: "Description",
  targetCustomers: "Target customers",
  competitors: "Competitors",
  productsServices: "Products/services",
  businessModel: "Business model",
  competitiveAdvantages: "Competitive advantages",
  marketPosition: "Market position",
  strategicGoals: "Strategic goals",
  challenges: "Current challenges",
  researchFocusAreas: "Research focus",
};

export const CONTEXT_HEADER = "## Company Context";

export interface ContextBlock {
  /** Rendered block, empty when nothing was injected */
  text: string;
  /** Fields present in the block, in render order */
  fields: ProfileField[];
  /** Fields that were available but dropped to fit the budget */
  dropped: ProfileField[];
  tokens: number;
}

export interface InjectionRequest {
  basePrompt: string;
  profile: CallerProfile | null | undefined;
  /** Static per-task field list */
  fields: readonly ProfileField[];
  /** Maximum tokens the injected block may add */
  contextShare: number;
  countTokens?: TokenCounter;
}

export interface InjectedPrompt {
  prompt: string;
  block: ContextBlock;
  baseTokens: number;
  promptTokens: number;
}

interface RenderedField {
  field: ProfileField;
  line: string;
}

const EMPTY_BLOCK: ContextBlock = { text: "", fields: [], dropped: [], tokens: 0 };

function renderValue(profile: CallerProfile, field: ProfileField): string | null {
  const value = profile[field];
  if (value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    const items = value.map((item) => item.trim()).filter(Boolean);
    return items.length > 0 ? items.join(", ") : null;
  }
  const text = value.trim();
  return text ? text : null;
}

function renderFields(profile: CallerProfile, fields: readonly ProfileField[]): RenderedField[] {
  const rendered: RenderedField[] = [];
  for (const field of FIELD_RETENTION_ORDER) {
    if (!fields.includes(field)) continue;
    const value = renderValue(profile, field);
    if (value !== null) {
      rendered.push({ field, line: `- ${FIELD_LABELS[field]}: ${value}` });
    }
  }
  return rendered;
}

function formatBlock(rendered: readonly RenderedField[]): string {
  if (rendered.length === 0) {
    return "";
  }
  return [CONTEXT_HEADER, ...rendered.map((r) => r.line)].join("\n");
}

/**
 * Append a context block to a base prompt
 */
export function composePrompt(basePrompt: string, blockText: string): string {
  return blockText ? `${basePrompt}\n\n${blockText}` : basePrompt;
}

/**
 * Drop fields from the end until `fits` accepts the rendered block
 */
function fitBlock(
  rendered: RenderedField[],
  countTokens: TokenCounter,
  fits: (text: string, tokens: number) => boolean
): ContextBlock {
  const kept = [...rendered];
  const dropped: ProfileField[] = [];

  while (kept.length > 0) {
    const text = formatBlock(kept);
    const tokens = countTokens(text);
    if (fits(text, tokens)) {
      return { text, fields: kept.map((r) => r.field), dropped, tokens };
    }
    const removed = kept.pop();
    if (removed) dropped.unshift(removed.field);
  }

  return { ...EMPTY_BLOCK, dropped };
}

/**
 * Render the block for a profile within a token budget
 */
export function renderContextBlock(
  profile: CallerProfile | null | undefined,
  fields: readonly ProfileField[],
  budget: number,
  countTokens: TokenCounter = estimateTokens
): ContextBlock {
  if (!profile || budget <= 0) {
    return EMPTY_BLOCK;
  }
  return fitBlock(renderFields(profile, fields), countTokens, (_text, tokens) => tokens <= budget);
}

/**
 * Build the final prompt for a task. Without a profile the base prompt is
 * returned untouched.
 */
export function injectContext(request: InjectionRequest): InjectedPrompt {
  const countTokens = request.countTokens ?? estimateTokens;
  const { basePrompt, profile, fields, contextShare } = request;
  const baseTokens = countTokens(basePrompt);

  if (!profile || contextShare <= 0) {
    return { prompt: basePrompt, block: EMPTY_BLOCK, baseTokens, promptTokens: baseTokens };
  }

  const ceiling = baseTokens + contextShare;
  let promptTokens = baseTokens;

  const block = fitBlock(renderFields(profile, fields), countTokens, (text, tokens) => {
    if (tokens > contextShare) return false;
    promptTokens = countTokens(composePrompt(basePrompt, text));
    return promptTokens <= ceiling;
  });

  if (block.fields.length === 0) {
    promptTokens = baseTokens;
  }

  return {
    prompt: composePrompt(basePrompt, block.text),
    block,
    baseTokens,
    promptTokens,
  };
}
