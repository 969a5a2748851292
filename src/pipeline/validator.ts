/**
 * Output Validator
 * Turns raw model text into a schema-checked payload, retrying within a
 * fixed budget.
 *
 * RETRY POLICY:
 * =============
 * attempts = 1 + maxRetries, no backoff
 *   MalformedOutputError     → retry with the amended prompt
 *   RateLimitedError         → retry, same prompt
 *   TimeoutExceededError     → retry, same prompt
 *   ProviderUnavailableError → thrown at once
 * budget exhausted           → ValidationFailureError(attempts, last cause)
 * signal aborted before retry → TaskCancelledError, no further request
 */

import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { logger, type ChildLogger } from "../core/logger.js";
import {
  isRetryableError,
  MalformedOutputError,
  TaskCancelledError,
  ValidationFailureError,
  type ScoutError,
} from "../core/errors.js";
import type { BoundLlm } from "../llm/types.js";

export interface ValidatedOutput<T> {
  data: T;
  attempts: number;
  /** Raw text of the accepted response */
  raw: string;
}

export interface GenerateValidatedOptions<S extends z.ZodTypeAny> {
  llm: BoundLlm;
  prompt: string;
  schema: S;
  maxRetries: number;
  /** Used in errors and log context */
  taskId?: string;
  log?: ChildLogger;
  /** Checked before each retry; the request in flight is allowed to finish */
  signal?: AbortSignal;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Compact JSON schema for a zod schema, as shown to the model
 */
export function describeSchema(schema: z.ZodTypeAny): string {
  return JSON.stringify(zodToJsonSchema(schema, { $refStrategy: "none" }));
}

export function formatOutputInstructions(schema: z.ZodTypeAny): string {
  return `Respond with only a JSON object matching this JSON schema, with no other text:
${describeSchema(schema)}`;
}

/**
 * Prompt for the next attempt after a malformed response. Always built from
 * the original prompt so repeated failures do not compound.
 */
export function amendPrompt(
  prompt: string,
  error: MalformedOutputError,
  schema: z.ZodTypeAny
): string {
  const issues = error.issues.length > 0 ? `\n${error.issues.map((i) => `- ${i}`).join("\n")}` : "";
  return `${prompt}

Your previous answer was rejected: ${error.message}${issues}
${formatOutputInstructions(schema)}`;
}

/**
 * Cut the outermost JSON object or array out of surrounding prose
 */
function extractJson(text: string): string | null {
  const fenced = FENCED_BLOCK.exec(text);
  const body = (fenced?.[1] ?? text).trim();

  const objectStart = body.indexOf("{");
  const arrayStart = body.indexOf("[");
  const candidates = [objectStart, arrayStart].filter((i) => i >= 0);
  if (candidates.length === 0) {
    return null;
  }

  const start = Math.min(...candidates);
  const closer = body[start] === "{" ? "}" : "]";
  const end = body.lastIndexOf(closer);
  if (end <= start) {
    return null;
  }

  return body.slice(start, end + 1);
}

/**
 * Parse model text against a schema
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> {
  const json = extractJson(text);
  if (json === null) {
    throw new MalformedOutputError("Response contains no JSON object");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedOutputError(
      `Response is not valid JSON: ${message}`,
      [],
      error instanceof Error ? error : undefined
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(
      (e: z.ZodIssue) => `${e.path.join(".") || "(root)"}: ${e.message}`
    );
    throw new MalformedOutputError("Response does not match the required structure", issues);
  }

  return result.data;
}

/**
 * Generate and validate, retrying recoverable failures within the budget
 */
export async function generateValidated<S extends z.ZodTypeAny>(
  options: GenerateValidatedOptions<S>
): Promise<ValidatedOutput<z.infer<S>>> {
  const { llm, prompt, schema, maxRetries } = options;
  const taskId = options.taskId ?? "unnamed";
  const log = options.log ?? logger.child({ component: "validator", taskId });
  const maxAttempts = maxRetries + 1;

  let currentPrompt = prompt;
  let lastError: ScoutError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && options.signal?.aborted) {
      log.info("Retry skipped: run cancelled", { attempt });
      throw new TaskCancelledError(taskId, attempt - 1);
    }

    try {
      const raw = await llm.client.generate(currentPrompt, llm.config);
      const data = parseStructuredOutput(raw, schema);
      if (attempt > 1) {
        log.info("Output accepted after retry", { attempt });
      }
      return { data, attempts: attempt, raw };
    } catch (error) {
      if (!isRetryableError(error)) {
        throw error;
      }

      lastError = error;
      log.warn(`Attempt ${attempt}/${maxAttempts} failed: ${error.message}`, {
        attempt,
        code: error.code,
      });

      if (error instanceof MalformedOutputError) {
        currentPrompt = amendPrompt(prompt, error, schema);
      }
    }
  }

  throw new ValidationFailureError(taskId, maxAttempts, lastError);
}
