/**
 * Provider error classification
 * Maps SDK/transport failures onto the error taxonomy used by the
 * validator's retry layer.
 */

import {
  ProviderUnavailableError,
  RateLimitedError,
  ScoutError,
  TimeoutExceededError,
} from "../core/errors.js";
import type { ProviderId } from "../providers/types.js";

/** Statuses that mean "try again shortly" rather than "this will never work" */
const THROTTLE_STATUSES = new Set([429, 503, 529]);

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function isTimeout(error: Error): boolean {
  return (
    error.name === "AbortError" ||
    error.name === "TimeoutError" ||
    error.name === "APIConnectionTimeoutError" ||
    /timed?[ -]?out/i.test(error.message)
  );
}

export function classifyProviderError(
  error: unknown,
  provider: ProviderId,
  timeoutMs?: number
): ScoutError {
  if (error instanceof ScoutError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const status = statusOf(error);

  if (status === 408 || (status === undefined && isTimeout(cause))) {
    return new TimeoutExceededError(provider, timeoutMs, cause);
  }

  if (status !== undefined && THROTTLE_STATUSES.has(status)) {
    return new RateLimitedError(provider, status, cause);
  }

  return new ProviderUnavailableError(
    status !== undefined
      ? `${provider} rejected the request with status ${status}: ${cause.message}`
      : `${provider} is unreachable: ${cause.message}`,
    { provider, statusCode: status, cause }
  );
}
