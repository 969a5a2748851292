/**
 * Custom Error Types
 * Structured errors for provider resolution, generation and validation
 */

import type { ProviderId } from "../providers/types.js";

/**
 * Base error class for all market-scout errors
 */
export class ScoutError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "ScoutError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends ScoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Caller profile could not be read or failed validation
 */
export class ProfileError extends ScoutError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: Error) {
    super(message, "PROFILE_ERROR", { cause, context: { path }, retryable: false });
    this.name = "ProfileError";
    this.path = path;
  }
}

/**
 * Provider endpoint rejected the connection or answered with a
 * non-recoverable status. Fatal to the run.
 */
export class ProviderUnavailableError extends ScoutError {
  public readonly provider?: ProviderId;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: {
      provider?: ProviderId;
      statusCode?: number;
      cause?: Error;
      code?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, options?.code ?? "PROVIDER_UNAVAILABLE", {
      cause: options?.cause,
      context: {
        ...options?.context,
        provider: options?.provider,
        statusCode: options?.statusCode,
      },
      retryable: false,
    });
    this.name = "ProviderUnavailableError";
    this.provider = options?.provider;
    this.statusCode = options?.statusCode;
  }
}

/**
 * No provider has its credential slot filled
 */
export class CredentialMissingError extends ProviderUnavailableError {
  public readonly slots: string[];

  constructor(slots: string[], provider?: ProviderId) {
    super(
      provider
        ? `Provider '${provider}' is not available. Missing credential: ${slots.join(", ")}`
        : `No LLM providers available. Set one of: ${slots.join(", ")}`,
      { provider, code: "CREDENTIAL_MISSING", context: { slots } }
    );
    this.name = "CredentialMissingError";
    this.slots = slots;
  }
}

/**
 * Provider throttled the request (429 or overloaded)
 */
export class RateLimitedError extends ScoutError {
  public readonly provider: ProviderId;
  public readonly statusCode?: number;

  constructor(provider: ProviderId, statusCode?: number, cause?: Error) {
    super(`Rate limited by ${provider}${statusCode ? ` (status ${statusCode})` : ""}`, "RATE_LIMITED", {
      cause,
      context: { provider, statusCode },
      retryable: true,
    });
    this.name = "RateLimitedError";
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

/**
 * Generation request did not finish within the configured timeout
 */
export class TimeoutExceededError extends ScoutError {
  public readonly provider: ProviderId;
  public readonly timeoutMs?: number;

  constructor(provider: ProviderId, timeoutMs?: number, cause?: Error) {
    super(
      `Request to ${provider} timed out${timeoutMs ? ` after ${timeoutMs}ms` : ""}`,
      "TIMEOUT_EXCEEDED",
      { cause, context: { provider, timeoutMs }, retryable: true }
    );
    this.name = "TimeoutExceededError";
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Model text could not be parsed into the required structure
 */
export class MalformedOutputError extends ScoutError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: Error) {
    super(message, "MALFORMED_OUTPUT", { cause, context: { issues }, retryable: true });
    this.name = "MalformedOutputError";
    this.issues = issues;
  }
}

/**
 * The run was cancelled while a task still had retries left
 */
export class TaskCancelledError extends ScoutError {
  public readonly taskId: string;
  public readonly attempts: number;

  constructor(taskId: string, attempts: number) {
    super(`Task '${taskId}' cancelled after ${attempts} attempt${attempts === 1 ? "" : "s"}`, "CANCELLED", {
      context: { taskId, attempts },
      retryable: false,
    });
    this.name = "TaskCancelledError";
    this.taskId = taskId;
    this.attempts = attempts;
  }
}

/**
 * A task exhausted its retry budget. Terminal for the task and the run.
 */
export class ValidationFailureError extends ScoutError {
  public readonly taskId: string;
  public readonly attempts: number;

  constructor(taskId: string, attempts: number, cause?: Error) {
    super(
      `Task '${taskId}' produced no valid output after ${attempts} attempt${attempts === 1 ? "" : "s"}${
        cause ? `: ${cause.message}` : ""
      }`,
      "VALIDATION_FAILURE",
      { cause, context: { taskId, attempts }, retryable: false }
    );
    this.name = "ValidationFailureError";
    this.taskId = taskId;
    this.attempts = attempts;
  }
}

/**
 * Type guard to check if error is a market-scout error
 */
export function isScoutError(error: unknown): error is ScoutError {
  return error instanceof ScoutError;
}

/**
 * Type guard for errors the validator may retry
 */
export function isRetryableError(error: unknown): error is ScoutError {
  if (isScoutError(error)) {
    return error.retryable;
  }
  return false;
}

/**
 * Wrap an unknown error into a market-scout error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): ScoutError {
  if (isScoutError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ScoutError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new ScoutError(typeof error === "string" ? error : defaultMessage, "UNKNOWN_ERROR");
}
