import type { ProviderId } from "../providers/types.js";

export type ErrorCode =
  | "CONNECTION_FAILURE"
  | "RATE_LIMITED"
  | "AUTHENTICATION_FAILURE"
  | "INVALID_REQUEST"
  | "NOT_INITIALIZED"
  | "COST_LIMIT_EXCEEDED"
  | "CONFIGURATION_ERROR";

/** Base error for everything parley throws on purpose. */
export class ParleyError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParleyError";
    this.code = code;
  }
}

/**
 * Failure reported by a provider backend, already classified into one of
 * the four kinds the retry loop distinguishes.
 */
export class ProviderError extends ParleyError {
  readonly provider: ProviderId;

  constructor(code: ErrorCode, provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ProviderError";
    this.provider = provider;
  }
}

export class ProviderConnectionError extends ProviderError {
  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILURE", provider, message, options);
    this.name = "ProviderConnectionError";
  }
}

export class RateLimitedError extends ProviderError {
  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super("RATE_LIMITED", provider, message, options);
    this.name = "RateLimitedError";
  }
}

export class AuthenticationError extends ProviderError {
  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super("AUTHENTICATION_FAILURE", provider, message, options);
    this.name = "AuthenticationError";
  }
}

export class InvalidRequestError extends ProviderError {
  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super("INVALID_REQUEST", provider, message, options);
    this.name = "InvalidRequestError";
  }
}

/** Thrown by the session when a message is sent before any provider is active. */
export class NotInitializedError extends ParleyError {
  constructor(message = "Provider not initialized") {
    super("NOT_INITIALIZED", message);
    this.name = "NotInitializedError";
  }
}

export class CostLimitExceededError extends ParleyError {
  readonly totalCost: number;

  constructor(totalCost: number) {
    super("COST_LIMIT_EXCEEDED", `Cost limit reached! Total: $${totalCost.toFixed(6)}`);
    this.name = "CostLimitExceededError";
    this.totalCost = totalCost;
  }
}

export class ConfigurationError extends ParleyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
