import {
  AuthenticationError,
  InvalidRequestError,
  ProviderConnectionError,
  ProviderError,
  errorMessage,
} from "../error/errors.js";
import type { ProviderId } from "./types.js";

export const DEFAULT_MAX_RETRIES = 3;

export interface RetryOptions {
  provider: ProviderId;
  maxRetries: number;
  // Maps an SDK error onto our taxonomy; undefined means "not an SDK error"
  classify: (error: unknown) => ProviderError | undefined;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before attempt `attempt + 1`: 1s, 2s, 4s, ... */
export function backoffDelay(attempt: number): number {
  return 2 ** attempt * 1000;
}

/**
 * Runs `fn` up to `maxRetries` times with exponential backoff.
 *
 * Authentication and invalid-request failures are thrown on first sight.
 * Connection failures, rate limits and unrecognised errors are retried;
 * on the final attempt the classified error is thrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; attempt < options.maxRetries; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      const classified = options.classify(error) ??
        new ProviderConnectionError(options.provider, `Unexpected error: ${errorMessage(error)}`, { cause: error });

      if (classified instanceof AuthenticationError || classified instanceof InvalidRequestError) {
        throw classified;
      }
      if (attempt === options.maxRetries - 1) {
        throw classified;
      }

      const delay = backoffDelay(attempt);
      options.onRetry?.(classified, attempt, delay);
      await wait(delay);
    }
  }

  throw new ProviderConnectionError(options.provider, "max retries exceeded");
}
