import { setTimeout as sleep } from "timers/promises";
import { TransientInfrastructureError } from "../errors/DomainErrors";
import { logger } from "../logger";

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  initialDelayMs: 50,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
};

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientInfrastructureError;
}

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(delay, maxDelayMs);
}

/**
 * Run a read at the cache/store boundary, retrying transient failures with
 * exponential backoff. Writes that are not idempotent (refresh rotation)
 * must not go through here.
 */
export async function retryTransient<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
  const initialDelayMs =
    options.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const backoffMultiplier =
    options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier;
  const isRetryable = options.isRetryable ?? isTransientError;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt === maxAttempts - 1) {
        throw error;
      }

      const delay = calculateBackoff(
        attempt,
        initialDelayMs,
        maxDelayMs,
        backoffMultiplier,
      );
      logger.warn(`${operationName} failed, retrying`, {
        attempt: attempt + 1,
        maxAttempts,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay, undefined, { signal: options.signal });
    }
  }

  throw lastError;
}
