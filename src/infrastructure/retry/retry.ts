import { AppError, TransportError } from "../../domain/common/errors";
import { computeBackoffMs, sleep, type BackoffConfig } from "./backoff";

export type RetryConfig = {
  maxRetries: number;
  backoff: BackoffConfig;
};

/** Only transport failures marked retryable (and foreign errors) are retried. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TransportError) return error.retryable;
  if (error instanceof AppError) return false;
  return error instanceof Error;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt > config.maxRetries) break;
      const waitMs = computeBackoffMs(attempt, config.backoff);
      await sleep(waitMs);
    }
  }
  throw lastError;
}
