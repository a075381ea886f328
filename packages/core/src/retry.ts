import { createChildLogger } from "./logger.js";
import { formatError, isRetryable } from "./errors.js";

const logger = createChildLogger({ module: "core:retry" });

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
};

/**
 * Retry a function with exponential backoff and ±25% jitter.
 * Only transient failures are retried; everything else is rethrown on the spot.
 * When attempts run out, or the signal aborts a backoff, the last transient
 * error is rethrown unchanged so the caller can decide how to classify it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  label: string,
  options?: Partial<RetryOptions>
): Promise<T> {
  const opts = { ...DEFAULT_RETRY, ...options };
  const retryable = opts.retryableErrors ?? isRetryable;
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!retryable(error)) {
        logger.debug(
          { label, attempt, error: formatError(error) },
          "Non-retryable error"
        );
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.error(
          { label, attempt, error: formatError(error) },
          "Max retries exhausted"
        );
        break;
      }

      const jittered = delay * (0.75 + Math.random() * 0.5);
      logger.warn(
        { label, attempt, nextRetryMs: Math.round(jittered), error: formatError(error) },
        "Retrying after transient error"
      );
      opts.onRetry?.(attempt, error, jittered);

      await sleep(jittered, opts.signal);
      if (opts.signal?.aborted) throw error;
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
