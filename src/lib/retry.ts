import { setTimeout as delay } from 'node:timers/promises';

export interface RetryOptions {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Exponential delay before retry number `attempt` (1-based), capped */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs = Number.POSITIVE_INFINITY,
): number {
  return Math.min(initialDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Runs the operation until it succeeds or the attempts are used up
 * @throws the last error once every attempt failed
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === options.attempts) {
        break;
      }
      const delayMs = backoffDelay(
        attempt,
        options.initialDelayMs,
        options.maxDelayMs,
      );
      options.onRetry?.(error, attempt, delayMs);
      await delay(delayMs, undefined, { signal: options.signal });
    }
  }
  throw lastError;
}

/** Rejects with `onTimeout()` when the promise does not settle in time */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
