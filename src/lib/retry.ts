import { errorMessage, isRecoverable } from './errors.js';

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  /** Tag used in the retry warning, e.g. "Graph createSubscription" */
  label?: string;
  isRetryable?: (error: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff: base, 2x base, 4x base, ... */
export function backoffDelay(attempt: number, baseDelayMs = BASE_DELAY_MS): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Retry wrapper with exponential backoff for recoverable errors.
 * Non-retryable errors are rethrown at once; the last error is rethrown when retries run out.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  const isRetryable = options.isRetryable ?? isRecoverable;
  const label = options.label ?? 'Operation';

  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= retries) {
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelayMs);
      console.warn(
        `${label} failed (attempt ${attempt + 1}/${retries + 1}): ${errorMessage(error)}. Retrying in ${delay}ms...`
      );
      await sleep(delay);
      attempt++;
    }
  }
}
