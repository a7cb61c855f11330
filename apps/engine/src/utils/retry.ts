import { logger } from '../config/index.js';

export interface RetryOptions {
  maxRetries: number;           // Total attempts, including the first
  baseDelayMs: number;          // Delay before the second attempt; doubles each time
  isRetryable?: (error: unknown) => boolean;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `operation` until it succeeds, waiting `baseDelayMs * 2^attempt`
 * between failures. Errors rejected by `isRetryable` are rethrown at once;
 * after the last attempt the last error is rethrown unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, isRetryable = () => true, label = 'operation', sleep = delay } = options;
  const attempts = Math.max(1, maxRetries);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt < attempts - 1) {
        const waitMs = baseDelayMs * 2 ** attempt;
        logger.warn({
          error,
          label,
          attempt: attempt + 1,
          maxRetries: attempts,
          waitMs,
        }, 'Attempt failed, retrying');
        await sleep(waitMs);
      } else {
        logger.error({ error, label, maxRetries: attempts }, 'All attempts failed');
      }
    }
  }

  throw lastError;
}
