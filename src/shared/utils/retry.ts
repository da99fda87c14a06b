/**
 * Retry with Exponential Backoff
 *
 * Used by the page fetcher only; the extraction core never retries.
 * With maxAttempts = 1 the function is a plain call.
 */
import { logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Optional label for log messages */
  label?: string;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Executes an async function with exponential backoff retry.
 *
 * @returns The result of fn() on success
 * @throws The last error if all attempts are exhausted
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    label = "operation",
    shouldRetry = () => true,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= attempts || !shouldRetry(lastError)) {
        if (attempts > 1) {
          logger.debug(
            { attempt, maxAttempts: attempts, error: lastError.message, label },
            `${label} giving up after ${attempt} attempt(s)`
          );
        }
        throw lastError;
      }

      const delay = Math.round(initialDelayMs * Math.pow(backoffFactor, attempt - 1));

      logger.warn(
        { attempt, maxAttempts: attempts, delay, error: lastError.message, label },
        `${label} attempt ${attempt} failed, retrying in ${delay}ms`
      );

      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
