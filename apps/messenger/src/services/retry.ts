import { setTimeout as delay } from "node:timers/promises";

export interface RetryConfig {
  /** Maximum number of attempts (includes the first) */
  attempts: number;
  /** Base delay in ms; backoff: baseDelayMs * 2^attempt */
  baseDelayMs: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
  /** Called before each wait with the 1-based number of the failed attempt. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => delay(ms);

/**
 * Executes `fn` with exponential retry. `fn` receives the 0-based attempt index.
 * Throws the last attempt's error if all attempts fail.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, config: RetryConfig): Promise<T> {
  const sleep = config.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < config.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (config.shouldRetry && !config.shouldRetry(err)) {
        throw err;
      }
      if (attempt < config.attempts - 1) {
        const delayMs = config.baseDelayMs * 2 ** attempt;
        config.onRetry?.({ attempt: attempt + 1, delayMs, error: err });
        await sleep(delayMs);
      }
    }
  }

  throw lastError;
}
