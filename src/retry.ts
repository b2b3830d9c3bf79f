import { setTimeout as delay } from "node:timers/promises";
import { logger } from "./logger.js";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
  /** Name used in the retry log line. */
  label?: string;
};

/**
 * Runs `fn` until it resolves or `retries` extra attempts have failed. The delay
 * doubles after every failure. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      const wait = config.backoffMs * Math.pow(2, attempt);
      logger.warn("retry.scheduled", {
        label: config.label,
        attempt: attempt + 1,
        waitMs: wait,
        error: error instanceof Error ? error.message : String(error)
      });
      await delay(wait);
      attempt += 1;
    }
  }

  throw lastError;
}
