/**
 * Retry Handler
 *
 * Exponential backoff with jitter for transient failures (browser launch).
 */

import { createLogger } from "./logger.js";
import { delay } from "./timeout.js";
import {
  BROWSER_LAUNCH_RETRY_DELAY_MS,
  RETRY_JITTER_MAX,
  RETRY_JITTER_MIN,
} from "./constants.js";

const logger = createLogger("RetryHandler");

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2, so 3 attempts in total) */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs: number;
  /** Add randomization to prevent thundering herd (default: false) */
  jitter: boolean;
  /** Decide whether an error is worth another attempt (default: always) */
  shouldRetry: (error: unknown) => boolean;
  /** Stops waiting and retrying when aborted */
  signal?: AbortSignal;
  /** Label used in log lines */
  operation: string;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: BROWSER_LAUNCH_RETRY_DELAY_MS,
  maxDelayMs: BROWSER_LAUNCH_RETRY_DELAY_MS * 4,
  jitter: false,
  shouldRetry: () => true,
  operation: "operation",
};

/**
 * Execute a function with retry logic.
 *
 * Uses exponential backoff with optional jitter to handle transient failures.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (opts.signal?.aborted || !opts.shouldRetry(error)) {
        logger.debug("Non-retryable error", { operation: opts.operation, error: message });
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        logger.warn("All retry attempts exhausted", {
          operation: opts.operation,
          attempts: attempt + 1,
          error: message,
        });
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);

      logger.warn("Retrying after failure", {
        operation: opts.operation,
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs,
        error: message,
      });

      await delay(delayMs, opts.signal);
    }
  }
}

/**
 * Calculate delay for exponential backoff with optional jitter.
 */
export function calculateDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitter">
): number {
  let delayMs = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);

  if (options.jitter) {
    delayMs = delayMs * (RETRY_JITTER_MIN + Math.random() * (RETRY_JITTER_MAX - RETRY_JITTER_MIN));
  }

  return Math.round(delayMs);
}
