/**
 * Timeout Utilities
 *
 * Bounds async operations (browser launch, navigation, extraction, probe)
 * so a hung browser cannot stall the refresh loop.
 */

import { createLogger } from "./logger.js";
import { CancelledError } from "./errors.js";

const logger = createLogger("timeout");

/** Timeout error thrown when operations exceed time limit */
export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps an async operation with a timeout.
 *
 * The returned promise settles as soon as the timeout fires or `signal`
 * aborts, even if `fn` ignores the signal it is given.
 *
 * @param operation - Name of the operation for error messages
 * @param fn - Async function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param signal - Optional AbortSignal to cancel the operation
 * @returns Promise that resolves with the operation result or rejects with
 *   TimeoutError (timeout) or the abort reason (cancellation)
 */
export async function withTimeout<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const combined = signal ? createCombinedSignal(signal, controller.signal) : null;
  const combinedSignal = combined?.signal ?? controller.signal;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = (): void => {
      reject(abortReason(combinedSignal, operation));
    };
    if (combinedSignal.aborted) {
      onAbort();
    } else {
      combinedSignal.addEventListener("abort", onAbort, { once: true });
    }
  });

  const timeoutId = setTimeout(() => {
    logger.warn("Operation timed out", { operation, timeoutMs });
    controller.abort(new TimeoutError(operation, timeoutMs));
  }, timeoutMs);

  try {
    return await Promise.race([fn(combinedSignal), aborted]);
  } finally {
    clearTimeout(timeoutId);
    if (onAbort) {
      combinedSignal.removeEventListener("abort", onAbort);
    }
    combined?.dispose();
  }
}

function abortReason(signal: AbortSignal, operation: string): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  return new CancelledError(`Operation '${operation}' was cancelled`);
}

/**
 * Creates a combined AbortSignal that triggers when either signal is aborted.
 * `dispose` detaches the listeners from both inputs.
 */
function createCombinedSignal(
  signal1: AbortSignal,
  signal2: AbortSignal
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const abort1 = (): void => {
    controller.abort(signal1.reason);
  };
  const abort2 = (): void => {
    controller.abort(signal2.reason);
  };

  if (signal1.aborted) {
    controller.abort(signal1.reason);
  } else {
    signal1.addEventListener("abort", abort1, { once: true });
  }

  if (signal2.aborted) {
    controller.abort(signal2.reason);
  } else {
    signal2.addEventListener("abort", abort2, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: (): void => {
      signal1.removeEventListener("abort", abort1);
      signal2.removeEventListener("abort", abort2);
    },
  };
}

/**
 * Resolve after `ms`, or reject early with the abort reason.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal, "delay"));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal, "delay") : new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * True for both our TimeoutError and library timeouts (Playwright's
 * `errors.TimeoutError` shares the name).
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}
