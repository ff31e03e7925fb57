/**
 * Error Recovery Policy
 *
 * Pure backoff and alerting rules over a consecutive-failure counter.
 * Holds no state and performs no I/O; the scheduler owns the counter.
 */

import { calculateDelay } from "../shared/retry.js";
import type { RecoveryConfig } from "../config/index.js";

export interface RecoveryStatus {
  readonly consecutiveFailures: number;
  readonly alertThreshold: number;
  /** At or past the alert threshold */
  readonly alerting: boolean;
  /** Delay before the next attempt; null while healthy */
  readonly nextRetryDelayMs: number | null;
}

export class ErrorRecovery {
  private readonly config: RecoveryConfig;

  constructor(config: RecoveryConfig) {
    this.config = config;
  }

  get alertThreshold(): number {
    return this.config.alertThreshold;
  }

  /** min(base * 2^n, max) */
  nextDelay(n: number): number {
    return calculateDelay(Math.max(0, n), {
      baseDelayMs: this.config.baseDelayMs,
      maxDelayMs: this.config.maxDelayMs,
      jitter: false,
    });
  }

  /** Wait after the `failures`-th consecutive failure; the first waits the base delay */
  delayAfterFailure(failures: number): number {
    return this.nextDelay(failures - 1);
  }

  shouldAlert(failures: number): boolean {
    return failures >= this.config.alertThreshold;
  }

  /**
   * True only on the failure that crosses the threshold, so one alert fires
   * per failure episode. A success resets the counter and re-arms it.
   */
  alertOnFailure(failures: number): boolean {
    return failures === this.config.alertThreshold;
  }

  describe(failures: number): RecoveryStatus {
    return {
      consecutiveFailures: failures,
      alertThreshold: this.config.alertThreshold,
      alerting: this.shouldAlert(failures),
      nextRetryDelayMs: failures > 0 ? this.delayAfterFailure(failures) : null,
    };
  }
}
