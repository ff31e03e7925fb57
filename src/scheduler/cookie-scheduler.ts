/**
 * Cookie Scheduler
 *
 * Owns the refresh loop: one timer, at most one attempt in flight, and the
 * consecutive-failure counter. A usable result replaces the jar and is
 * persisted; anything else leaves the store untouched and backs off.
 *
 * Manual triggers join an attempt that is already running instead of
 * starting a second one.
 */

import { TypedSchedulerEmitter, type SchedulerState } from "../events/index.js";
import { CookieJar } from "../cookies/jar.js";
import type { CookieStore } from "../cookies/store.js";
import type { CookieRefresher } from "../clients/cookie-refresher.js";
import type { ErrorRecovery, RecoveryStatus } from "./error-recovery.js";
import type {
  RefreshFailure,
  RefreshResult,
  RefreshSummary,
  RefreshTrigger,
  StoreMetadata,
} from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { CancelledError, ServiceNotRunningError, errorMessage } from "../shared/errors.js";
import { withTimeout } from "../shared/timeout.js";
import { addBreadcrumb, captureAlert } from "../shared/tracing.js";
import { ABORT_SETTLE_MS } from "../shared/constants.js";

const logger = createLogger("CookieScheduler");

export type SchedulerStore = Pick<CookieStore, "load" | "save" | "jarIsValid">;

export type RefreshRunner = Pick<CookieRefresher, "refresh">;

export interface CookieSchedulerOptions {
  readonly store: SchedulerStore;
  readonly refresher: RefreshRunner;
  readonly recovery: ErrorRecovery;
  readonly intervalMs: number;
  readonly refreshOnStart: boolean;
}

export interface StopOptions {
  /** How long an in-flight attempt may keep running before it is aborted */
  readonly graceMs: number;
}

export interface SchedulerStatus {
  readonly state: SchedulerState;
  readonly nextRunAt: string | null;
  readonly inFlight: boolean;
  readonly cookieCount: number;
  readonly lastAttempt: RefreshSummary | null;
  readonly recovery: RecoveryStatus;
}

interface InFlightAttempt {
  readonly trigger: RefreshTrigger;
  readonly controller: AbortController;
  readonly promise: Promise<RefreshResult>;
}

export class CookieScheduler extends TypedSchedulerEmitter {
  private readonly options: CookieSchedulerOptions;
  private state: SchedulerState = "idle";
  private started = false;
  private stopping = false;
  private jar = new CookieJar();
  private metadata: StoreMetadata | null = null;
  private failures = 0;
  /** Validated jar whose save failed; written before the next attempt */
  private pendingPersist: CookieJar | null = null;
  private timer: NodeJS.Timeout | null = null;
  private nextRunAt: Date | null = null;
  private inFlight: InFlightAttempt | null = null;
  private lastAttempt: RefreshSummary | null = null;

  constructor(options: CookieSchedulerOptions) {
    super();
    this.options = options;
    this.setMaxListeners(20);
    this.on("error", (error: unknown) => {
      logger.error("Scheduler emitter error", error);
    });
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  get currentJar(): CookieJar {
    return this.jar;
  }

  /**
   * Load the persisted jar, seed the failure counter from its metadata and
   * arm the first run.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    const snapshot = await this.options.store.load({ quarantineCorrupt: true });
    this.jar = snapshot.jar;
    this.metadata = snapshot.metadata;
    this.failures = snapshot.metadata.consecutiveFailures;
    this.started = true;
    this.stopping = false;

    logger.info("Scheduler started", {
      cookieCount: this.jar.size,
      consecutiveFailures: this.failures,
      intervalMs: this.options.intervalMs,
      refreshOnStart: this.options.refreshOnStart,
    });

    const first = this.options.refreshOnStart ? 0 : this.options.intervalMs;
    this.arm(first, "idle", this.options.refreshOnStart ? "startup" : "scheduled");
  }

  /**
   * Run an attempt now, or join the one already running.
   *
   * @throws ServiceNotRunningError before `start` or after `stop`
   */
  async triggerManualRefresh(): Promise<RefreshResult> {
    if (!this.started || this.stopping) {
      throw new ServiceNotRunningError("Scheduler is not running");
    }
    return this.runAttempt("manual");
  }

  /**
   * Stop scheduling. An in-flight attempt gets `graceMs` to finish; after
   * that it is aborted and recorded as a failed attempt.
   */
  async stop(options: StopOptions): Promise<void> {
    if (!this.started || this.stopping) {
      return;
    }
    this.stopping = true;
    this.clearTimer();

    const attempt = this.inFlight;
    if (attempt) {
      try {
        await withTimeout("refresh grace period", () => attempt.promise, options.graceMs);
      } catch {
        logger.warn("Grace period over; aborting in-flight refresh", {
          trigger: attempt.trigger,
          graceMs: options.graceMs,
        });
        attempt.controller.abort(new CancelledError("Refresh aborted by shutdown"));
        try {
          await withTimeout("refresh abort", () => attempt.promise, ABORT_SETTLE_MS);
        } catch (error) {
          logger.error("Aborted refresh did not settle", error);
        }
      }
    }

    this.started = false;
    this.setState("stopped", null);
    logger.info("Scheduler stopped", { consecutiveFailures: this.failures });
  }

  /**
   * Persist the failure counter (and any jar whose save failed) when it
   * differs from what is on disk. Returns true when something was written.
   */
  async checkpoint(): Promise<boolean> {
    const metadata = this.metadata;
    if (metadata === null || this.jar.isEmpty()) {
      return false;
    }
    if (metadata.consecutiveFailures === this.failures && this.pendingPersist === null) {
      return false;
    }

    this.metadata = await this.options.store.save(
      this.jar,
      { ...metadata, consecutiveFailures: this.failures },
      { kind: "checkpoint" }
    );
    this.pendingPersist = null;
    logger.info("Scheduler state checkpointed", { consecutiveFailures: this.failures });
    return true;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
      inFlight: this.inFlight !== null,
      cookieCount: this.jar.size,
      lastAttempt: this.lastAttempt,
      recovery: this.options.recovery.describe(this.failures),
    };
  }

  private runAttempt(trigger: RefreshTrigger): Promise<RefreshResult> {
    if (this.inFlight) {
      logger.info("Refresh already running; joining it", {
        requested: trigger,
        running: this.inFlight.trigger,
      });
      return this.inFlight.promise;
    }

    this.clearTimer();
    const controller = new AbortController();
    const promise = this.execute(trigger, controller.signal);
    this.inFlight = { trigger, controller, promise };
    return promise;
  }

  private async execute(trigger: RefreshTrigger, signal: AbortSignal): Promise<RefreshResult> {
    this.setState("refreshing", null);
    await this.persistPending();

    let result: RefreshResult;
    try {
      result = await this.options.refresher.refresh(this.jar, { signal });
    } catch (error) {
      logger.error("Refresher threw unexpectedly", error);
      result = {
        succeeded: false,
        jar: null,
        validatedOnline: false,
        error: { kind: "ExtractionError", message: errorMessage(error) },
        timestamp: new Date().toISOString(),
        durationMs: 0,
      };
    }

    const failure = await this.apply(result);
    this.inFlight = null;

    const summary: RefreshSummary = {
      at: result.timestamp,
      trigger,
      outcome: failure === null ? "success" : "failure",
      errorKind: failure?.kind ?? null,
      message: failure?.message ?? null,
      cookieCount: failure === null ? this.jar.size : null,
    };
    this.lastAttempt = summary;

    if (this.stopping) {
      this.nextRunAt = null;
    } else if (failure === null) {
      this.arm(this.options.intervalMs, "idle", "scheduled");
    } else {
      this.arm(this.options.recovery.delayAfterFailure(this.failures), "backoff", "scheduled");
    }

    const logContext = {
      event: "refresh",
      trigger,
      outcome: summary.outcome,
      errorKind: summary.errorKind,
      error: summary.message,
      validatedOnline: result.validatedOnline,
      cookieCount: summary.cookieCount,
      consecutiveFailures: this.failures,
      durationMs: result.durationMs,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
    if (failure === null) {
      logger.info("Refresh attempt finished", logContext);
    } else {
      logger.warn("Refresh attempt finished", logContext);
    }
    addBreadcrumb(`Refresh ${summary.outcome}`, "refresh", failure === null ? "info" : "warning", {
      trigger,
      errorKind: summary.errorKind,
    });

    if (failure !== null && this.options.recovery.alertOnFailure(this.failures)) {
      this.raiseAlert(failure);
    }

    this.emitEvent("refresh:completed", {
      summary,
      result,
      consecutiveFailures: this.failures,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    });
    return result;
  }

  /**
   * Fold an attempt's result into scheduler state. Returns the failure, or
   * null when the new jar was accepted and persisted.
   */
  private async apply(result: RefreshResult): Promise<RefreshFailure | null> {
    const failure = this.classify(result);
    if (failure !== null || result.jar === null) {
      this.failures += 1;
      return failure ?? { kind: "ExtractionError", message: "Refresh returned no cookies" };
    }

    this.jar = result.jar;
    try {
      this.metadata = await this.options.store.save(result.jar, this.currentMetadata(), {
        kind: "refresh",
      });
      this.pendingPersist = null;
      this.failures = 0;
      return null;
    } catch (error) {
      this.pendingPersist = result.jar;
      this.failures += 1;
      logger.error("Refreshed cookies could not be saved; keeping them in memory", error);
      return { kind: "SaveError", message: errorMessage(error) };
    }
  }

  private classify(result: RefreshResult): RefreshFailure | null {
    if (!result.succeeded || result.jar === null) {
      return result.error ?? { kind: "ExtractionError", message: "Refresh failed" };
    }
    if (!result.validatedOnline) {
      return {
        kind: "ValidationError",
        message: "Refreshed cookies were not accepted by the platform",
      };
    }
    if (!this.options.store.jarIsValid(result.jar, new Date())) {
      return {
        kind: "ValidationError",
        message: "Refreshed cookies are missing required cookies or already expired",
      };
    }
    return null;
  }

  private async persistPending(): Promise<void> {
    const pending = this.pendingPersist;
    if (pending === null) {
      return;
    }
    try {
      this.metadata = await this.options.store.save(pending, this.currentMetadata(), {
        kind: "refresh",
      });
      this.pendingPersist = null;
      logger.info("Previously unsaved cookies persisted", { cookieCount: pending.size });
    } catch (error) {
      logger.warn("Unsaved cookies still cannot be written", { error: errorMessage(error) });
    }
  }

  private raiseAlert(failure: RefreshFailure): void {
    const message = `Cookie refresh failed ${this.failures} times in a row: ${failure.message}`;
    logger.error("ALERT: cookie refresh keeps failing", undefined, {
      alert: true,
      consecutiveFailures: this.failures,
      errorKind: failure.kind,
      error: failure.message,
    });
    captureAlert(message, { consecutiveFailures: this.failures, errorKind: failure.kind });
    this.emitEvent("alert:raised", {
      consecutiveFailures: this.failures,
      lastError: failure,
      message,
    });
  }

  private currentMetadata(): StoreMetadata {
    return {
      lastRefreshedAt: null,
      lastImportAt: null,
      refreshCount: 0,
      lastValidatedAt: null,
      validationStatus: "unknown",
      source: "unknown",
      ...this.metadata,
      consecutiveFailures: this.failures,
    };
  }

  private arm(delayMs: number, state: SchedulerState, trigger: RefreshTrigger): void {
    this.clearTimer();
    const at = new Date(Date.now() + delayMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAttempt(trigger).catch((error: unknown) => {
        logger.error("Scheduled refresh crashed", error, { trigger });
      });
    }, delayMs);
    this.setState(state, at);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private setState(state: SchedulerState, nextRunAt: Date | null): void {
    this.state = state;
    this.nextRunAt = nextRunAt;
    this.emitEvent("schedule:updated", { state, nextRunAt: nextRunAt?.toISOString() ?? null });
  }
}
