/**
 * Service Manager
 *
 * Lifecycle of the long-running service: singleton lock, component wiring,
 * state file updates, signal handling and graceful shutdown. Commands aimed
 * at an instance in another process live in ./control.ts.
 */

import { SingletonLock } from "./singleton-lock.js";
import { StateFile, type PersistedState } from "./state-file.js";
import { readServiceState, requestManualRefresh, stopService, type StopResult } from "./control.js";
import { startDaemon, type DaemonHandle } from "./daemon.js";
import type { BrowserConfig, Config } from "../config/index.js";
import { createBrowserBackend, type BrowserBackend } from "../clients/browser-backends/index.js";
import { CookieRefresher } from "../clients/cookie-refresher.js";
import { CookieStore } from "../cookies/store.js";
import { CookieScheduler } from "../scheduler/cookie-scheduler.js";
import { ErrorRecovery } from "../scheduler/error-recovery.js";
import type { RefreshSummary, ServiceState } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";

const logger = createLogger("ServiceManager");

export interface ServiceManagerOptions {
  /** Builds the browser backend; tests pass an in-process fake */
  readonly createBackend?: (config: BrowserConfig) => BrowserBackend;
}

interface Runtime {
  readonly backend: BrowserBackend;
  readonly scheduler: CookieScheduler;
}

export class ServiceManager {
  private readonly config: Config;
  private readonly createBackend: (config: BrowserConfig) => BrowserBackend;
  private readonly lock: SingletonLock;
  private readonly stateFile: StateFile;
  private runtime: Runtime | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private stateWrites: Promise<void> = Promise.resolve();

  constructor(config: Config, options: ServiceManagerOptions = {}) {
    this.config = config;
    this.createBackend = options.createBackend ?? createBrowserBackend;
    this.lock = new SingletonLock(config.storage.lockPath);
    this.stateFile = new StateFile(config.storage.statePath);
  }

  get running(): boolean {
    return this.runtime !== null;
  }

  /** Spawn a detached service process and wait for it to report running */
  async startDaemon(): Promise<DaemonHandle> {
    return startDaemon(this.config.storage);
  }

  /**
   * Run the service in this process until `shutdown` is called.
   *
   * @throws AlreadyRunningError when another instance holds the lock
   */
  async startForeground(): Promise<void> {
    await this.lock.acquire();
    const startedAt = new Date().toISOString();

    try {
      const previous = await this.stateFile.read();
      await this.stateFile.write({
        ...previous,
        status: "starting",
        pid: process.pid,
        startedAt,
        nextRunAt: null,
      });

      const runtime = this.buildRuntime(this.config.refreshOnStart);
      this.runtime = runtime;
      this.trackScheduler(runtime.scheduler);
      if (!(await runtime.backend.isAvailable())) {
        logger.warn("Browser backend is not reachable; refresh attempts will fail until it is", {
          backend: runtime.backend.name,
        });
      }
      await runtime.scheduler.start();

      const status = runtime.scheduler.getStatus();
      await this.stateFile.update({
        status: "running",
        nextRunAt: status.nextRunAt,
        consecutiveFailures: status.recovery.consecutiveFailures,
      });
      logger.info("Service running", {
        pid: process.pid,
        backend: runtime.backend.name,
        nextRunAt: status.nextRunAt,
      });
    } catch (error) {
      logger.error("Service failed to start", error);
      await this.teardown();
      throw error;
    }
  }

  /**
   * Stop the scheduler (grace, then abort), close the browser, checkpoint
   * the failure counter, mark the state stopped and release the lock.
   * Repeated calls share one shutdown.
   */
  async shutdown(signal = "shutdown"): Promise<void> {
    this.shutdownPromise ??= (async () => {
      logger.info("Shutting down", { signal });
      if (this.runtime) {
        await this.persist({ status: "stopping" });
      }
      await this.teardown();
      logger.info("Shutdown complete");
    })();
    return this.shutdownPromise;
  }

  /**
   * Manual refresh requested over SIGUSR1. Joins an attempt already in
   * flight and records the outcome as `lastManualRefresh`.
   */
  async handleManualRefresh(): Promise<RefreshSummary | null> {
    const runtime = this.runtime;
    if (!runtime) {
      logger.warn("Manual refresh requested while not running");
      return null;
    }

    await runtime.scheduler.triggerManualRefresh();
    const summary = runtime.scheduler.getStatus().lastAttempt;
    if (summary) {
      await this.persist({ lastManualRefresh: summary });
    }
    return summary;
  }

  /**
   * `refresh` command: signal the running service, or run one attempt in
   * this process when none is running.
   *
   * @throws AlreadyRunningError when a service starts between the check and
   *   the one-shot lock
   */
  async refresh(): Promise<RefreshSummary> {
    const remote = await requestManualRefresh(this.config.storage);
    if (remote) {
      return remote;
    }
    return this.refreshOnce();
  }

  /** One attempt under the lock, without the timer loop */
  async refreshOnce(): Promise<RefreshSummary> {
    await this.lock.acquire();
    const runtime = this.buildRuntime(false);
    this.runtime = runtime;
    this.trackScheduler(runtime.scheduler);

    try {
      await runtime.scheduler.start();
      await runtime.scheduler.triggerManualRefresh();
      const summary = runtime.scheduler.getStatus().lastAttempt;
      if (!summary) {
        throw new Error("Refresh finished without recording an attempt");
      }
      await this.persist({ lastManualRefresh: summary });
      return summary;
    } finally {
      await this.teardown(false);
    }
  }

  async status(): Promise<ServiceState> {
    return readServiceState(this.config.storage);
  }

  async stopRemote(): Promise<StopResult> {
    return stopService(this.config.storage);
  }

  /**
   * Route SIGINT/SIGTERM to `shutdown` and SIGUSR1 to a manual refresh.
   * `exit` runs once shutdown completes.
   */
  installSignalHandlers(exit: (code: number) => void): void {
    const onShutdownSignal = (signal: NodeJS.Signals): void => {
      void this.shutdown(signal).then(
        () => exit(0),
        (error: unknown) => {
          logger.error("Shutdown failed", error);
          exit(1);
        }
      );
    };

    process.on("SIGINT", () => {
      onShutdownSignal("SIGINT");
    });
    process.on("SIGTERM", () => {
      onShutdownSignal("SIGTERM");
    });
    process.on("SIGUSR1", () => {
      logger.info("Manual refresh signal received");
      this.handleManualRefresh().catch((error: unknown) => {
        logger.error("Manual refresh failed", error);
      });
    });
  }

  private buildRuntime(refreshOnStart: boolean): Runtime {
    const { config } = this;
    const store = new CookieStore({
      structuredPath: config.storage.structuredPath,
      flatPath: config.storage.flatPath,
      requiredCookies: config.platform.requiredCookies,
    });
    const backend = this.createBackend(config.browser);
    const refresher = new CookieRefresher({
      backend,
      platform: config.platform,
      timeoutMs: config.browser.timeoutMs,
    });
    const scheduler = new CookieScheduler({
      store,
      refresher,
      recovery: new ErrorRecovery(config.recovery),
      intervalMs: config.refreshIntervalMs,
      refreshOnStart,
    });
    return { backend, scheduler };
  }

  private trackScheduler(scheduler: CookieScheduler): void {
    scheduler.onEvent("refresh:completed", ({ summary, consecutiveFailures, nextRunAt }) => {
      void this.persist({ lastRefresh: summary, consecutiveFailures, nextRunAt });
    });
    scheduler.onEvent("schedule:updated", ({ state, nextRunAt }) => {
      if (state !== "stopped") {
        void this.persist({ nextRunAt });
      }
    });
  }

  /** Queue a state file update; failures are logged, never thrown */
  private persist(patch: Partial<PersistedState>): Promise<void> {
    this.stateWrites = this.stateWrites.then(async () => {
      try {
        await this.stateFile.update(patch);
      } catch (error) {
        logger.warn("Failed to update state file", { error: errorMessage(error) });
      }
    });
    return this.stateWrites;
  }

  /**
   * Release everything this process holds. With `markStopped` the state
   * file is left describing a stopped service.
   */
  private async teardown(markStopped = true): Promise<void> {
    const runtime = this.runtime;
    this.runtime = null;

    if (runtime) {
      await runtime.scheduler.stop({ graceMs: this.config.shutdownGraceMs });
      try {
        await runtime.backend.close();
      } catch (error) {
        logger.warn("Failed to close browser backend", { error: errorMessage(error) });
      }
      try {
        await runtime.scheduler.checkpoint();
      } catch (error) {
        logger.error("Failed to checkpoint scheduler state", error);
      }
    }

    await this.stateWrites;
    if (markStopped && this.lock.held) {
      await this.persist({
        status: "stopped",
        pid: null,
        nextRunAt: null,
        ...(runtime ? { consecutiveFailures: runtime.scheduler.consecutiveFailures } : {}),
      });
    } else if (runtime) {
      await this.persist({ consecutiveFailures: runtime.scheduler.consecutiveFailures });
    }
    await this.lock.release();
  }
}
