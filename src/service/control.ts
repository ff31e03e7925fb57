/**
 * Service Control
 *
 * Commands that act on a service running in another process. They talk to it
 * only through the lock file, the state file and signals:
 *
 * - SIGTERM asks it to shut down
 * - SIGUSR1 asks it for a manual refresh; the result lands in the state file
 */

import { SingletonLock, isProcessAlive } from "./singleton-lock.js";
import { StateFile } from "./state-file.js";
import type { StoragePaths } from "../config/index.js";
import type { RefreshSummary, ServiceState } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { ServiceNotRunningError } from "../shared/errors.js";
import { TimeoutError, delay } from "../shared/timeout.js";
import { MANUAL_REFRESH_WAIT_MS, STATE_POLL_INTERVAL_MS, STOP_WAIT_MS } from "../shared/constants.js";

const logger = createLogger("ServiceControl");

export type ControlPaths = Pick<StoragePaths, "lockPath" | "statePath">;

export interface ControlOptions {
  readonly isAlive?: (pid: number) => boolean;
  readonly kill?: (pid: number, signal: NodeJS.Signals) => void;
  readonly pollIntervalMs?: number;
}

export interface StopResult {
  readonly pid: number;
  /** SIGKILL was needed */
  readonly forced: boolean;
}

function sendSignal(pid: number, signal: NodeJS.Signals): void {
  process.kill(pid, signal);
}

/**
 * Read-only view of the service, safe from any process. A lock naming a dead
 * process is reported as `stale`.
 */
export async function readServiceState(
  paths: ControlPaths,
  options: ControlOptions = {}
): Promise<ServiceState> {
  const lock = new SingletonLock(paths.lockPath, { isAlive: options.isAlive ?? isProcessAlive });
  const inspection = await lock.inspect();
  const persisted = await new StateFile(paths.statePath).read();

  if (inspection.state === "held") {
    return {
      ...persisted,
      status: persisted.status === "stopped" ? "starting" : persisted.status,
      pid: inspection.record?.pid ?? persisted.pid,
      stale: false,
    };
  }

  return {
    ...persisted,
    status: "stopped",
    pid: null,
    nextRunAt: null,
    stale: inspection.state === "stale",
  };
}

/**
 * SIGTERM the running service and wait for it to exit; SIGKILL after
 * `waitMs` and remove the lock it left behind.
 *
 * @throws ServiceNotRunningError
 */
export async function stopService(
  paths: ControlPaths,
  waitMs: number = STOP_WAIT_MS,
  options: ControlOptions = {}
): Promise<StopResult> {
  const isAlive = options.isAlive ?? isProcessAlive;
  const kill = options.kill ?? sendSignal;
  const pollMs = options.pollIntervalMs ?? STATE_POLL_INTERVAL_MS;
  const lock = new SingletonLock(paths.lockPath, { isAlive });

  const inspection = await lock.inspect();
  if (inspection.state !== "held" || inspection.record === null) {
    if (inspection.state === "stale") {
      await lock.clearStale();
      logger.info("Removed stale lock", { path: paths.lockPath });
    }
    throw new ServiceNotRunningError();
  }

  const { pid } = inspection.record;
  logger.info("Sending SIGTERM", { pid });
  kill(pid, "SIGTERM");

  if (await pollUntil(() => Promise.resolve(!isAlive(pid)), waitMs, pollMs)) {
    return { pid, forced: false };
  }

  logger.warn("Service did not exit in time; sending SIGKILL", { pid, waitMs });
  kill(pid, "SIGKILL");
  await pollUntil(() => Promise.resolve(!isAlive(pid)), waitMs, pollMs);
  await lock.clearStale();
  await new StateFile(paths.statePath).update({ status: "stopped", pid: null, nextRunAt: null });
  return { pid, forced: true };
}

/**
 * Ask a running service for a manual refresh and wait for its result.
 * Returns null when no service is running.
 *
 * @throws ServiceNotRunningError when the service exits while waiting
 * @throws TimeoutError when no result arrives within `waitMs`
 */
export async function requestManualRefresh(
  paths: ControlPaths,
  waitMs: number = MANUAL_REFRESH_WAIT_MS,
  options: ControlOptions = {}
): Promise<RefreshSummary | null> {
  const isAlive = options.isAlive ?? isProcessAlive;
  const kill = options.kill ?? sendSignal;
  const pollMs = options.pollIntervalMs ?? STATE_POLL_INTERVAL_MS;

  const inspection = await new SingletonLock(paths.lockPath, { isAlive }).inspect();
  if (inspection.state !== "held" || inspection.record === null) {
    return null;
  }

  const { pid } = inspection.record;
  const stateFile = new StateFile(paths.statePath);
  const requestedAt = Date.now();
  const found: { summary: RefreshSummary | null } = { summary: null };

  logger.info("Requesting manual refresh", { pid });
  kill(pid, "SIGUSR1");

  const finished = await pollUntil(
    async () => {
      const latest = (await stateFile.read()).lastManualRefresh;
      if (latest !== null && Date.parse(latest.at) >= requestedAt) {
        found.summary = latest;
        return true;
      }
      if (!isAlive(pid)) {
        throw new ServiceNotRunningError("Service exited before the refresh finished");
      }
      return false;
    },
    waitMs,
    pollMs
  );

  if (!finished || found.summary === null) {
    throw new TimeoutError("manual refresh", waitMs);
  }
  return found.summary;
}

/**
 * Poll `check` until it returns true or `timeoutMs` passes.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  timeoutMs: number,
  intervalMs: number = STATE_POLL_INTERVAL_MS
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (await check()) {
      return true;
    }
    if (Date.now() >= deadline) {
      return false;
    }
    await delay(Math.min(intervalMs, Math.max(0, deadline - Date.now())));
  }
}
