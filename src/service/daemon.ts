/**
 * Daemon Launcher
 *
 * Re-runs the CLI detached as `start --foreground` with stdout and stderr
 * appended to daemon.log, then waits for the child to report `running`.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { open } from "node:fs/promises";
import { dirname } from "node:path";
import { readServiceState, pollUntil, type ControlPaths } from "./control.js";
import type { StoragePaths } from "../config/index.js";
import { createLogger } from "../shared/logger.js";
import { AlreadyRunningError, CookieWardenError, EXIT_CODES } from "../shared/errors.js";
import { ensureSecureDirectory, SECURE_FILE_MODE } from "../shared/file-security.js";
import { DAEMON_START_WAIT_MS, STATE_POLL_INTERVAL_MS } from "../shared/constants.js";

const logger = createLogger("Daemon");

export interface DaemonOptions {
  /** Script the child runs; defaults to the current CLI entry */
  readonly entry?: string;
  readonly waitMs?: number;
}

export interface DaemonHandle {
  readonly pid: number;
  readonly logPath: string;
}

/**
 * @throws AlreadyRunningError when the child exits with the lock-conflict code
 * @throws CookieWardenError when the child exits or never reports running
 */
export async function startDaemon(
  paths: ControlPaths & Pick<StoragePaths, "daemonLogPath">,
  options: DaemonOptions = {}
): Promise<DaemonHandle> {
  const entry = options.entry ?? process.argv[1];
  if (entry === undefined) {
    throw new CookieWardenError("Cannot locate the CLI entry point", "DAEMON_START_FAILED");
  }

  await ensureSecureDirectory(dirname(paths.daemonLogPath));
  const log = await open(paths.daemonLogPath, "a", SECURE_FILE_MODE);

  let child: ChildProcess;
  try {
    child = spawn(process.execPath, [...process.execArgv, entry, "start", "--foreground"], {
      detached: true,
      stdio: ["ignore", log.fd, log.fd],
      env: process.env,
    });
  } finally {
    await log.close();
  }

  const pid = child.pid;
  if (pid === undefined) {
    throw new CookieWardenError("Failed to spawn the service process", "DAEMON_START_FAILED");
  }

  const exit: { done: boolean; code: number | null } = { done: false, code: null };
  child.on("exit", (code) => {
    exit.done = true;
    exit.code = code;
  });
  child.unref();

  logger.info("Daemon spawned", { pid, logPath: paths.daemonLogPath });

  const running = await pollUntil(
    async () => {
      if (exit.done) {
        return true;
      }
      const state = await readServiceState(paths);
      return state.status === "running" && state.pid === pid;
    },
    options.waitMs ?? DAEMON_START_WAIT_MS,
    STATE_POLL_INTERVAL_MS
  );

  if (exit.done) {
    if (exit.code === EXIT_CODES.ALREADY_RUNNING) {
      throw new AlreadyRunningError("cookie-warden is already running", null, paths.lockPath);
    }
    throw new CookieWardenError(
      `Service exited during startup (code ${String(exit.code)}); see ${paths.daemonLogPath}`,
      "DAEMON_START_FAILED",
      { exitCode: exit.code }
    );
  }
  if (!running) {
    throw new CookieWardenError(
      `Service did not report running within ${options.waitMs ?? DAEMON_START_WAIT_MS}ms; see ${paths.daemonLogPath}`,
      "DAEMON_START_FAILED",
      { pid }
    );
  }

  return { pid, logPath: paths.daemonLogPath };
}
