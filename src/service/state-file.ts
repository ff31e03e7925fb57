/**
 * Service State File
 *
 * JSON snapshot the running service writes for other processes: lifecycle
 * status, next run, failure counter and the latest attempts. Written
 * atomically; readers never see a partial file.
 */

import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import type { ServiceState } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { errorMessage, isErrnoError } from "../shared/errors.js";
import { ensureSecureDirectory, SECURE_FILE_MODE } from "../shared/file-security.js";

const logger = createLogger("StateFile");

const errorKindSchema = z.enum([
  "ValidationError",
  "BrowserLaunchError",
  "NavigationTimeoutError",
  "NavigationError",
  "ExtractionError",
  "CancelledError",
  "SaveError",
]);

const summarySchema = z.object({
  at: z.string(),
  trigger: z.enum(["scheduled", "manual", "startup"]),
  outcome: z.enum(["success", "failure"]),
  errorKind: errorKindSchema.nullable(),
  message: z.string().nullable(),
  cookieCount: z.number().int().nullable(),
});

const persistedStateSchema = z.object({
  status: z.enum(["stopped", "starting", "running", "stopping"]),
  pid: z.number().int().nullable(),
  startedAt: z.string().nullable(),
  nextRunAt: z.string().nullable(),
  consecutiveFailures: z.number().int().nonnegative(),
  lastRefresh: summarySchema.nullable(),
  lastManualRefresh: summarySchema.nullable(),
});

/** `stale` is derived from the lock when the state is read */
export type PersistedState = Omit<ServiceState, "stale">;

export function stoppedState(): PersistedState {
  return {
    status: "stopped",
    pid: null,
    startedAt: null,
    nextRunAt: null,
    consecutiveFailures: 0,
    lastRefresh: null,
    lastManualRefresh: null,
  };
}

export class StateFile {
  private readonly path: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  get statePath(): string {
    return this.path;
  }

  /** Missing or unreadable files read as a stopped service */
  async read(): Promise<PersistedState> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        return stoppedState();
      }
      throw error;
    }

    try {
      const result = persistedStateSchema.safeParse(JSON.parse(raw));
      if (result.success) {
        return result.data;
      }
      logger.warn("State file does not match its schema; ignoring it", { path: this.path });
    } catch (error) {
      logger.warn("State file is not valid JSON; ignoring it", {
        path: this.path,
        error: errorMessage(error),
      });
    }
    return stoppedState();
  }

  async write(state: PersistedState): Promise<void> {
    await this.enqueue(() => this.writeNow(state));
  }

  /** Read-modify-write, serialised against other writes from this process */
  async update(patch: Partial<PersistedState>): Promise<PersistedState> {
    return this.enqueue(async () => {
      const next = { ...(await this.read()), ...patch };
      await this.writeNow(next);
      return next;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async writeNow(state: PersistedState): Promise<void> {
    await ensureSecureDirectory(dirname(this.path));
    await writeFileAtomic(this.path, JSON.stringify(state, null, 2) + "\n", {
      mode: SECURE_FILE_MODE,
      fsync: true,
    });
  }
}
