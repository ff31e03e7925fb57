/**
 * Singleton Lock
 *
 * At most one service instance per store directory. The lock file is created
 * exclusively (O_CREAT | O_EXCL) and records the owner's pid and a random
 * token; only the holder of the token may remove it.
 *
 * A lock whose pid is no longer alive is stale and may be taken over. The
 * takeover renames the file aside and deletes it only if it still holds the
 * stale record; a live lock moved by a racing process is linked back.
 */

import { randomUUID } from "node:crypto";
import { link, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { createLogger } from "../shared/logger.js";
import { AlreadyRunningError, errorMessage, isErrnoError } from "../shared/errors.js";
import { ensureSecureDirectory, SECURE_FILE_MODE } from "../shared/file-security.js";

const logger = createLogger("SingletonLock");

/** An unreadable lock younger than this is assumed to be mid-write */
const LOCK_WRITE_GRACE_MS = 2_000;

const lockRecordSchema = z.object({
  pid: z.number().int().positive(),
  token: z.string().min(1),
  startedAt: z.string(),
});

export type LockRecord = z.infer<typeof lockRecordSchema>;

export type LockInspection =
  | { readonly state: "free" }
  | { readonly state: "held"; readonly record: LockRecord | null }
  | { readonly state: "stale"; readonly record: LockRecord | null };

export interface SingletonLockOptions {
  readonly isAlive?: (pid: number) => boolean;
  readonly pid?: number;
}

/**
 * Signal 0 checks for existence without delivering anything. EPERM means the
 * process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoError(error) && error.code === "EPERM";
  }
}

export class SingletonLock {
  private readonly path: string;
  private readonly isAlive: (pid: number) => boolean;
  private readonly pid: number;
  private record: LockRecord | null = null;

  constructor(path: string, options: SingletonLockOptions = {}) {
    this.path = path;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.pid = options.pid ?? process.pid;
  }

  get lockPath(): string {
    return this.path;
  }

  get held(): boolean {
    return this.record !== null;
  }

  /**
   * @throws AlreadyRunningError when a live process holds the lock
   */
  async acquire(): Promise<LockRecord> {
    if (this.record) {
      return this.record;
    }
    await ensureSecureDirectory(dirname(this.path));

    for (let attempt = 0; attempt < 2; attempt++) {
      const record: LockRecord = {
        pid: this.pid,
        token: randomUUID(),
        startedAt: new Date().toISOString(),
      };
      if (await this.tryCreate(record)) {
        this.record = record;
        logger.info("Lock acquired", { path: this.path, pid: record.pid });
        return record;
      }

      const inspection = await this.inspect();
      if (inspection.state === "held") {
        throw this.alreadyRunning(inspection.record);
      }
      if (inspection.state === "stale") {
        logger.warn("Removing stale lock", { path: this.path, pid: inspection.record?.pid ?? null });
        await this.takeOverStale(inspection.record);
      }
    }

    // Another process took the lock between our cleanup and retry
    const inspection = await this.inspect();
    throw this.alreadyRunning(inspection.state === "free" ? null : inspection.record);
  }

  /**
   * Remove the lock if this instance still owns it. Returns false when the
   * file is gone or belongs to someone else.
   */
  async release(): Promise<boolean> {
    const own = this.record;
    this.record = null;
    if (!own) {
      return false;
    }

    const current = await this.readRecord();
    if (current === null || current.token !== own.token) {
      logger.warn("Lock no longer ours; leaving it in place", { path: this.path });
      return false;
    }

    await removeIfPresent(this.path);
    logger.info("Lock released", { path: this.path });
    return true;
  }

  async inspect(): Promise<LockInspection> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        return { state: "free" };
      }
      throw error;
    }

    const record = parseRecord(raw);
    if (record === null) {
      return (await this.isFresh()) ? { state: "held", record: null } : { state: "stale", record: null };
    }
    return this.isAlive(record.pid) ? { state: "held", record } : { state: "stale", record };
  }

  /** Delete a stale lock. Returns false when the lock is free or held. */
  async clearStale(): Promise<boolean> {
    const inspection = await this.inspect();
    if (inspection.state !== "stale") {
      return false;
    }
    return this.takeOverStale(inspection.record);
  }

  /**
   * Move the lock aside and delete it if it is still the stale lock that was
   * inspected. Returns false when someone else got there first.
   */
  private async takeOverStale(inspected: LockRecord | null): Promise<boolean> {
    const aside = `${this.path}.stale-${randomUUID()}`;
    try {
      await rename(this.path, aside);
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }

    if (await this.isSameStaleLock(aside, inspected)) {
      await removeIfPresent(aside);
      return true;
    }

    // A live lock created after our inspection: put it back without clobbering
    try {
      await link(aside, this.path);
    } catch (error) {
      if (!(isErrnoError(error) && error.code === "EEXIST")) {
        throw error;
      }
      logger.error("Could not restore a live lock moved during stale takeover", error, { path: this.path });
    } finally {
      await removeIfPresent(aside);
    }
    return false;
  }

  private async isSameStaleLock(path: string, inspected: LockRecord | null): Promise<boolean> {
    const moved = parseRecord(await readFile(path, "utf8"));
    if (inspected !== null) {
      return moved !== null && moved.token === inspected.token;
    }
    if (moved !== null) {
      return false;
    }
    const info = await stat(path);
    return Date.now() - info.mtimeMs >= LOCK_WRITE_GRACE_MS;
  }

  private async tryCreate(record: LockRecord): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, "wx", SECURE_FILE_MODE);
    } catch (error) {
      if (isErrnoError(error) && error.code === "EEXIST") {
        return false;
      }
      throw error;
    }

    try {
      await handle.writeFile(JSON.stringify(record) + "\n", "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    return true;
  }

  private async readRecord(): Promise<LockRecord | null> {
    try {
      return parseRecord(await readFile(this.path, "utf8"));
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  private async isFresh(): Promise<boolean> {
    try {
      const info = await stat(this.path);
      return Date.now() - info.mtimeMs < LOCK_WRITE_GRACE_MS;
    } catch (error) {
      logger.debug("Lock vanished while inspecting", { error: errorMessage(error) });
      return false;
    }
  }


  private alreadyRunning(record: LockRecord | null): AlreadyRunningError {
    const pid = record?.pid ?? null;
    const message =
      pid === null
        ? `cookie-warden is already running (lock ${this.path})`
        : `cookie-warden is already running (pid ${pid})`;
    return new AlreadyRunningError(message, pid, this.path);
  }
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!(isErrnoError(error) && error.code === "ENOENT")) {
      throw error;
    }
  }
}

function parseRecord(raw: string): LockRecord | null {
  try {
    const result = lockRecordSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
