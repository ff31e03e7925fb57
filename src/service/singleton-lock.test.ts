/**
 * Singleton Lock Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rename, rm, stat, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SingletonLock, isProcessAlive } from "./singleton-lock.js";
import { AlreadyRunningError, exitCodeFor } from "../shared/errors.js";
import { delay } from "../shared/timeout.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

describe("SingletonLock", () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cookie-lock-"));
    lockPath = join(dir, "state", "service.lock");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should record pid and token in a new lock file", async () => {
    const lock = new SingletonLock(lockPath, { pid: 4242, isAlive: () => true });

    const record = await lock.acquire();

    const written: unknown = JSON.parse(await readFile(lockPath, "utf8"));
    expect(written).toEqual(record);
    expect(record.pid).toBe(4242);
    expect(lock.held).toBe(true);
  });

  it.skipIf(process.platform === "win32")("should create the lock readable by the owner only", async () => {
    await new SingletonLock(lockPath).acquire();

    expect((await stat(lockPath)).mode & 0o777).toBe(0o600);
  });

  it("should refuse a second holder while the first is alive", async () => {
    await new SingletonLock(lockPath, { pid: 100, isAlive: () => true }).acquire();
    const second = new SingletonLock(lockPath, { pid: 200, isAlive: () => true });

    const error = await second.acquire().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AlreadyRunningError);
    expect(error).toMatchObject({ pid: 100, message: "cookie-warden is already running (pid 100)" });
    expect(exitCodeFor(error)).toBe(2);
    expect(second.held).toBe(false);
  });

  it("should take over a lock left by a dead process", async () => {
    await new SingletonLock(lockPath, { pid: 100, isAlive: () => true }).acquire();
    const next = new SingletonLock(lockPath, { pid: 200, isAlive: (pid) => pid !== 100 });

    const record = await next.acquire();

    expect(record.pid).toBe(200);
    expect(JSON.parse(await readFile(lockPath, "utf8"))).toMatchObject({ pid: 200 });
  });

  it("should treat an old unreadable lock as stale", async () => {
    await new SingletonLock(lockPath).acquire();
    await writeFile(lockPath, "not json");
    const old = new Date(Date.now() - 60_000);
    await utimes(lockPath, old, old);

    const lock = new SingletonLock(lockPath);

    expect(await lock.inspect()).toEqual({ state: "stale", record: null });
    await expect(lock.acquire()).resolves.toMatchObject({ pid: process.pid });
  });

  it("should treat a fresh unreadable lock as held", async () => {
    await new SingletonLock(lockPath).acquire();
    await writeFile(lockPath, "");

    await expect(new SingletonLock(lockPath).inspect()).resolves.toEqual({ state: "held", record: null });
  });

  it("should release only its own lock", async () => {
    const first = new SingletonLock(lockPath, { pid: 100 });
    await first.acquire();
    const second = new SingletonLock(lockPath, { pid: 200, isAlive: (pid) => pid !== 100 });
    await second.acquire();

    expect(await first.release()).toBe(false);
    expect(JSON.parse(await readFile(lockPath, "utf8"))).toMatchObject({ pid: 200 });

    expect(await second.release()).toBe(true);
    await expect(second.inspect()).resolves.toEqual({ state: "free" });
  });

  it("should let exactly one of two racing processes take over a stale lock", async () => {
    await mkdir(join(dir, "state"), { recursive: true });
    await writeFile(
      lockPath,
      JSON.stringify({ pid: 999_999, token: "stale-token", startedAt: "2026-01-01T00:00:00.000Z" })
    );
    const actual = await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");
    // The first process to move the stale lock aside stalls until the other has taken over
    vi.mocked(rename).mockImplementationOnce(async (from, to) => {
      await delay(50);
      await actual.rename(from, to);
    });
    const isAlive = (pid: number): boolean => pid !== 999_999;
    const a = new SingletonLock(lockPath, { pid: 100, isAlive });
    const b = new SingletonLock(lockPath, { pid: 200, isAlive });

    const results = await Promise.allSettled([a.acquire(), b.acquire()]);

    const winners = results.flatMap((result) => (result.status === "fulfilled" ? [result.value] : []));
    const losers: unknown[] = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
    expect(winners).toHaveLength(1);
    expect(losers).toHaveLength(1);
    expect(losers[0]).toBeInstanceOf(AlreadyRunningError);
    expect([a.held, b.held].filter(Boolean)).toHaveLength(1);
    expect(JSON.parse(await readFile(lockPath, "utf8"))).toEqual(winners[0]);
    expect(await readdir(join(dir, "state"))).toEqual(["service.lock"]);
  });

  it("should report free, held and stale states", async () => {
    const lock = new SingletonLock(lockPath, { pid: 300, isAlive: () => true });
    expect(await lock.inspect()).toEqual({ state: "free" });

    const record = await lock.acquire();
    expect(await lock.inspect()).toEqual({ state: "held", record });

    const observer = new SingletonLock(lockPath, { isAlive: () => false });
    expect(await observer.inspect()).toEqual({ state: "stale", record });
    expect(await observer.clearStale()).toBe(true);
    expect(await observer.inspect()).toEqual({ state: "free" });
  });
});

describe("isProcessAlive", () => {
  it("should report the current process as alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  it("should report an unused pid as dead", () => {
    expect(isProcessAlive(2_147_483_646)).toBe(false);
  });
});
