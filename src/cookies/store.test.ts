/**
 * Cookie Store Tests
 *
 * Runs against a temporary directory on the real filesystem.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CookieStore, emptyMetadata } from "./store.js";
import { CookieJar } from "./jar.js";
import { formatNetscape } from "./netscape.js";
import { SaveError, StoreCorruptError } from "../shared/errors.js";
import { makeCookie, NOW, REQUIRED_COOKIES, validCookies } from "../test/cookie-fixtures.js";

describe("CookieStore", () => {
  let dir: string;
  let store: CookieStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cookie-store-"));
    store = new CookieStore({
      structuredPath: join(dir, "cookies.json"),
      flatPath: join(dir, "cookies.txt"),
      requiredCookies: REQUIRED_COOKIES,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("should return an empty jar and zeroed metadata when nothing is stored", async () => {
      const { jar, metadata } = await store.load();

      expect(jar.size).toBe(0);
      expect(metadata).toEqual(emptyMetadata());
    });

    it("should throw StoreCorruptError for invalid JSON", async () => {
      await writeFile(store.structuredPath, "{not json");

      await expect(store.load()).rejects.toBeInstanceOf(StoreCorruptError);
    });

    it("should throw StoreCorruptError when the schema does not match", async () => {
      await writeFile(
        store.structuredPath,
        JSON.stringify({ version: 1, metadata: {}, cookies: [{ name: "", domain: ".youtube.com" }] })
      );

      await expect(store.load()).rejects.toThrow("cookies.json does not match the store schema");
    });

    it("should fill metadata fields missing from older files", async () => {
      await writeFile(
        store.structuredPath,
        JSON.stringify({ version: 1, metadata: { refreshCount: 2 }, cookies: [] })
      );

      const { metadata } = await store.load();

      expect(metadata).toEqual({ ...emptyMetadata(), refreshCount: 2 });
    });

    it("should quarantine a corrupt file when asked", async () => {
      await writeFile(store.structuredPath, "{not json");

      const { jar } = await store.load({ quarantineCorrupt: true });
      const files = await readdir(dir);

      expect(jar.size).toBe(0);
      expect(files).not.toContain("cookies.json");
      expect(files.filter((name) => name.startsWith("cookies.json.corrupt-"))).toHaveLength(1);
    });
  });

  describe("save", () => {
    it("should write both files from the same jar", async () => {
      const jar = new CookieJar(validCookies());

      await store.save(jar, emptyMetadata(), { kind: "refresh", now: NOW });

      const loaded = await store.load();
      expect(loaded.jar.toArray()).toEqual(jar.toArray());
      expect(await readFile(store.flatPath, "utf8")).toBe(formatNetscape(jar));
    });

    it("should stamp refresh metadata on a refresh save", async () => {
      const metadata = { ...emptyMetadata(), refreshCount: 4, consecutiveFailures: 2 };

      const written = await store.save(new CookieJar(validCookies()), metadata, {
        kind: "refresh",
        now: NOW,
      });

      expect(written).toEqual({
        lastRefreshedAt: NOW.toISOString(),
        lastImportAt: null,
        refreshCount: 5,
        consecutiveFailures: 0,
        lastValidatedAt: NOW.toISOString(),
        validationStatus: "valid",
        source: "refresh",
      });
      expect((await store.load()).metadata).toEqual(written);
    });

    it("should only stamp the import time on an import save", async () => {
      const written = await store.save(new CookieJar(validCookies()), emptyMetadata(), {
        kind: "import",
        now: NOW,
      });

      expect(written).toEqual({
        ...emptyMetadata(),
        lastImportAt: NOW.toISOString(),
        source: "import",
      });
    });

    it("should write checkpoint metadata as given", async () => {
      const metadata = { ...emptyMetadata(), consecutiveFailures: 3 };

      const written = await store.save(new CookieJar(validCookies()), metadata, { kind: "checkpoint" });

      expect(written).toEqual(metadata);
    });

    it.skipIf(process.platform === "win32")("should restrict both files to the owner", async () => {
      await store.save(new CookieJar(validCookies()), emptyMetadata(), { kind: "import" });

      expect((await stat(store.structuredPath)).mode & 0o777).toBe(0o600);
      expect((await stat(store.flatPath)).mode & 0o777).toBe(0o600);
    });

    it("should roll back the structured file when the flat write fails", async () => {
      await store.save(new CookieJar(validCookies()), emptyMetadata(), { kind: "import", now: NOW });
      const before = await readFile(store.structuredPath);

      const blockedFlat = join(dir, "blocked");
      await mkdir(blockedFlat);
      const broken = new CookieStore({
        structuredPath: store.structuredPath,
        flatPath: blockedFlat,
        requiredCookies: REQUIRED_COOKIES,
      });

      await expect(
        broken.save(new CookieJar([makeCookie({ name: "SID", value: "replacement" })]), emptyMetadata(), {
          kind: "refresh",
        })
      ).rejects.toBeInstanceOf(SaveError);

      expect(await readFile(store.structuredPath)).toEqual(before);
    });

    it("should remove a fresh structured file when the first flat write fails", async () => {
      const blockedFlat = join(dir, "blocked");
      await mkdir(blockedFlat);
      const broken = new CookieStore({
        structuredPath: store.structuredPath,
        flatPath: blockedFlat,
        requiredCookies: REQUIRED_COOKIES,
      });

      await expect(
        broken.save(new CookieJar(validCookies()), emptyMetadata(), { kind: "import" })
      ).rejects.toThrow(/Failed to write cookie file/);

      expect((await store.load()).jar.size).toBe(0);
    });
  });

  describe("export", () => {
    it("should export deterministic flat text", () => {
      const jar = new CookieJar(validCookies());
      const reversed = new CookieJar(validCookies().reverse());

      expect(store.exportFlat(reversed)).toBe(store.exportFlat(jar));
    });

    it("should export JSON with -1 for session cookies", () => {
      const jar = new CookieJar([makeCookie({ name: "NID", expires: undefined })]);
      const exported: unknown = JSON.parse(store.exportJson(jar));

      expect(exported).toEqual([
        {
          name: "NID",
          value: "nid-value",
          domain: ".youtube.com",
          path: "/",
          expires: -1,
          secure: true,
          httpOnly: false,
        },
      ]);
    });
  });

  describe("validity", () => {
    it("should use the configured required cookies", () => {
      expect(store.jarIsValid(new CookieJar(validCookies()), NOW)).toBe(true);
      expect(store.jarIsValid(new CookieJar([makeCookie({ name: "SID" })]), NOW)).toBe(false);
      expect(store.isExpired(makeCookie({ name: "SID", expires: 1 }), NOW)).toBe(true);
    });
  });

  describe("reset", () => {
    it("should delete both files", async () => {
      await store.save(new CookieJar(validCookies()), emptyMetadata(), { kind: "import" });

      await store.reset();

      expect(await readdir(dir)).toEqual([]);
    });
  });
});
