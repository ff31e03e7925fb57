/**
 * Cookie Store
 *
 * Persists the jar in two files:
 * - structured JSON (cookies + metadata), the source of truth
 * - flat Netscape cookies.txt derived from the same jar, for downstream tools
 *
 * Each file is replaced atomically (temp file, fsync, rename). When the flat
 * write fails the structured file is restored to its previous bytes, so
 * readers never see the two disagree.
 */

import { readFile, rename, rm } from "node:fs/promises";
import { basename, dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { CookieJar, isExpired, jarIsValid } from "./jar.js";
import { formatNetscape } from "./netscape.js";
import type { Cookie, StoreMetadata } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { SaveError, StoreCorruptError, errorMessage, isErrnoError } from "../shared/errors.js";
import { ensureSecureDirectory, SECURE_FILE_MODE } from "../shared/file-security.js";
import { STORE_SCHEMA_VERSION } from "../shared/constants.js";

const logger = createLogger("CookieStore");

const cookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().min(1),
  path: z.string().default("/"),
  expires: z.number().optional(),
  secure: z.boolean().default(false),
  httpOnly: z.boolean().default(false),
  sameSite: z.enum(["Strict", "Lax", "None"]).optional(),
});

const metadataSchema = z.object({
  lastRefreshedAt: z.string().nullable().default(null),
  lastImportAt: z.string().nullable().default(null),
  refreshCount: z.number().int().nonnegative().default(0),
  consecutiveFailures: z.number().int().nonnegative().default(0),
  lastValidatedAt: z.string().nullable().default(null),
  validationStatus: z.enum(["valid", "invalid", "unknown"]).default("unknown"),
  source: z.enum(["import", "refresh", "unknown"]).default("unknown"),
});

const storeDocumentSchema = z.object({
  version: z.literal(STORE_SCHEMA_VERSION),
  metadata: metadataSchema,
  cookies: z.array(cookieSchema),
});

type StoreDocument = z.input<typeof storeDocumentSchema>;

export interface CookieStoreOptions {
  readonly structuredPath: string;
  readonly flatPath: string;
  /** Cookie names a usable jar must contain */
  readonly requiredCookies: readonly string[];
}

export interface StoreSnapshot {
  readonly jar: CookieJar;
  readonly metadata: StoreMetadata;
}

export interface LoadOptions {
  /** Move an unreadable structured file aside and start empty instead of throwing */
  readonly quarantineCorrupt?: boolean;
}

/**
 * - refresh: a validated refresh; stamps refresh times, resets the failure counter
 * - import: stamps the import time
 * - checkpoint: writes metadata exactly as given
 */
export type SaveKind = "refresh" | "import" | "checkpoint";

export interface SaveOptions {
  readonly kind: SaveKind;
  readonly now?: Date;
}

export function emptyMetadata(): StoreMetadata {
  return {
    lastRefreshedAt: null,
    lastImportAt: null,
    refreshCount: 0,
    consecutiveFailures: 0,
    lastValidatedAt: null,
    validationStatus: "unknown",
    source: "unknown",
  };
}

export class CookieStore {
  private readonly options: CookieStoreOptions;

  constructor(options: CookieStoreOptions) {
    this.options = options;
  }

  get structuredPath(): string {
    return this.options.structuredPath;
  }

  get flatPath(): string {
    return this.options.flatPath;
  }

  /**
   * Read the structured file. A missing file yields an empty jar.
   *
   * @throws StoreCorruptError when the file cannot be parsed, unless
   *   `quarantineCorrupt` is set
   */
  async load(options: LoadOptions = {}): Promise<StoreSnapshot> {
    const path = this.options.structuredPath;
    let raw: string;

    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        logger.debug("No structured store yet", { path });
        return { jar: new CookieJar(), metadata: emptyMetadata() };
      }
      throw new StoreCorruptError(`Cannot read cookie store: ${errorMessage(error)}`, path);
    }

    try {
      const document = parseDocument(raw, path);
      logger.debug("Cookie store loaded", { path, cookieCount: document.cookies.length });
      return { jar: new CookieJar(document.cookies), metadata: document.metadata };
    } catch (error) {
      if (!(error instanceof StoreCorruptError) || !options.quarantineCorrupt) {
        throw error;
      }
      const quarantinePath = await this.quarantine();
      logger.warn("Corrupt cookie store moved aside; starting with an empty jar", {
        path,
        quarantinePath,
        reason: error.message,
      });
      return { jar: new CookieJar(), metadata: emptyMetadata() };
    }
  }

  /**
   * Persist the jar to both files and return the metadata that was written.
   *
   * @throws SaveError; previously persisted files are left intact
   */
  async save(jar: CookieJar, metadata: StoreMetadata, options: SaveOptions): Promise<StoreMetadata> {
    const now = (options.now ?? new Date()).toISOString();
    const nextMetadata = applySaveKind(metadata, options.kind, now);
    const { structuredPath, flatPath } = this.options;

    const document: StoreDocument = {
      version: STORE_SCHEMA_VERSION,
      metadata: nextMetadata,
      cookies: jar.toArray(),
    };

    try {
      await ensureSecureDirectory(dirname(structuredPath));
      await ensureSecureDirectory(dirname(flatPath));
    } catch (error) {
      throw new SaveError(`Cannot create store directory: ${errorMessage(error)}`, structuredPath);
    }

    const previous = await readPrevious(structuredPath);

    try {
      await writeSecure(structuredPath, JSON.stringify(document, null, 2) + "\n");
    } catch (error) {
      throw new SaveError(`Failed to write cookie store: ${errorMessage(error)}`, structuredPath);
    }

    try {
      await writeSecure(flatPath, formatNetscape(jar));
    } catch (error) {
      await this.rollback(previous);
      throw new SaveError(`Failed to write cookie file: ${errorMessage(error)}`, flatPath);
    }

    logger.info("Cookies saved", {
      kind: options.kind,
      cookieCount: jar.size,
      structuredPath,
      flatPath,
    });
    return nextMetadata;
  }

  exportFlat(jar: CookieJar): string {
    return formatNetscape(jar);
  }

  /** JSON array in the shape Playwright's `addCookies` accepts */
  exportJson(jar: CookieJar): string {
    const cookies = jar.toArray().map((cookie) => ({
      ...cookie,
      expires: cookie.expires ?? -1,
    }));
    return JSON.stringify(cookies, null, 2) + "\n";
  }

  isExpired(cookie: Cookie, now: Date = new Date()): boolean {
    return isExpired(cookie, now);
  }

  jarIsValid(jar: CookieJar, now: Date = new Date()): boolean {
    return jarIsValid(jar, this.options.requiredCookies, now);
  }

  /** Delete both cookie files. Metadata goes with them. */
  async reset(): Promise<void> {
    await rm(this.options.structuredPath, { force: true });
    await rm(this.options.flatPath, { force: true });
    logger.warn("Cookie store reset", { structuredPath: this.options.structuredPath });
  }

  private async quarantine(): Promise<string> {
    const path = this.options.structuredPath;
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const target = `${path}.corrupt-${stamp}`;
    await rename(path, target);
    return target;
  }

  private async rollback(previous: Buffer | null): Promise<void> {
    const path = this.options.structuredPath;
    try {
      if (previous === null) {
        await rm(path, { force: true });
      } else {
        await writeSecure(path, previous);
      }
      logger.warn("Structured store rolled back after failed flat write", { path });
    } catch (error) {
      logger.error("Rollback of structured store failed", error, { path });
    }
  }
}

function parseDocument(raw: string, path: string): z.output<typeof storeDocumentSchema> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StoreCorruptError(`${basename(path)} is not valid JSON: ${errorMessage(error)}`, path);
  }

  const result = storeDocumentSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new StoreCorruptError(`${basename(path)} does not match the store schema`, path, {
      issues,
    });
  }
  return result.data;
}

function applySaveKind(metadata: StoreMetadata, kind: SaveKind, now: string): StoreMetadata {
  switch (kind) {
    case "refresh":
      return {
        ...metadata,
        lastRefreshedAt: now,
        lastValidatedAt: now,
        validationStatus: "valid",
        refreshCount: metadata.refreshCount + 1,
        consecutiveFailures: 0,
        source: "refresh",
      };
    case "import":
      return {
        ...metadata,
        lastImportAt: now,
        validationStatus: "unknown",
        source: "import",
      };
    case "checkpoint":
      return metadata;
  }
}

async function readPrevious(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isErrnoError(error) && error.code === "ENOENT") {
      return null;
    }
    throw new SaveError(`Cannot read current cookie store: ${errorMessage(error)}`, path);
  }
}

async function writeSecure(path: string, data: string | Buffer): Promise<void> {
  await writeFileAtomic(path, data, { mode: SECURE_FILE_MODE, fsync: true });
}
