/**
 * Cookie Importer
 *
 * Turns exported cookie files into a CookieJar. Two formats are understood:
 * Netscape cookies.txt and JSON (Playwright, Selenium and browser-extension
 * exports). Works on a buffer handed over by the caller; no file I/O.
 */

import { z } from "zod";
import { CookieJar, isExpired, matchesDomain, normalizeExpires, normalizeSameSite } from "./jar.js";
import {
  isCookieLine,
  LEGACY_NETSCAPE_HEADER,
  NETSCAPE_HEADER,
  parseNetscape,
} from "./netscape.js";
import type { Cookie, CookieFormat, DetectedFormat } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { ImportError, ImportFormatError, errorMessage } from "../shared/errors.js";
import { HEALTH_MIN_COOKIE_COUNT } from "../shared/constants.js";

const logger = createLogger("CookieImporter");

const numeric = z.union([z.number(), z.string()]).nullable().optional();

/** Loose record shape; field variants differ between exporters */
const jsonCookieSchema = z
  .object({
    name: z.string().optional(),
    value: z.union([z.string(), z.number()]).nullable().optional(),
    domain: z.string().optional(),
    path: z.string().optional(),
    expires: numeric,
    expiry: numeric,
    expirationDate: numeric,
    session: z.boolean().optional(),
    secure: z.boolean().optional(),
    httpOnly: z.boolean().optional(),
    sameSite: z.string().nullable().optional(),
  })
  .passthrough();

type JsonCookieRecord = z.infer<typeof jsonCookieSchema>;

export type InputBytes = Uint8Array | string;

export interface DroppedRecord {
  /** Line number (netscape) or array index (json) */
  readonly position: number;
  readonly reason: string;
}

export interface ImportResult {
  readonly format: CookieFormat;
  readonly jar: CookieJar;
  readonly dropped: DroppedRecord[];
}

export interface ValidationReport {
  readonly ok: boolean;
  readonly missing: string[];
  readonly expired: string[];
  readonly cookieCount: number;
  readonly platformCookieCount: number;
  readonly diagnostics: string[];
}

export interface CookieImporterOptions {
  readonly requiredCookies: readonly string[];
  readonly cookieDomains: readonly string[];
}

export class CookieImporter {
  private readonly options: CookieImporterOptions;

  constructor(options: CookieImporterOptions) {
    this.options = options;
  }

  detectFormat(bytes: InputBytes): DetectedFormat {
    return detectFormat(bytes);
  }

  /**
   * @throws ImportFormatError for unparseable input
   * @throws ImportError("NO_VALID_COOKIES") when nothing usable remains
   */
  parse(bytes: InputBytes, format: CookieFormat): ImportResult {
    const text = decode(bytes);
    const { cookies, dropped } = format === "netscape" ? fromNetscape(text) : fromJson(text);

    for (const record of dropped) {
      logger.warn("Dropped cookie record", { format, ...record });
    }

    if (cookies.length === 0) {
      throw new ImportError("NO_VALID_COOKIES", `No valid cookies found in ${format} input`, {
        dropped: dropped.length,
      });
    }

    const jar = new CookieJar(cookies);
    logger.info("Cookies parsed", { format, cookieCount: jar.size, dropped: dropped.length });
    return { format, jar, dropped };
  }

  /**
   * Check the platform's required cookies are present and unexpired.
   */
  validateRequiredFields(jar: CookieJar, now: Date = new Date()): ValidationReport {
    const missing: string[] = [];
    const expired: string[] = [];

    for (const name of this.options.requiredCookies) {
      const entries = jar.findByName(name);
      if (entries.length === 0) {
        missing.push(name);
      } else if (entries.every((cookie) => isExpired(cookie, now))) {
        expired.push(name);
      }
    }

    const platformCookieCount = jar
      .toArray()
      .filter((cookie) => matchesDomain(cookie.domain, this.options.cookieDomains)).length;

    const diagnostics: string[] = [];
    if (missing.length > 0) {
      diagnostics.push(
        `Missing required cookies: ${missing.join(", ")}. Export again while signed in.`
      );
    }
    if (expired.length > 0) {
      diagnostics.push(
        `Expired required cookies: ${expired.join(", ")}. Sign in again in the browser and re-export.`
      );
    }
    if (platformCookieCount === 0) {
      diagnostics.push(`No cookies for ${this.options.cookieDomains.join(", ")}.`);
    } else if (platformCookieCount < HEALTH_MIN_COOKIE_COUNT) {
      diagnostics.push(
        `Only ${platformCookieCount} platform cookies; a signed-in export usually has more.`
      );
    }

    return {
      ok: missing.length === 0 && expired.length === 0,
      missing,
      expired,
      cookieCount: jar.size,
      platformCookieCount,
      diagnostics,
    };
  }

  /**
   * Detect (unless `format` is given), parse and validate in one step.
   */
  importBytes(
    bytes: InputBytes,
    format?: CookieFormat,
    now: Date = new Date()
  ): ImportResult & { report: ValidationReport } {
    const resolved = format ?? this.detectFormat(bytes);
    if (resolved === "unknown") {
      throw new ImportFormatError(
        "UNKNOWN_FORMAT",
        "Unrecognised cookie file: expected Netscape cookies.txt or a JSON cookie export"
      );
    }

    const result = this.parse(bytes, resolved);
    return { ...result, report: this.validateRequiredFields(result.jar, now) };
  }
}

/**
 * Netscape when the header is present or any line has seven tab-separated
 * fields; JSON when the text parses to cookie-shaped records.
 */
export function detectFormat(bytes: InputBytes): DetectedFormat {
  const text = decode(bytes).trim();
  if (text === "") {
    return "unknown";
  }

  if (text.startsWith(NETSCAPE_HEADER) || text.startsWith(LEGACY_NETSCAPE_HEADER)) {
    return "netscape";
  }

  if (text.startsWith("[") || text.startsWith("{")) {
    try {
      const records = extractJsonRecords(JSON.parse(text));
      if (records?.some(isCookieShaped)) {
        return "json";
      }
    } catch {
      logger.debug("Input looks like JSON but does not parse");
    }
  }

  const looksTabular = text
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .some((line) => isCookieLine(line) && line.split("\t").length >= 7);

  return looksTabular ? "netscape" : "unknown";
}

function decode(bytes: InputBytes): string {
  const text = typeof bytes === "string" ? bytes : new TextDecoder("utf-8").decode(bytes);
  return text.startsWith("\uFEFF") ? text.slice(1) : text;
}

function fromNetscape(text: string): { cookies: Cookie[]; dropped: DroppedRecord[] } {
  const { cookies, skipped } = parseNetscape(text);
  return {
    cookies,
    dropped: skipped.map((entry) => ({ position: entry.line, reason: entry.reason })),
  };
}

function fromJson(text: string): { cookies: Cookie[]; dropped: DroppedRecord[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ImportFormatError("UNPARSEABLE", `Invalid JSON: ${errorMessage(error)}`);
  }

  const records = extractJsonRecords(parsed);
  if (records === null) {
    throw new ImportFormatError(
      "UNPARSEABLE",
      'Expected a JSON array of cookies or an object with a "cookies" array'
    );
  }

  const cookies: Cookie[] = [];
  const dropped: DroppedRecord[] = [];

  records.forEach((record, index) => {
    const result = jsonCookieSchema.safeParse(record);
    if (!result.success) {
      dropped.push({ position: index, reason: result.error.issues[0]?.message ?? "invalid record" });
      return;
    }

    const converted = toCookie(result.data);
    if ("reason" in converted) {
      dropped.push({ position: index, reason: converted.reason });
      return;
    }
    cookies.push(converted.cookie);
  });

  return { cookies, dropped };
}

/** Array of records, or the `cookies` array of a wrapper object */
function extractJsonRecords(value: unknown): unknown[] | null {
  if (Array.isArray(value)) {
    return value.every(isPlainObject) ? value : null;
  }
  if (!isPlainObject(value)) {
    return null;
  }
  const cookies = value.cookies;
  if (Array.isArray(cookies)) {
    return cookies.every(isPlainObject) ? cookies : null;
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCookieShaped(record: unknown): boolean {
  return isPlainObject(record) && typeof record.name === "string" && typeof record.domain === "string";
}

/** Tabs and line breaks would split a line of the flat file */
const FIELD_BREAK = /[\t\r\n]/;
const LINE_BREAK = /[\r\n]/;

function toCookie(record: JsonCookieRecord): { cookie: Cookie } | { reason: string } {
  const name = record.name?.trim() ?? "";
  const domain = record.domain?.trim() ?? "";
  if (name === "" || domain === "") {
    return { reason: "missing domain or name" };
  }
  const path = record.path?.trim() || "/";
  if (FIELD_BREAK.test(name) || FIELD_BREAK.test(domain) || FIELD_BREAK.test(path)) {
    return { reason: "tab or line break in name, domain or path" };
  }
  const value = record.value === null || record.value === undefined ? "" : String(record.value);
  if (LINE_BREAK.test(value)) {
    return { reason: "line break in value" };
  }

  const expiresRaw =
    record.session === true
      ? undefined
      : (toNumber(record.expires) ?? toNumber(record.expiry) ?? toNumber(record.expirationDate));

  return {
    cookie: {
      name,
      value,
      domain,
      path,
      expires: normalizeExpires(expiresRaw),
      secure: record.secure ?? false,
      httpOnly: record.httpOnly ?? false,
      sameSite: normalizeSameSite(record.sameSite),
    },
  };
}

function toNumber(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined || value === "") {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
