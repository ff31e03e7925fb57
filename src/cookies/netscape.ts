/**
 * Netscape Cookie File Codec
 *
 * The flat interop format read by curl and most download tools. One cookie
 * per line, seven tab-separated fields:
 *
 *   domain  includeSubdomains  path  secure  expires  name  value
 *
 * Lines starting with "#" are comments, except "#HttpOnly_" which curl uses
 * to mark httpOnly cookies.
 */

import type { Cookie } from "../types/index.js";
import { normalizeExpires } from "./jar.js";

export const NETSCAPE_HEADER = "# Netscape HTTP Cookie File";

/** Header written by older curl releases */
export const LEGACY_NETSCAPE_HEADER = "# HTTP Cookie File";

export const HTTP_ONLY_PREFIX = "#HttpOnly_";

const FIELD_COUNT = 7;

export interface SkippedLine {
  /** 1-based line number */
  readonly line: number;
  readonly reason: string;
}

export interface NetscapeParseResult {
  readonly cookies: Cookie[];
  readonly skipped: SkippedLine[];
}

/** True for lines that carry a cookie rather than a comment */
export function isCookieLine(line: string): boolean {
  if (line.trim() === "") {
    return false;
  }
  return !line.startsWith("#") || line.startsWith(HTTP_ONLY_PREFIX);
}

/**
 * Parse Netscape cookie text. Comments, blank lines and CRLF endings are
 * tolerated; malformed lines are reported in `skipped`.
 */
export function parseNetscape(text: string): NetscapeParseResult {
  const cookies: Cookie[] = [];
  const skipped: SkippedLine[] = [];

  text.split("\n").forEach((rawLine, index) => {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (!isCookieLine(line)) {
      return;
    }

    const httpOnly = line.startsWith(HTTP_ONLY_PREFIX);
    const fields = (httpOnly ? line.slice(HTTP_ONLY_PREFIX.length) : line).split("\t");

    if (fields.length < FIELD_COUNT) {
      skipped.push({
        line: index + 1,
        reason: `expected ${FIELD_COUNT} tab-separated fields, found ${fields.length}`,
      });
      return;
    }

    const [domain = "", , path = "", secure = "", expires = "", name = ""] = fields;
    // Values may themselves contain tabs
    const value = fields.slice(FIELD_COUNT - 1).join("\t");

    if (domain.trim() === "" || name.trim() === "") {
      skipped.push({ line: index + 1, reason: "missing domain or name" });
      return;
    }

    const expiresSeconds = Number(expires.trim());
    if (!Number.isFinite(expiresSeconds)) {
      skipped.push({ line: index + 1, reason: `invalid expiry "${expires}"` });
      return;
    }

    cookies.push({
      name: name.trim(),
      value,
      domain: domain.trim(),
      path: path.trim() || "/",
      expires: normalizeExpires(expiresSeconds),
      secure: secure.trim().toUpperCase() === "TRUE",
      httpOnly,
    });
  });

  return { cookies, skipped };
}

/**
 * Serialise cookies deterministically: header first, then one line per
 * cookie sorted by (domain, name, path).
 */
export function formatNetscape(cookies: Iterable<Cookie>): string {
  const lines = [...cookies].sort(compareCookies).map(formatLine);
  return [NETSCAPE_HEADER, "# Generated by cookie-warden. Edits are overwritten.", "", ...lines, ""].join(
    "\n"
  );
}

function formatLine(cookie: Cookie): string {
  return [
    cookie.domain,
    cookie.domain.startsWith(".") ? "TRUE" : "FALSE",
    cookie.path,
    cookie.secure ? "TRUE" : "FALSE",
    String(cookie.expires === undefined ? 0 : Math.floor(cookie.expires)),
    cookie.name,
    cookie.value,
  ].join("\t");
}

/** Locale-independent ordering by (domain, name, path) */
export function compareCookies(a: Cookie, b: Cookie): number {
  return compareStrings(a.domain, b.domain) || compareStrings(a.name, b.name) || compareStrings(a.path, b.path);
}

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
