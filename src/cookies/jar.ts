/**
 * Cookie Jar
 *
 * Ordered set of cookies unique by (domain, name, path). Setting a cookie
 * whose key is already present replaces it in place; the position of the
 * first occurrence is kept.
 */

import type { Cookie, SameSite } from "../types/index.js";

/** Expiry values above this are milliseconds, not seconds */
const MILLISECOND_EXPIRY_THRESHOLD = 1e11;

export function cookieKey(cookie: Pick<Cookie, "domain" | "name" | "path">): string {
  return `${cookie.domain}\t${cookie.name}\t${cookie.path}`;
}

export class CookieJar implements Iterable<Cookie> {
  private readonly entries = new Map<string, Cookie>();

  constructor(cookies: Iterable<Cookie> = []) {
    this.merge(cookies);
  }

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  set(cookie: Cookie): void {
    this.entries.set(cookieKey(cookie), cookie);
  }

  merge(cookies: Iterable<Cookie>): void {
    for (const cookie of cookies) {
      this.set(cookie);
    }
  }

  get(domain: string, name: string, path = "/"): Cookie | undefined {
    return this.entries.get(cookieKey({ domain, name, path }));
  }

  findByName(name: string): Cookie[] {
    return this.toArray().filter((cookie) => cookie.name === name);
  }

  /** Cookies whose domain equals or is a subdomain of one of `domains` */
  filterDomains(domains: readonly string[]): CookieJar {
    return new CookieJar(this.toArray().filter((cookie) => matchesDomain(cookie.domain, domains)));
  }

  toArray(): Cookie[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<Cookie> {
    return this.entries.values();
  }
}

export function matchesDomain(cookieDomain: string, domains: readonly string[]): boolean {
  const host = stripLeadingDot(cookieDomain).toLowerCase();
  return domains.some((domain) => {
    const target = stripLeadingDot(domain).toLowerCase();
    return host === target || host.endsWith(`.${target}`);
  });
}

function stripLeadingDot(domain: string): string {
  return domain.startsWith(".") ? domain.slice(1) : domain;
}

/**
 * A cookie is expired once its expiry is at or before `now`.
 * Session cookies never expire here.
 */
export function isExpired(cookie: Cookie, now: Date = new Date()): boolean {
  if (cookie.expires === undefined) {
    return false;
  }
  return cookie.expires * 1000 <= now.getTime();
}

/**
 * A jar is valid when it is non-empty and each required name has at least
 * one unexpired entry.
 */
export function jarIsValid(
  jar: CookieJar,
  requiredNames: readonly string[],
  now: Date = new Date()
): boolean {
  if (jar.isEmpty()) {
    return false;
  }
  return requiredNames.every((name) =>
    jar.findByName(name).some((cookie) => !isExpired(cookie, now))
  );
}

/**
 * Normalise an expiry to unix seconds. Millisecond values are scaled down;
 * zero, negative and non-finite values mean a session cookie.
 */
export function normalizeExpires(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  if (value > MILLISECOND_EXPIRY_THRESHOLD) {
    return Math.floor(value / 1000);
  }
  return value;
}

/**
 * Map the spellings browsers and extensions use onto Strict/Lax/None.
 * Unrecognised values leave the attribute unset.
 */
export function normalizeSameSite(value: string | null | undefined): SameSite | undefined {
  switch (value?.trim().toLowerCase()) {
    case "strict":
      return "Strict";
    case "lax":
      return "Lax";
    case "none":
    case "no_restriction":
      return "None";
    default:
      return undefined;
  }
}
