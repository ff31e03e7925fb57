/**
 * Shared test data. Values are placeholders, not real session cookies.
 */

import type { Cookie } from "../types/index.js";

/** 2026-01-01T00:00:00Z */
export const NOW = new Date("2026-01-01T00:00:00.000Z");

/** 2027-01-01T00:00:00Z in unix seconds */
export const NEXT_YEAR = 1798761600;

/** 2025-01-01T00:00:00Z in unix seconds */
export const LAST_YEAR = 1735689600;

export const REQUIRED_COOKIES = ["SID", "LOGIN_INFO"] as const;

export const COOKIE_DOMAINS = ["youtube.com", "google.com"] as const;

/** Five cookies including both required ones */
export const NETSCAPE_FIXTURE = [
  "# Netscape HTTP Cookie File",
  "# exported for tests",
  "",
  `.youtube.com\tTRUE\t/\tTRUE\t${NEXT_YEAR}\tSID\tsid-value`,
  `.youtube.com\tTRUE\t/\tTRUE\t${NEXT_YEAR}\tLOGIN_INFO\tlogin-value`,
  `#HttpOnly_.youtube.com\tTRUE\t/\tTRUE\t${NEXT_YEAR}\tHSID\thsid-value`,
  `.google.com\tTRUE\t/\tFALSE\t0\tNID\tnid-value`,
  `www.youtube.com\tFALSE\t/\tFALSE\t${NEXT_YEAR}\tPREF\tf6=40000000`,
  "",
].join("\n");

export function makeCookie(overrides: Partial<Cookie> & Pick<Cookie, "name">): Cookie {
  return {
    value: `${overrides.name.toLowerCase()}-value`,
    domain: ".youtube.com",
    path: "/",
    expires: NEXT_YEAR,
    secure: true,
    httpOnly: false,
    ...overrides,
  };
}

/** Jar contents that satisfy the default required cookies */
export function validCookies(): Cookie[] {
  return [
    makeCookie({ name: "SID" }),
    makeCookie({ name: "LOGIN_INFO" }),
    makeCookie({ name: "HSID", httpOnly: true }),
    makeCookie({ name: "NID", domain: ".google.com", expires: undefined }),
    makeCookie({ name: "PREF", domain: "www.youtube.com" }),
  ];
}
