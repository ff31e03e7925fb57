/**
 * Cookie Jar Tests
 */

import { describe, it, expect } from "vitest";
import {
  CookieJar,
  isExpired,
  jarIsValid,
  matchesDomain,
  normalizeExpires,
  normalizeSameSite,
} from "./jar.js";
import { makeCookie, NOW, REQUIRED_COOKIES, validCookies } from "../test/cookie-fixtures.js";

describe("CookieJar", () => {
  it("should replace a cookie with the same key in place", () => {
    const jar = new CookieJar([
      makeCookie({ name: "SID", value: "old" }),
      makeCookie({ name: "HSID" }),
    ]);

    jar.set(makeCookie({ name: "SID", value: "new" }));

    expect(jar.size).toBe(2);
    expect(jar.toArray().map((cookie) => `${cookie.name}=${cookie.value}`)).toEqual([
      "SID=new",
      "HSID=hsid-value",
    ]);
  });

  it("should keep cookies that differ only by path or domain", () => {
    const jar = new CookieJar([
      makeCookie({ name: "SID" }),
      makeCookie({ name: "SID", path: "/feed" }),
      makeCookie({ name: "SID", domain: ".google.com" }),
    ]);

    expect(jar.size).toBe(3);
    expect(jar.findByName("SID")).toHaveLength(3);
    expect(jar.get(".youtube.com", "SID", "/feed")?.path).toBe("/feed");
  });

  it("should filter cookies by platform domain", () => {
    const jar = new CookieJar([
      ...validCookies(),
      makeCookie({ name: "other", domain: "example.com" }),
      makeCookie({ name: "lookalike", domain: "notyoutube.com" }),
    ]);

    const filtered = jar.filterDomains(["youtube.com", "google.com"]);

    expect(filtered.size).toBe(5);
    expect(filtered.findByName("other")).toEqual([]);
    expect(filtered.findByName("lookalike")).toEqual([]);
  });
});

describe("matchesDomain", () => {
  it("should match the domain itself and its subdomains", () => {
    expect(matchesDomain(".youtube.com", ["youtube.com"])).toBe(true);
    expect(matchesDomain("www.youtube.com", ["youtube.com"])).toBe(true);
    expect(matchesDomain("accounts.google.com", ["youtube.com", "google.com"])).toBe(true);
    expect(matchesDomain("evilyoutube.com", ["youtube.com"])).toBe(false);
  });
});

describe("isExpired", () => {
  const nowSeconds = NOW.getTime() / 1000;

  it("should treat session cookies as never expired", () => {
    expect(isExpired(makeCookie({ name: "SID", expires: undefined }), NOW)).toBe(false);
  });

  it("should expire a cookie at its expiry instant", () => {
    expect(isExpired(makeCookie({ name: "SID", expires: nowSeconds }), NOW)).toBe(true);
    expect(isExpired(makeCookie({ name: "SID", expires: nowSeconds + 1 }), NOW)).toBe(false);
  });
});

describe("jarIsValid", () => {
  it("should reject an empty jar", () => {
    expect(jarIsValid(new CookieJar(), REQUIRED_COOKIES, NOW)).toBe(false);
  });

  it("should accept a jar with every required cookie unexpired", () => {
    expect(jarIsValid(new CookieJar(validCookies()), REQUIRED_COOKIES, NOW)).toBe(true);
  });

  it("should reject a jar missing a required cookie", () => {
    const jar = new CookieJar(validCookies().filter((cookie) => cookie.name !== "LOGIN_INFO"));
    expect(jarIsValid(jar, REQUIRED_COOKIES, NOW)).toBe(false);
  });

  it("should accept a required name when one of its entries is still valid", () => {
    const jar = new CookieJar(validCookies());
    jar.set(makeCookie({ name: "SID", domain: ".google.com", expires: 1 }));
    expect(jarIsValid(jar, REQUIRED_COOKIES, NOW)).toBe(true);
  });
});

describe("normalizeExpires", () => {
  it("should convert milliseconds to seconds", () => {
    expect(normalizeExpires(1798761600000)).toBe(1798761600);
  });

  it("should map zero, negative and non-finite values to a session cookie", () => {
    expect(normalizeExpires(0)).toBeUndefined();
    expect(normalizeExpires(-1)).toBeUndefined();
    expect(normalizeExpires(Number.NaN)).toBeUndefined();
    expect(normalizeExpires(undefined)).toBeUndefined();
  });

  it("should keep second values unchanged", () => {
    expect(normalizeExpires(1798761600.25)).toBe(1798761600.25);
  });
});

describe("normalizeSameSite", () => {
  it("should normalise browser spellings", () => {
    expect(normalizeSameSite("lax")).toBe("Lax");
    expect(normalizeSameSite("STRICT")).toBe("Strict");
    expect(normalizeSameSite("no_restriction")).toBe("None");
    expect(normalizeSameSite("unspecified")).toBeUndefined();
    expect(normalizeSameSite(null)).toBeUndefined();
  });
});
