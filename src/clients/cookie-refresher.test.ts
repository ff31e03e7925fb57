/**
 * Cookie Refresher Tests
 *
 * Drives the refresher against the in-process fake browser.
 */

import { describe, it, expect } from "vitest";
import { CookieRefresher } from "./cookie-refresher.js";
import { CookieJar } from "../cookies/jar.js";
import type { PlatformConfig } from "../config/index.js";
import { CancelledError } from "../shared/errors.js";
import { FakeBrowserBackend, type FakeBrowserScript } from "../test/fake-browser.js";
import { COOKIE_DOMAINS, makeCookie, REQUIRED_COOKIES, validCookies } from "../test/cookie-fixtures.js";

const platform: PlatformConfig = {
  landingUrl: "https://www.youtube.com/",
  probeUrl: "https://www.youtube.com/account",
  requiredCookies: REQUIRED_COOKIES,
  cookieDomains: COOKIE_DOMAINS,
  signInHosts: ["accounts.google.com"],
  signedOutSelector: "a.sign-in",
};

function setup(
  script: FakeBrowserScript = {},
  timeoutMs = 1000
): { backend: FakeBrowserBackend; refresher: CookieRefresher } {
  const backend = new FakeBrowserBackend(script);
  const refresher = new CookieRefresher({
    backend,
    platform,
    timeoutMs,
    launchAttempts: 3,
    launchRetryDelayMs: 0,
  });
  return { backend, refresher };
}

describe("CookieRefresher", () => {
  it("should extract, validate and close both sessions", async () => {
    const { backend, refresher } = setup();

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.succeeded).toBe(true);
    expect(result.validatedOnline).toBe(true);
    expect(result.error).toBeNull();
    expect(result.jar?.toArray()).toEqual(validCookies());
    expect(backend.sessions).toHaveLength(2);
    expect(backend.openSessions).toBe(0);
    expect(backend.sessions[0]?.visited).toEqual(["https://www.youtube.com/"]);
    expect(backend.sessions[1]?.visited).toEqual(["https://www.youtube.com/account"]);
  });

  it("should probe with only the refreshed cookies", async () => {
    const rotated = validCookies().map((cookie) => ({ ...cookie, value: `${cookie.value}-rotated` }));
    const { backend, refresher } = setup({ extract: { result: rotated } });

    await refresher.refresh(new CookieJar(validCookies()));

    expect(backend.sessions[1]?.loaded).toEqual(rotated);
  });

  it("should keep only platform-domain cookies", async () => {
    const { refresher } = setup({
      extract: { result: [...validCookies(), makeCookie({ name: "tracker", domain: ".example.com" })] },
    });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.jar?.size).toBe(5);
    expect(result.jar?.findByName("tracker")).toEqual([]);
  });

  it("should fail fast with ValidationError on an empty jar", async () => {
    const { backend, refresher } = setup();

    const result = await refresher.refresh(new CookieJar());

    expect(result.succeeded).toBe(false);
    expect(result.error).toEqual({
      kind: "ValidationError",
      message: "No cookies to refresh; import cookies first",
    });
    expect(backend.launchAttempts).toBe(0);
  });

  it("should finish even when the browser never acknowledges a close", async () => {
    const { backend, refresher } = setup({ closeHangs: true }, 100);

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.succeeded).toBe(true);
    expect(result.validatedOnline).toBe(true);
    expect(backend.sessions.every((session) => session.closed)).toBe(true);
  });

  it("should retry a failing launch", async () => {
    const { backend, refresher } = setup({ launchFailures: 2 });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.succeeded).toBe(true);
    expect(backend.launchAttempts).toBe(4);
  });

  it("should report BrowserLaunchError after three failed launches", async () => {
    const { backend, refresher } = setup({ launchFailures: 3 });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.succeeded).toBe(false);
    expect(result.jar).toBeNull();
    expect(result.error).toEqual({
      kind: "BrowserLaunchError",
      message: "Browser launch failed: Executable doesn't exist (attempt 3)",
    });
    expect(backend.launchAttempts).toBe(3);
  });

  it("should report NavigationTimeoutError when the landing page hangs", async () => {
    const { backend, refresher } = setup({ navigate: "hang" }, 50);

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.error).toEqual({
      kind: "NavigationTimeoutError",
      message: "Landing page did not settle within 50ms",
    });
    expect(backend.openSessions).toBe(0);
  });

  it("should report NavigationError for an error status", async () => {
    const { refresher } = setup({
      navigate: { result: { finalUrl: "https://www.youtube.com/", status: 503 } },
    });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.error).toEqual({ kind: "NavigationError", message: "Landing page answered HTTP 503" });
  });

  it("should report NavigationError when the page fails to load", async () => {
    const { refresher } = setup({ navigate: { error: new Error("net::ERR_NAME_NOT_RESOLVED") } });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.error).toEqual({
      kind: "NavigationError",
      message: "Navigation to https://www.youtube.com/ failed: net::ERR_NAME_NOT_RESOLVED",
    });
  });

  it("should report ExtractionError when extraction throws", async () => {
    const { backend, refresher } = setup({ extract: { error: new Error("context destroyed") } });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.error).toEqual({
      kind: "ExtractionError",
      message: "Cookie extraction failed: context destroyed",
    });
    expect(backend.openSessions).toBe(0);
  });

  it("should report ExtractionError when no platform cookies come back", async () => {
    const { refresher } = setup({
      extract: { result: [makeCookie({ name: "tracker", domain: ".example.com" })] },
    });

    const result = await refresher.refresh(new CookieJar(validCookies()));

    expect(result.error).toEqual({
      kind: "ExtractionError",
      message: "Browser returned no cookies for youtube.com, google.com",
    });
  });

  describe("online validation", () => {
    it("should mark a sign-in redirect as not validated", async () => {
      const { refresher } = setup({
        probe: {
          result: {
            finalUrl: "https://accounts.google.com/ServiceLogin?continue=youtube",
            status: 200,
            signedOutMarker: false,
          },
        },
      });

      const result = await refresher.refresh(new CookieJar(validCookies()));

      expect(result.succeeded).toBe(true);
      expect(result.validatedOnline).toBe(false);
      expect(result.jar?.size).toBe(5);
    });

    it("should mark a signed-out page as not validated", async () => {
      const { refresher } = setup({
        probe: {
          result: { finalUrl: "https://www.youtube.com/account", status: 200, signedOutMarker: true },
        },
      });

      const result = await refresher.refresh(new CookieJar(validCookies()));

      expect(result.succeeded).toBe(true);
      expect(result.validatedOnline).toBe(false);
    });

    it("should mark an error status as not validated", async () => {
      const { refresher } = setup({
        probe: {
          result: { finalUrl: "https://www.youtube.com/account", status: 403, signedOutMarker: false },
        },
      });

      const result = await refresher.refresh(new CookieJar(validCookies()));

      expect(result.validatedOnline).toBe(false);
    });

    it("should treat a probe that throws as not validated", async () => {
      const { backend, refresher } = setup({ probe: { error: new Error("probe crashed") } });

      const result = await refresher.refresh(new CookieJar(validCookies()));

      expect(result.succeeded).toBe(true);
      expect(result.validatedOnline).toBe(false);
      expect(backend.openSessions).toBe(0);
    });
  });

  describe("cancellation", () => {
    it("should close sessions and report CancelledError when aborted", async () => {
      const { backend, refresher } = setup({ navigate: "hang" }, 10_000);
      const controller = new AbortController();

      const pending = refresher.refresh(new CookieJar(validCookies()), { signal: controller.signal });
      setTimeout(() => {
        controller.abort(new CancelledError("shutdown"));
      }, 10);
      const result = await pending;

      expect(result.succeeded).toBe(false);
      expect(result.error?.kind).toBe("CancelledError");
      expect(backend.sessions).toHaveLength(1);
      expect(backend.sessions[0]?.closed).toBe(true);
    });

    it("should not launch when already aborted", async () => {
      const { backend, refresher } = setup();
      const controller = new AbortController();
      controller.abort(new CancelledError("shutdown"));

      const result = await refresher.refresh(new CookieJar(validCookies()), { signal: controller.signal });

      expect(result.error?.kind).toBe("CancelledError");
      expect(backend.sessions).toHaveLength(0);
    });
  });
});
