/**
 * Cookie Health Check Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CookieHealthCheck } from "./health.js";
import { CookieJar } from "./jar.js";
import { formatNetscape } from "./netscape.js";
import type { ServiceState } from "../types/index.js";
import { COOKIE_DOMAINS, makeCookie, NOW, REQUIRED_COOKIES, validCookies } from "../test/cookie-fixtures.js";

const HOUR_MS = 60 * 60 * 1000;

function serviceState(status: ServiceState["status"]): ServiceState {
  return {
    status,
    pid: status === "running" ? 4242 : null,
    startedAt: null,
    nextRunAt: null,
    consecutiveFailures: 0,
    lastRefresh: null,
    lastManualRefresh: null,
    stale: false,
  };
}

describe("CookieHealthCheck", () => {
  let dir: string;
  let flatPath: string;
  let status: ServiceState["status"];
  let check: CookieHealthCheck;

  async function writeFlat(text: string, ageHours: number): Promise<void> {
    await writeFile(flatPath, text);
    const mtime = new Date(NOW.getTime() - ageHours * HOUR_MS);
    await utimes(flatPath, mtime, mtime);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cookie-health-"));
    flatPath = join(dir, "cookies.txt");
    status = "running";
    check = new CookieHealthCheck({
      flatPath,
      requiredCookies: REQUIRED_COOKIES,
      cookieDomains: COOKIE_DOMAINS,
      getServiceState: async () => serviceState(status),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should report healthy for a fresh, complete file and a running service", async () => {
    await writeFlat(formatNetscape(validCookies()), 1);

    const report = await check.run(NOW);

    expect(report.status).toBe("healthy");
    expect(report.file.freshness).toBe("fresh");
    expect(report.file.ageHours).toBe(1);
    expect(report.content).toEqual({
      valid: true,
      cookieCount: 5,
      domainsPresent: ["youtube.com", "google.com"],
      message: "Cookie file holds 5 cookies",
    });
    expect(report.issues).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.recommendations).toEqual([]);
  });

  it("should degrade when the file is older than the warning age", async () => {
    await writeFlat(formatNetscape(validCookies()), 13);

    const report = await check.run(NOW);

    expect(report.status).toBe("degraded");
    expect(report.warnings).toEqual(["Cookie file is 13 hours old"]);
    expect(report.recommendations).toEqual(["Refresh now: cookie-warden refresh"]);
  });

  it("should be unhealthy when the file is older than the critical age", async () => {
    await writeFlat(formatNetscape(validCookies()), 25);

    const report = await check.run(NOW);

    expect(report.status).toBe("unhealthy");
    expect(report.file.freshness).toBe("critical");
    expect(report.issues).toEqual(["Cookie file is 25 hours old"]);
  });

  it("should be unhealthy when the file is missing", async () => {
    const report = await check.run(NOW);

    expect(report.status).toBe("unhealthy");
    expect(report.file.freshness).toBe("missing");
    expect(report.content).toBeNull();
    expect(report.issues).toEqual(["Cookie file does not exist"]);
    expect(report.recommendations).toEqual(["Import cookies: cookie-warden import --file cookies.txt"]);
  });

  it("should be unhealthy when the file is empty", async () => {
    await writeFlat("", 0);

    const report = await check.run(NOW);

    expect(report.file.freshness).toBe("empty");
    expect(report.issues).toEqual(["Cookie file is empty"]);
  });

  it("should flag too few cookies and missing required ones", async () => {
    await writeFlat(formatNetscape([makeCookie({ name: "SID" })]), 1);

    const report = await check.run(NOW);

    expect(report.status).toBe("unhealthy");
    expect(report.issues).toEqual([
      "Too few cookies (1)",
      "Missing required cookies: LOGIN_INFO. Export again while signed in.",
    ]);
    expect(report.recommendations).toEqual([
      "Re-export cookies from a signed-in browser and import them",
    ]);
  });

  it("should flag a file without platform cookies", async () => {
    const others = validCookies().map((cookie) => ({ ...cookie, domain: ".example.com" }));
    await writeFlat(formatNetscape(new CookieJar(others)), 1);

    const report = await check.run(NOW);

    expect(report.content?.valid).toBe(false);
    expect(report.content?.message).toBe("Cookie file has no cookies for youtube.com, google.com");
  });

  it("should warn when the service is not running", async () => {
    status = "stopped";
    await writeFlat(formatNetscape(validCookies()), 1);

    const report = await check.run(NOW);

    expect(report.status).toBe("degraded");
    expect(report.warnings).toEqual(["Service is not running"]);
    expect(report.recommendations).toEqual(["Start the service: cookie-warden start --daemon"]);
  });
});
