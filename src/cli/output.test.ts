/**
 * CLI Output Tests
 */

import { describe, it, expect } from "vitest";
import { formatStatus, formatSummary } from "./output.js";
import { parseFormat } from "./program.js";
import type { ServiceState } from "../types/index.js";

const running: ServiceState = {
  status: "running",
  pid: 4321,
  startedAt: "2026-01-01T00:00:00.000Z",
  nextRunAt: "2026-01-01T06:00:00.000Z",
  consecutiveFailures: 2,
  lastRefresh: {
    at: "2026-01-01T00:05:00.000Z",
    trigger: "scheduled",
    outcome: "failure",
    errorKind: "NavigationTimeoutError",
    message: "Landing page did not settle within 30000ms",
    cookieCount: null,
  },
  lastManualRefresh: null,
  stale: false,
};

describe("formatSummary", () => {
  it("should describe a success", () => {
    expect(
      formatSummary({
        at: "2026-01-01T00:00:00.000Z",
        trigger: "manual",
        outcome: "success",
        errorKind: null,
        message: null,
        cookieCount: 12,
      })
    ).toBe("success at 2026-01-01T00:00:00.000Z (12 cookies, manual)");
  });

  it("should describe a failure with its kind", () => {
    expect(formatSummary(running.lastRefresh)).toBe(
      "failed at 2026-01-01T00:05:00.000Z (scheduled): NavigationTimeoutError: Landing page did not settle within 30000ms"
    );
  });

  it("should say never without an attempt", () => {
    expect(formatSummary(null)).toBe("never");
  });
});

describe("formatStatus", () => {
  it("should list a running service", () => {
    expect(formatStatus(running)).toEqual([
      "Status:               running (pid 4321)",
      "Started:              2026-01-01T00:00:00.000Z",
      "Next refresh:         2026-01-01T06:00:00.000Z",
      "Consecutive failures: 2",
      "Last refresh:         failed at 2026-01-01T00:05:00.000Z (scheduled): NavigationTimeoutError: Landing page did not settle within 30000ms",
      "Last manual refresh:  never",
    ]);
  });

  it("should mention a stale lock", () => {
    const lines = formatStatus({ ...running, status: "stopped", pid: null, stale: true });

    expect(lines[0]).toBe("Status:               stopped (stale lock found)");
    expect(lines).toHaveLength(4);
  });
});

describe("parseFormat", () => {
  it("should accept netscape and json", () => {
    expect(parseFormat("netscape")).toBe("netscape");
    expect(parseFormat("json")).toBe("json");
  });

  it("should reject anything else", () => {
    expect(() => parseFormat("xml")).toThrow("Format must be: netscape or json");
  });
});
