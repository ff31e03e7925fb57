/**
 * Error Recovery Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorRecovery } from "./error-recovery.js";

const MINUTE = 60_000;

describe("ErrorRecovery", () => {
  const recovery = new ErrorRecovery({
    alertThreshold: 3,
    baseDelayMs: 5 * MINUTE,
    maxDelayMs: 30 * MINUTE,
  });

  describe("nextDelay", () => {
    it("should follow min(base * 2^n, max)", () => {
      for (let n = 0; n <= 12; n++) {
        expect(recovery.nextDelay(n)).toBe(Math.min(5 * MINUTE * 2 ** n, 30 * MINUTE));
      }
    });

    it("should be monotonically non-decreasing", () => {
      const delays = Array.from({ length: 20 }, (_, n) => recovery.nextDelay(n));
      for (let i = 1; i < delays.length; i++) {
        expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
      }
    });

    it("should cap very large counters", () => {
      expect(recovery.nextDelay(1000)).toBe(30 * MINUTE);
    });
  });

  describe("delayAfterFailure", () => {
    it("should wait 5, 10, 20 then 30 minutes for four launch failures", () => {
      const delays = [1, 2, 3, 4].map((failures) => recovery.delayAfterFailure(failures) / MINUTE);
      expect(delays).toEqual([5, 10, 20, 30]);
    });
  });

  describe("alerting", () => {
    it("should alert at and past the threshold", () => {
      expect(recovery.shouldAlert(2)).toBe(false);
      expect(recovery.shouldAlert(3)).toBe(true);
      expect(recovery.shouldAlert(7)).toBe(true);
    });

    it("should raise exactly one alert per failure episode", () => {
      let failures = 0;
      let alerts = 0;
      const fail = (): void => {
        failures += 1;
        if (recovery.alertOnFailure(failures)) {
          alerts += 1;
        }
      };

      fail();
      fail();
      fail();
      fail();
      fail();
      expect(alerts).toBe(1);

      failures = 0; // success
      fail();
      fail();
      fail();
      expect(alerts).toBe(2);
    });
  });

  describe("describe", () => {
    it("should summarise a healthy counter", () => {
      expect(recovery.describe(0)).toEqual({
        consecutiveFailures: 0,
        alertThreshold: 3,
        alerting: false,
        nextRetryDelayMs: null,
      });
    });

    it("should summarise a failing counter", () => {
      expect(recovery.describe(3)).toEqual({
        consecutiveFailures: 3,
        alertThreshold: 3,
        alerting: true,
        nextRetryDelayMs: 20 * MINUTE,
      });
    });
  });
});
