/**
 * CDP Backend Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { CdpBackend } from "./cdp-backend.js";

describe("CdpBackend.isAvailable", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should query the DevTools version endpoint", async () => {
    const fetchMock = vi.fn(async (_url: URL, _init?: RequestInit) => new Response("{}", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await new CdpBackend("http://127.0.0.1:9222").isAvailable()).toBe(true);
    expect(fetchMock.mock.calls[0]?.[0].href).toBe("http://127.0.0.1:9222/json/version");
  });

  it("should report an error status as unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 503 })));

    expect(await new CdpBackend("http://127.0.0.1:9222").isAvailable()).toBe(false);
  });

  it("should report a refused connection as unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    expect(await new CdpBackend("http://127.0.0.1:9222").isAvailable()).toBe(false);
  });
});
