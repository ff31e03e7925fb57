/**
 * CDP Backend
 *
 * Connects to an already running Chromium-compatible browser over the
 * Chrome DevTools Protocol instead of launching one, e.g. a browser
 * container started with --remote-debugging-port=9222.
 *
 * Set COOKIE_WARDEN_CDP_ENDPOINT=http://127.0.0.1:9222 to enable.
 */

import { chromium, type Browser } from "playwright";
import { PlaywrightBackedBackend } from "./base-backend.js";
import { createLogger } from "../../shared/logger.js";
import { BrowserLaunchError, errorMessage } from "../../shared/errors.js";
import { CDP_CONNECTION_TIMEOUT_MS, CDP_HEALTH_CHECK_TIMEOUT_MS } from "../../shared/constants.js";

const logger = createLogger("CdpBackend");

export class CdpBackend extends PlaywrightBackedBackend {
  readonly name = "cdp";
  private readonly cdpEndpoint: string;

  constructor(cdpEndpoint: string) {
    super();
    this.cdpEndpoint = cdpEndpoint;
  }

  protected async connect(timeoutMs: number): Promise<Browser> {
    logger.info("Connecting to browser via CDP", { endpoint: this.cdpEndpoint });

    try {
      const browser = await chromium.connectOverCDP(this.cdpEndpoint, {
        timeout: Math.min(timeoutMs, CDP_CONNECTION_TIMEOUT_MS),
      });
      logger.debug("Connected over CDP", { version: browser.version() });
      return browser;
    } catch (error) {
      throw new BrowserLaunchError(
        `CDP connection to ${this.cdpEndpoint} failed: ${errorMessage(error)}. Is the browser running?`,
        { endpoint: this.cdpEndpoint }
      );
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(new URL("/json/version", this.cdpEndpoint), {
        signal: AbortSignal.timeout(CDP_HEALTH_CHECK_TIMEOUT_MS),
      });
      return response.ok;
    } catch (error) {
      logger.debug("CDP endpoint not reachable", {
        endpoint: this.cdpEndpoint,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
