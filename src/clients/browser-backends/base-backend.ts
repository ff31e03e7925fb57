/**
 * Shared session bookkeeping for Playwright-driven backends.
 */

import type { Browser } from "playwright";
import type { BrowserBackend, BrowserSession } from "./types.js";
import { PlaywrightSession } from "./playwright-session.js";
import { createLogger } from "../../shared/logger.js";
import {
  BROWSER_VIEWPORT_HEIGHT,
  BROWSER_VIEWPORT_WIDTH,
  DEFAULT_LOCALE,
  DEFAULT_USER_AGENT,
} from "../../shared/constants.js";

const logger = createLogger("BrowserBackend");

export abstract class PlaywrightBackedBackend implements BrowserBackend {
  abstract readonly name: string;
  private readonly sessions = new Set<BrowserSession>();

  /** Launch or connect; the returned browser is owned by one session */
  protected abstract connect(timeoutMs: number): Promise<Browser>;

  abstract isAvailable(): Promise<boolean>;

  async openSession(options: { timeoutMs: number }): Promise<BrowserSession> {
    const browser = await this.connect(options.timeoutMs);

    try {
      const context = await browser.newContext({
        userAgent: DEFAULT_USER_AGENT,
        viewport: { width: BROWSER_VIEWPORT_WIDTH, height: BROWSER_VIEWPORT_HEIGHT },
        locale: DEFAULT_LOCALE,
      });
      const session: BrowserSession = new PlaywrightSession(browser, context, () => {
        this.sessions.delete(session);
      });
      this.sessions.add(session);
      return session;
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    const open = [...this.sessions];
    if (open.length > 0) {
      logger.info("Closing open browser sessions", { backend: this.name, count: open.length });
    }
    const results = await Promise.allSettled(open.map((session) => session.close()));
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("Failed to close browser session", { backend: this.name, error: String(result.reason) });
      }
    }
    this.sessions.clear();
  }
}
