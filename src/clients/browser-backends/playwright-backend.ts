/**
 * Playwright Backend
 *
 * Default backend: launches one of Playwright's bundled browsers per
 * session and closes it with the session.
 */

import { chromium, firefox, webkit, type Browser, type BrowserType } from "playwright";
import { PlaywrightBackedBackend } from "./base-backend.js";
import type { BrowserEngine } from "../../config/index.js";
import { createLogger } from "../../shared/logger.js";
import { CHROMIUM_LAUNCH_ARGS } from "../../shared/constants.js";

const logger = createLogger("PlaywrightBackend");

const ENGINES: Record<BrowserEngine, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

export interface PlaywrightBackendOptions {
  readonly engine: BrowserEngine;
  /** Show the browser window (debugging) */
  readonly showBrowser: boolean;
}

export class PlaywrightBackend extends PlaywrightBackedBackend {
  readonly name = "playwright";
  private readonly options: PlaywrightBackendOptions;

  constructor(options: PlaywrightBackendOptions) {
    super();
    this.options = options;
  }

  protected async connect(timeoutMs: number): Promise<Browser> {
    const { engine, showBrowser } = this.options;
    logger.info("Launching Playwright browser", { engine, headless: !showBrowser });

    return ENGINES[engine].launch({
      headless: !showBrowser,
      timeout: timeoutMs,
      args: engine === "chromium" ? [...CHROMIUM_LAUNCH_ARGS] : [],
    });
  }

  async isAvailable(): Promise<boolean> {
    // Bundled with the dependency; a missing browser download surfaces at launch
    return true;
  }
}
