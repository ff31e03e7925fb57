/**
 * Browser Backends
 *
 * Factory for creating browser backend instances.
 */

export type {
  BrowserBackend,
  BrowserSession,
  NavigateOptions,
  NavigationOutcome,
  ProbeOptions,
  ProbeOutcome,
} from "./types.js";
export { PlaywrightBackend } from "./playwright-backend.js";
export { CdpBackend } from "./cdp-backend.js";

import type { BrowserBackend } from "./types.js";
import { PlaywrightBackend } from "./playwright-backend.js";
import { CdpBackend } from "./cdp-backend.js";
import type { BrowserConfig } from "../../config/index.js";
import { createLogger } from "../../shared/logger.js";

const logger = createLogger("BrowserBackends");

/**
 * Create the backend the configuration asks for: CDP when an endpoint is
 * set, otherwise a launched Playwright browser.
 */
export function createBrowserBackend(config: BrowserConfig): BrowserBackend {
  if (config.cdpEndpoint) {
    logger.info("Creating CDP backend", { endpoint: config.cdpEndpoint });
    return new CdpBackend(config.cdpEndpoint);
  }

  logger.info("Creating Playwright backend", { engine: config.engine });
  return new PlaywrightBackend({ engine: config.engine, showBrowser: config.showBrowser });
}
