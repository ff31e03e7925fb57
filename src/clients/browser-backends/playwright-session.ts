/**
 * Playwright Session
 *
 * BrowserSession over one Playwright BrowserContext. Closing the session
 * closes the context and then the browser connection it owns.
 */

import type { Browser, BrowserContext, Page } from "playwright";
import type { BrowserSession, NavigateOptions, NavigationOutcome, ProbeOptions, ProbeOutcome } from "./types.js";
import type { Cookie } from "../../types/index.js";
import { normalizeExpires } from "../../cookies/jar.js";
import { createLogger } from "../../shared/logger.js";

const logger = createLogger("PlaywrightSession");

export class PlaywrightSession implements BrowserSession {
  private readonly browser: Browser;
  private readonly context: BrowserContext;
  private page: Page | null = null;
  private closePromise: Promise<void> | null = null;
  private readonly onClose: (() => void) | undefined;

  constructor(browser: Browser, context: BrowserContext, onClose?: () => void) {
    this.browser = browser;
    this.context = context;
    this.onClose = onClose;
  }

  async loadCookies(cookies: readonly Cookie[]): Promise<void> {
    await this.context.addCookies(
      cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        // Playwright's marker for a session cookie
        expires: cookie.expires ?? -1,
        httpOnly: cookie.httpOnly,
        secure: cookie.secure,
        sameSite: cookie.sameSite ?? "Lax",
      }))
    );
  }

  async navigate(url: string, options: NavigateOptions): Promise<NavigationOutcome> {
    const page = await this.getPage();
    const response = await page.goto(url, { waitUntil: "load", timeout: options.timeoutMs });

    if (options.settleSelector) {
      await page.waitForSelector(options.settleSelector, {
        state: "attached",
        timeout: options.timeoutMs,
      });
    }

    return { finalUrl: page.url(), status: response?.status() ?? null };
  }

  async extractCookies(): Promise<Cookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: normalizeExpires(cookie.expires),
      secure: cookie.secure,
      httpOnly: cookie.httpOnly,
      sameSite: cookie.sameSite,
    }));
  }

  async probe(url: string, options: ProbeOptions): Promise<ProbeOutcome> {
    const page = await this.getPage();
    const response = await page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: options.timeoutMs,
    });
    const marker = await page.$(options.signedOutSelector);

    return {
      finalUrl: page.url(),
      status: response?.status() ?? null,
      signedOutMarker: marker !== null,
    };
  }

  close(): Promise<void> {
    this.closePromise ??= this.doClose();
    return this.closePromise;
  }

  private async doClose(): Promise<void> {
    this.onClose?.();
    try {
      await this.context.close();
    } catch (error) {
      logger.warn("Failed to close browser context", { error: String(error) });
    }
    await this.browser.close();
  }

  private async getPage(): Promise<Page> {
    this.page ??= await this.context.newPage();
    return this.page;
  }
}
