/**
 * Browser Backend Types
 *
 * The refresher only needs a narrow capability from a browser: load
 * cookies, navigate, extract cookies, probe a protected page, close.
 * Backends bind it to Playwright's bundled browsers or to an external
 * browser reached over CDP; tests bind it to an in-process fake.
 */

import type { Cookie } from "../../types/index.js";

export interface NavigateOptions {
  readonly timeoutMs: number;
  /** Optional DOM marker that must appear before the page counts as settled */
  readonly settleSelector?: string;
}

export interface NavigationOutcome {
  readonly finalUrl: string;
  /** HTTP status of the main document; null when the browser reports none */
  readonly status: number | null;
}

export interface ProbeOptions {
  readonly timeoutMs: number;
  /** Element only rendered for signed-out visitors */
  readonly signedOutSelector: string;
}

export interface ProbeOutcome {
  readonly finalUrl: string;
  readonly status: number | null;
  readonly signedOutMarker: boolean;
}

/** One isolated browser context */
export interface BrowserSession {
  loadCookies(cookies: readonly Cookie[]): Promise<void>;
  navigate(url: string, options: NavigateOptions): Promise<NavigationOutcome>;
  extractCookies(): Promise<Cookie[]>;
  probe(url: string, options: ProbeOptions): Promise<ProbeOutcome>;
  /** Idempotent; safe to call while another call is pending */
  close(): Promise<void>;
}

export interface BrowserBackend {
  /** Backend identifier */
  readonly name: string;

  /** Launch or connect to a browser and open a fresh context */
  openSession(options: { timeoutMs: number }): Promise<BrowserSession>;

  /** Force-close every session still open */
  close(): Promise<void>;

  /** Whether the browser can be reached right now, without opening a session */
  isAvailable(): Promise<boolean>;
}
