/**
 * Cookie Refresher
 *
 * Runs one refresh attempt through a browser backend:
 *
 * 1. open a session (launch retried)
 * 2. load the current jar
 * 3. visit the landing page so the platform rotates its cookies
 * 4. extract the platform's cookies
 * 5. probe a protected page in a second session holding only the new jar
 *
 * Expected failures are returned in the result, never thrown. Every session
 * is closed on every exit path; aborting the signal closes them at once.
 */

import type { BrowserBackend, BrowserSession } from "./browser-backends/index.js";
import { CookieJar } from "../cookies/jar.js";
import type { PlatformConfig } from "../config/index.js";
import type { RefreshErrorKind, RefreshResult } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { withRetry } from "../shared/retry.js";
import { isTimeoutError, withTimeout } from "../shared/timeout.js";
import { SPAN_ATTRIBUTES, SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import {
  BrowserLaunchError,
  CancelledError,
  CookieWardenError,
  ExtractionError,
  NavigationError,
  NavigationTimeoutError,
  ValidationError,
  errorMessage,
} from "../shared/errors.js";
import { BROWSER_LAUNCH_ATTEMPTS, BROWSER_LAUNCH_RETRY_DELAY_MS } from "../shared/constants.js";

const logger = createLogger("CookieRefresher");

export interface CookieRefresherOptions {
  readonly backend: BrowserBackend;
  readonly platform: PlatformConfig;
  /** Bound for each stage (launch, navigation, extraction, probe) */
  readonly timeoutMs: number;
  readonly launchAttempts?: number;
  readonly launchRetryDelayMs?: number;
  /** DOM marker the landing page must render before extraction */
  readonly settleSelector?: string;
}

export interface RefreshOptions {
  readonly signal?: AbortSignal;
}

/** Error kinds the refresher reports; anything else is an extraction failure */
const KNOWN_KINDS: Record<string, RefreshErrorKind> = {
  ValidationError: "ValidationError",
  BrowserLaunchError: "BrowserLaunchError",
  NavigationTimeoutError: "NavigationTimeoutError",
  NavigationError: "NavigationError",
  ExtractionError: "ExtractionError",
  CancelledError: "CancelledError",
};

export class CookieRefresher {
  private readonly options: CookieRefresherOptions;

  constructor(options: CookieRefresherOptions) {
    this.options = options;
  }

  /**
   * Run one refresh attempt. Resolves with the outcome; rejects only on
   * programming errors.
   */
  async refresh(jar: CookieJar, options: RefreshOptions = {}): Promise<RefreshResult> {
    const startedAt = Date.now();
    const { signal } = options;
    const sessions = new Set<BrowserSession>();

    if (jar.isEmpty()) {
      return failure(
        new ValidationError("No cookies to refresh; import cookies first"),
        startedAt
      );
    }
    if (signal?.aborted) {
      return failure(new CancelledError("Refresh cancelled before it started"), startedAt);
    }

    const onAbort = (): void => {
      logger.warn("Refresh aborted; closing browser sessions", { open: sessions.size });
      for (const session of sessions) {
        void closeQuietly(session, this.options.timeoutMs);
      }
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await withSpan(
        "Refresh cookies",
        SPAN_OPERATIONS.SESSION_REFRESH,
        async (span) => {
          const fresh = await this.harvest(jar, sessions, signal);
          const validatedOnline = await this.validate(fresh, sessions, signal);

          span?.setAttribute(SPAN_ATTRIBUTES.COOKIE_COUNT, fresh.size);
          span?.setAttribute(SPAN_ATTRIBUTES.REFRESH_VALIDATED, validatedOnline);

          logger.info("Cookies refreshed", { cookieCount: fresh.size, validatedOnline });
          return {
            succeeded: true,
            jar: fresh,
            validatedOnline,
            error: null,
            timestamp: new Date().toISOString(),
            durationMs: Date.now() - startedAt,
          };
        },
        { [SPAN_ATTRIBUTES.BROWSER_BACKEND]: this.options.backend.name }
      );
    } catch (error) {
      const classified = signal?.aborted ? new CancelledError("Refresh cancelled by shutdown") : error;
      logger.warn("Refresh attempt failed", { error: errorMessage(classified) });
      return failure(classified, startedAt);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await Promise.all([...sessions].map((session) => closeQuietly(session, this.options.timeoutMs)));
    }
  }

  /** Steps 1-4: load the jar, visit the landing page, extract */
  private async harvest(
    jar: CookieJar,
    sessions: Set<BrowserSession>,
    signal: AbortSignal | undefined
  ): Promise<CookieJar> {
    const { platform, timeoutMs, settleSelector } = this.options;
    const session = await this.openSession(sessions, signal);

    await withTimeout("load cookies", () => session.loadCookies(jar.toArray()), timeoutMs, signal);
    logger.debug("Loaded cookies into browser", { cookieCount: jar.size });

    const url = platform.landingUrl;
    let status: number | null;
    try {
      const outcome = await withTimeout(
        "navigate",
        () => session.navigate(url, { timeoutMs, settleSelector }),
        timeoutMs,
        signal
      );
      status = outcome.status;
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      if (isTimeoutError(error)) {
        throw new NavigationTimeoutError(`Landing page did not settle within ${timeoutMs}ms`, url);
      }
      throw new NavigationError(`Navigation to ${url} failed: ${errorMessage(error)}`, url, null);
    }

    if (status !== null && status >= 400) {
      throw new NavigationError(`Landing page answered HTTP ${status}`, url, status);
    }

    let extracted: CookieJar;
    try {
      const cookies = await withTimeout("extract cookies", () => session.extractCookies(), timeoutMs, signal);
      extracted = new CookieJar(cookies);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw new ExtractionError(`Cookie extraction failed: ${errorMessage(error)}`);
    }

    const fresh = extracted.filterDomains(platform.cookieDomains);
    if (fresh.isEmpty()) {
      throw new ExtractionError(`Browser returned no cookies for ${platform.cookieDomains.join(", ")}`, {
        extracted: extracted.size,
      });
    }

    await this.closeSession(session, sessions);
    return fresh;
  }

  /**
   * Step 5: a fresh session holding only the new jar must reach the
   * protected page without being sent to sign-in. Probe failures other than
   * cancellation mean "not validated", not a failed refresh.
   */
  private async validate(
    fresh: CookieJar,
    sessions: Set<BrowserSession>,
    signal: AbortSignal | undefined
  ): Promise<boolean> {
    const { platform, timeoutMs } = this.options;

    return withSpan("Validate cookies online", SPAN_OPERATIONS.SESSION_VALIDATE, async () => {
      let session: BrowserSession | null = null;
      try {
        session = await this.openSession(sessions, signal);
        const active = session;
        await withTimeout("load cookies", () => active.loadCookies(fresh.toArray()), timeoutMs, signal);

        const outcome = await withTimeout(
          "probe",
          () => active.probe(platform.probeUrl, { timeoutMs, signedOutSelector: platform.signedOutSelector }),
          timeoutMs,
          signal
        );

        const signInRedirect = isSignInUrl(outcome.finalUrl, platform.signInHosts);
        const validated =
          outcome.status !== null && outcome.status < 400 && !signInRedirect && !outcome.signedOutMarker;

        if (!validated) {
          logger.warn("Online validation failed", {
            status: outcome.status,
            finalUrl: outcome.finalUrl,
            signInRedirect,
            signedOutMarker: outcome.signedOutMarker,
          });
        }
        return validated;
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) {
          throw error;
        }
        logger.warn("Online validation could not run", { error: errorMessage(error) });
        return false;
      } finally {
        if (session) {
          await this.closeSession(session, sessions);
        }
      }
    });
  }

  /** Open a session with retries; each attempt bounded by the stage timeout */
  private async openSession(
    sessions: Set<BrowserSession>,
    signal: AbortSignal | undefined
  ): Promise<BrowserSession> {
    const { backend, timeoutMs } = this.options;
    const retryDelayMs = this.options.launchRetryDelayMs ?? BROWSER_LAUNCH_RETRY_DELAY_MS;

    try {
      const session = await withRetry(
        async () => {
          const pending = backend.openSession({ timeoutMs });
          try {
            return await withTimeout("browser launch", () => pending, timeoutMs, signal);
          } catch (error) {
            // A launch that completes after its deadline still has to be closed
            void pending.then(
              (late) => closeQuietly(late, timeoutMs),
              () => undefined
            );
            throw error;
          }
        },
        {
          maxRetries: (this.options.launchAttempts ?? BROWSER_LAUNCH_ATTEMPTS) - 1,
          baseDelayMs: retryDelayMs,
          maxDelayMs: retryDelayMs,
          shouldRetry: (error) => !(error instanceof CancelledError),
          signal,
          operation: `${backend.name} browser launch`,
        }
      );
      sessions.add(session);
      return session;
    } catch (error) {
      if (error instanceof CancelledError || error instanceof BrowserLaunchError) {
        throw error;
      }
      throw new BrowserLaunchError(`Browser launch failed: ${errorMessage(error)}`, {
        backend: backend.name,
      });
    }
  }

  private async closeSession(session: BrowserSession, sessions: Set<BrowserSession>): Promise<void> {
    sessions.delete(session);
    await closeQuietly(session, this.options.timeoutMs);
  }
}

function failure(error: unknown, startedAt: number): RefreshResult {
  return {
    succeeded: false,
    jar: null,
    validatedOnline: false,
    error: { kind: errorKind(error), message: errorMessage(error) },
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - startedAt,
  };
}

function errorKind(error: unknown): RefreshErrorKind {
  if (error instanceof CookieWardenError) {
    return KNOWN_KINDS[error.name] ?? "ExtractionError";
  }
  return "ExtractionError";
}

function isSignInUrl(url: string, signInHosts: readonly string[]): boolean {
  try {
    return signInHosts.includes(new URL(url).hostname);
  } catch {
    return false;
  }
}

/** A browser that never acknowledges the close is abandoned after `timeoutMs` */
async function closeQuietly(session: BrowserSession, timeoutMs: number): Promise<void> {
  try {
    await withTimeout("browser session close", () => session.close(), timeoutMs);
  } catch (error) {
    logger.warn("Failed to close browser session", { error: errorMessage(error) });
  }
}
