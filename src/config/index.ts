/**
 * Configuration
 *
 * Environment-based configuration with validation.
 * All environment variables are prefixed with COOKIE_WARDEN_.
 * Rules and defaults are declared in ./validation.ts.
 */

import { join } from "node:path";
import { validateEnv, resolvePath, type LOG_LEVEL_NAMES, type BROWSER_ENGINES } from "./validation.js";
import {
  DAEMON_LOG_FILE,
  FLAT_STORE_FILE,
  LOCK_FILE,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  SIGN_IN_HOSTS,
  SIGNED_OUT_SELECTOR,
  STATE_FILE,
  STRUCTURED_STORE_FILE,
} from "../shared/constants.js";

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type BrowserEngine = (typeof BROWSER_ENGINES)[number];

export type NodeEnv = "development" | "production" | "test";

export interface BrowserConfig {
  /** Playwright engine launched when no CDP endpoint is set */
  readonly engine: BrowserEngine;
  /** Connect to an already running CDP browser instead of launching one */
  readonly cdpEndpoint: string | undefined;
  /** Show the browser window (debugging) */
  readonly showBrowser: boolean;
  /** Timeout for each browser stage */
  readonly timeoutMs: number;
}

export interface RecoveryConfig {
  readonly alertThreshold: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface PlatformConfig {
  /** Page visited to let the platform rotate its cookies */
  readonly landingUrl: string;
  /** Page that only renders for a signed-in session */
  readonly probeUrl: string;
  /** Cookie names that must be present and unexpired */
  readonly requiredCookies: readonly string[];
  /** Domains whose cookies are kept after extraction */
  readonly cookieDomains: readonly string[];
  readonly signInHosts: readonly string[];
  readonly signedOutSelector: string;
}

export interface StoragePaths {
  readonly storeDir: string;
  readonly structuredPath: string;
  readonly flatPath: string;
  readonly lockPath: string;
  readonly statePath: string;
  readonly daemonLogPath: string;
}

export interface Config {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
  readonly logDir: string;
  readonly storage: StoragePaths;
  readonly refreshIntervalMs: number;
  readonly refreshOnStart: boolean;
  readonly shutdownGraceMs: number;
  readonly browser: BrowserConfig;
  readonly recovery: RecoveryConfig;
  readonly platform: PlatformConfig;
  readonly sentryDsn: string | undefined;
}

let cachedConfig: Config | null = null;

/**
 * Get application configuration.
 * Configuration is cached after first load.
 *
 * @throws ConfigError when any variable is invalid
 */
export function getConfig(): Config {
  cachedConfig ??= loadConfig(process.env);
  return cachedConfig;
}

/**
 * Build configuration from an environment map without caching.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const validated = validateEnv(env);
  const nodeEnv = validated.NODE_ENV ?? "development";

  const storeDir = resolvePath(validated.COOKIE_WARDEN_STORE_DIR ?? "~/.cookie-warden");

  return {
    nodeEnv,
    logLevel: validated.COOKIE_WARDEN_LOG_LEVEL ?? defaultLogLevel(nodeEnv),
    logDir: resolvePath(validated.COOKIE_WARDEN_LOG_DIR ?? join(storeDir, "logs")),
    storage: {
      storeDir,
      structuredPath: join(storeDir, STRUCTURED_STORE_FILE),
      flatPath: resolvePath(validated.COOKIE_WARDEN_FLAT_PATH ?? join(storeDir, FLAT_STORE_FILE)),
      lockPath: join(storeDir, LOCK_FILE),
      statePath: join(storeDir, STATE_FILE),
      daemonLogPath: join(storeDir, DAEMON_LOG_FILE),
    },
    refreshIntervalMs: validated.COOKIE_WARDEN_REFRESH_INTERVAL_HOURS * MS_PER_HOUR,
    refreshOnStart: validated.COOKIE_WARDEN_REFRESH_ON_START,
    shutdownGraceMs: validated.COOKIE_WARDEN_SHUTDOWN_GRACE_MS,
    browser: {
      engine: validated.COOKIE_WARDEN_BROWSER,
      cdpEndpoint: validated.COOKIE_WARDEN_CDP_ENDPOINT,
      showBrowser: validated.COOKIE_WARDEN_SHOW_BROWSER,
      timeoutMs: validated.COOKIE_WARDEN_BROWSER_TIMEOUT_MS,
    },
    recovery: {
      alertThreshold: validated.COOKIE_WARDEN_ALERT_THRESHOLD,
      baseDelayMs: Math.round(validated.COOKIE_WARDEN_BACKOFF_BASE_MINUTES * MS_PER_MINUTE),
      maxDelayMs: Math.round(validated.COOKIE_WARDEN_BACKOFF_MAX_MINUTES * MS_PER_MINUTE),
    },
    platform: {
      landingUrl: validated.COOKIE_WARDEN_LANDING_URL,
      probeUrl: validated.COOKIE_WARDEN_PROBE_URL,
      requiredCookies: validated.COOKIE_WARDEN_REQUIRED_COOKIES,
      cookieDomains: validated.COOKIE_WARDEN_COOKIE_DOMAINS,
      signInHosts: SIGN_IN_HOSTS,
      signedOutSelector: SIGNED_OUT_SELECTOR,
    },
    sentryDsn: validated.COOKIE_WARDEN_SENTRY_DSN,
  };
}

/** DEBUG in development, INFO in production, WARN under test */
function defaultLogLevel(nodeEnv: NodeEnv): LogLevel {
  switch (nodeEnv) {
    case "production":
      return "INFO";
    case "test":
      return "WARN";
    default:
      return "DEBUG";
  }
}

