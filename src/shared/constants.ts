/**
 * Application Constants
 *
 * Centralized configuration for magic numbers used throughout the codebase.
 * Values that operators may tune live in config/ instead.
 */

export const SERVICE_NAME = "cookie-warden";

export const SERVICE_VERSION = "0.1.0";

// --- Time Unit Conversions ---

/** Milliseconds per minute */
export const MS_PER_MINUTE = 60 * 1000;

/** Milliseconds per hour */
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

// --- Refresh Schedule ---

/** Default refresh interval (6 hours) */
export const DEFAULT_REFRESH_INTERVAL_HOURS = 6;

/** Default failure count that raises an alert */
export const DEFAULT_ALERT_THRESHOLD = 3;

/** Default first backoff delay after a failed refresh (5 minutes) */
export const DEFAULT_BACKOFF_BASE_MINUTES = 5;

/** Default backoff cap (1 hour) */
export const DEFAULT_BACKOFF_MAX_MINUTES = 60;

/** Grace period for an in-flight refresh during shutdown (15 seconds) */
export const DEFAULT_SHUTDOWN_GRACE_MS = 15_000;

/** Extra time allowed for an aborted refresh to release its browser */
export const ABORT_SETTLE_MS = 5_000;

// --- Browser Configuration ---

/** Default timeout for each browser stage (30 seconds) */
export const BROWSER_TIMEOUT_MS = 30_000;

/** Browser launch attempts before a refresh gives up */
export const BROWSER_LAUNCH_ATTEMPTS = 3;

/** Delay between browser launch attempts (5 seconds) */
export const BROWSER_LAUNCH_RETRY_DELAY_MS = 5_000;

/** Minimum jitter multiplier for retry backoff (50%) */
export const RETRY_JITTER_MIN = 0.5;

/** Maximum jitter multiplier for retry backoff (100%) */
export const RETRY_JITTER_MAX = 1.0;

/** CDP connection timeout (10 seconds) */
export const CDP_CONNECTION_TIMEOUT_MS = 10_000;

/** CDP endpoint health check timeout (2 seconds) */
export const CDP_HEALTH_CHECK_TIMEOUT_MS = 2_000;

/** Browser viewport width */
export const BROWSER_VIEWPORT_WIDTH = 1920;

/** Browser viewport height */
export const BROWSER_VIEWPORT_HEIGHT = 1080;

/** Default browser locale */
export const DEFAULT_LOCALE = "en-US";

/** Default browser user agent */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Chromium flags for running inside containers and minimal hosts */
export const CHROMIUM_LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled",
] as const;

// --- Platform Defaults (YouTube) ---

export const DEFAULT_LANDING_URL = "https://www.youtube.com/";

/** Redirects to the Google sign-in page when the session is not authenticated */
export const DEFAULT_PROBE_URL = "https://www.youtube.com/account";

export const DEFAULT_REQUIRED_COOKIES = ["SID", "LOGIN_INFO"] as const;

export const DEFAULT_COOKIE_DOMAINS = ["youtube.com", "google.com"] as const;

/** Hosts that only serve sign-in pages */
export const SIGN_IN_HOSTS = ["accounts.google.com"] as const;

/** Marker rendered only for signed-out visitors */
export const SIGNED_OUT_SELECTOR = 'a[href*="accounts.google.com/ServiceLogin"]';

// --- Storage Layout ---

export const STRUCTURED_STORE_FILE = "cookies.json";
export const FLAT_STORE_FILE = "cookies.txt";
export const LOCK_FILE = "service.lock";
export const STATE_FILE = "service-state.json";
export const DAEMON_LOG_FILE = "daemon.log";

/** Schema version written into the structured store */
export const STORE_SCHEMA_VERSION = 1;

// --- Health Check ---

/** Flat file older than this is reported as a warning */
export const HEALTH_WARNING_AGE_HOURS = 12;

/** Flat file older than this is reported as critical */
export const HEALTH_CRITICAL_AGE_HOURS = 24;

/** Fewer cookies than this means the export is probably incomplete */
export const HEALTH_MIN_COOKIE_COUNT = 5;

// --- Service Control ---

/** How long `stop` waits for the daemon to exit before SIGKILL */
export const STOP_WAIT_MS = 20_000;

/** How long `start --daemon` waits for the child to report running */
export const DAEMON_START_WAIT_MS = 15_000;

/** How long `refresh` waits for a running daemon to finish a manual refresh */
export const MANUAL_REFRESH_WAIT_MS = 180_000;

/** Poll interval for cross-process state changes */
export const STATE_POLL_INTERVAL_MS = 250;

/** Sentry flush timeout on shutdown (2 seconds) */
export const SENTRY_FLUSH_TIMEOUT_MS = 2000;
