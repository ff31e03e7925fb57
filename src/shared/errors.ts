/**
 * Custom Error Classes
 *
 * Structured errors for consistent handling across the application.
 */

/** Base error for cookie-warden */
export class CookieWardenError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "CookieWardenError";
    this.code = code;
    this.details = details;
  }
}

/** Invalid environment configuration */
export class ConfigError extends CookieWardenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

export type ImportFailureReason = "UNKNOWN_FORMAT" | "UNPARSEABLE" | "NO_VALID_COOKIES";

/** Import failed; terminal for that one import call */
export class ImportError extends CookieWardenError {
  readonly reason: ImportFailureReason;

  constructor(reason: ImportFailureReason, message: string, details?: Record<string, unknown>) {
    super(message, "IMPORT_ERROR", { ...details, reason });
    this.name = "ImportError";
    this.reason = reason;
  }
}

/** Input is not a cookie file we understand */
export class ImportFormatError extends ImportError {
  constructor(
    reason: Extract<ImportFailureReason, "UNKNOWN_FORMAT" | "UNPARSEABLE">,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(reason, message, details);
    this.name = "ImportFormatError";
  }
}

/** Required cookies missing or expired */
export class ValidationError extends CookieWardenError {
  readonly missing: readonly string[];
  readonly expired: readonly string[];

  constructor(message: string, missing: readonly string[] = [], expired: readonly string[] = []) {
    super(message, "VALIDATION_ERROR", { missing, expired });
    this.name = "ValidationError";
    this.missing = missing;
    this.expired = expired;
  }
}

/** Browser could not be launched or connected */
export class BrowserLaunchError extends CookieWardenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "BROWSER_LAUNCH_ERROR", details);
    this.name = "BrowserLaunchError";
  }
}

/** Page did not settle within its timeout */
export class NavigationTimeoutError extends CookieWardenError {
  readonly url: string;

  constructor(message: string, url: string, details?: Record<string, unknown>) {
    super(message, "NAVIGATION_TIMEOUT", { ...details, url });
    this.name = "NavigationTimeoutError";
    this.url = url;
  }
}

/** Page answered with an error status or failed to load */
export class NavigationError extends CookieWardenError {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null) {
    super(message, "NAVIGATION_ERROR", { url, status });
    this.name = "NavigationError";
    this.url = url;
    this.status = status;
  }
}

/** Cookies could not be read back from the browser */
export class ExtractionError extends CookieWardenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "EXTRACTION_ERROR", details);
    this.name = "ExtractionError";
  }
}

/** Work was aborted by shutdown */
export class CancelledError extends CookieWardenError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

/** Structured store exists but cannot be parsed */
export class StoreCorruptError extends CookieWardenError {
  readonly path: string;

  constructor(message: string, path: string, details?: Record<string, unknown>) {
    super(message, "STORE_CORRUPT", { ...details, path });
    this.name = "StoreCorruptError";
    this.path = path;
  }
}

/** Persisting cookies failed; previous files are untouched */
export class SaveError extends CookieWardenError {
  readonly path: string;

  constructor(message: string, path: string, details?: Record<string, unknown>) {
    super(message, "SAVE_ERROR", { ...details, path });
    this.name = "SaveError";
    this.path = path;
  }
}

/** Another instance holds the singleton lock */
export class AlreadyRunningError extends CookieWardenError {
  readonly pid: number | null;

  constructor(message: string, pid: number | null, lockPath: string) {
    super(message, "ALREADY_RUNNING", { pid, lockPath });
    this.name = "AlreadyRunningError";
    this.pid = pid;
  }
}

/** A command needed a running service and found none */
export class ServiceNotRunningError extends CookieWardenError {
  constructor(message = "Service is not running") {
    super(message, "SERVICE_NOT_RUNNING");
    this.name = "ServiceNotRunningError";
  }
}

/** CLI exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  ALREADY_RUNNING: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof AlreadyRunningError ? EXIT_CODES.ALREADY_RUNNING : EXIT_CODES.FAILURE;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Narrow an unknown error to a Node.js system error with an errno code */
export function isErrnoError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && typeof (error as NodeJS.ErrnoException).code === "string";
}
