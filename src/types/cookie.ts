/**
 * Cookie Types
 *
 * Cookie entities, store metadata and the records exchanged between the
 * refresher, scheduler and service manager.
 */

import type { CookieJar } from "../cookies/jar.js";

export type SameSite = "Strict" | "Lax" | "None";

/** One authentication cookie */
export interface Cookie {
  readonly name: string;
  readonly value: string;
  readonly domain: string;
  readonly path: string;
  /** Absolute unix time in seconds; absent for session cookies */
  readonly expires?: number;
  readonly secure: boolean;
  readonly httpOnly: boolean;
  readonly sameSite?: SameSite;
}

export type ValidationStatus = "valid" | "invalid" | "unknown";

export type CookieSource = "import" | "refresh" | "unknown";

/** Refresh bookkeeping persisted next to the cookies */
export interface StoreMetadata {
  readonly lastRefreshedAt: string | null;
  readonly lastImportAt: string | null;
  readonly refreshCount: number;
  readonly consecutiveFailures: number;
  readonly lastValidatedAt: string | null;
  readonly validationStatus: ValidationStatus;
  readonly source: CookieSource;
}

/** Formats accepted by the importer */
export type CookieFormat = "netscape" | "json";

export type DetectedFormat = CookieFormat | "unknown";

// --- Refresh ---

export type RefreshErrorKind =
  | "ValidationError"
  | "BrowserLaunchError"
  | "NavigationTimeoutError"
  | "NavigationError"
  | "ExtractionError"
  | "CancelledError"
  | "SaveError";

export interface RefreshFailure {
  readonly kind: RefreshErrorKind;
  readonly message: string;
}

/** Outcome of one refresh attempt; never persisted as-is */
export interface RefreshResult {
  readonly succeeded: boolean;
  /** Extracted jar, present only when `succeeded` */
  readonly jar: CookieJar | null;
  readonly validatedOnline: boolean;
  readonly error: RefreshFailure | null;
  readonly timestamp: string;
  readonly durationMs: number;
}

export type RefreshTrigger = "scheduled" | "manual" | "startup";

/** Compact record of an attempt, kept in the service state file */
export interface RefreshSummary {
  readonly at: string;
  readonly trigger: RefreshTrigger;
  readonly outcome: "success" | "failure";
  readonly errorKind: RefreshErrorKind | null;
  readonly message: string | null;
  readonly cookieCount: number | null;
}

// --- Service ---

export type ServiceStatus = "stopped" | "starting" | "running" | "stopping";

export interface ServiceState {
  readonly status: ServiceStatus;
  readonly pid: number | null;
  readonly startedAt: string | null;
  readonly nextRunAt: string | null;
  readonly consecutiveFailures: number;
  readonly lastRefresh: RefreshSummary | null;
  /** Result of the latest SIGUSR1-triggered refresh */
  readonly lastManualRefresh: RefreshSummary | null;
  /** Lock file names a process that is no longer alive */
  readonly stale: boolean;
}
