/**
 * Type exports
 */

export type {
  SameSite,
  Cookie,
  ValidationStatus,
  CookieSource,
  StoreMetadata,
  CookieFormat,
  DetectedFormat,
  RefreshErrorKind,
  RefreshFailure,
  RefreshResult,
  RefreshTrigger,
  RefreshSummary,
  ServiceStatus,
  ServiceState,
} from "./cookie.js";
