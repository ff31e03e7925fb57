/**
 * Tracing Utilities
 *
 * Span helpers and alert reporting. Uses Sentry's OpenTelemetry integration
 * under the hood; every call is a no-op when Sentry is not initialised.
 */

import * as Sentry from "@sentry/node";
import { SpanStatusCode } from "@opentelemetry/api";

// Semantic conventions for span attributes
export const SPAN_ATTRIBUTES = {
  REFRESH_VALIDATED: "cookie.refresh.validated_online",
  COOKIE_COUNT: "cookie.count",
  BROWSER_BACKEND: "browser.backend",
} as const;

// Span operation names
export const SPAN_OPERATIONS = {
  SESSION_REFRESH: "session.refresh",
  SESSION_VALIDATE: "session.validate",
} as const;

export type SpanAttributeValue = string | number | boolean;

/**
 * Wrap an async operation with a span.
 *
 * @param name - Human-readable span name
 * @param op - Operation type (e.g. "session.refresh")
 * @param fn - The async function to execute
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  op: string,
  fn: (span: Sentry.Span | undefined) => Promise<T>,
  attributes?: Record<string, SpanAttributeValue>
): Promise<T> {
  return Sentry.startSpan({ name, op, attributes }, async (span) => {
    try {
      return await fn(span);
    } catch (error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
      throw error;
    }
  });
}

/**
 * Add a breadcrumb for debugging.
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = "info",
  data?: Record<string, unknown>
): void {
  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
  });
}

/**
 * Report an operator alert (repeated refresh failures).
 */
export function captureAlert(message: string, extra: Record<string, unknown>): void {
  Sentry.captureMessage(message, {
    level: "error",
    tags: { alert: "cookie-refresh" },
    extra,
  });
}

// Re-export Sentry for direct access
export { Sentry };
