/**
 * Structured Logger
 *
 * Plain-text lines on stderr plus a daily log file, so operators can
 * reconstruct the refresh history without extra instrumentation:
 *
 *   [2026-01-01T00:00:00.000Z] INFO  [CookieScheduler] Refresh attempt finished {"event":"refresh",...}
 *
 * Integrates with OpenTelemetry to include trace IDs in log entries
 * when a span is active.
 */

import { appendFileSync, mkdirSync, existsSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { trace } from "@opentelemetry/api";
import type { LogLevel } from "../config/index.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export type LogContext = Record<string, unknown>;

export interface LoggerSettings {
  readonly level: LogLevel;
  /** Directory for daily log files; null disables file output */
  readonly logDir: string | null;
  /** Mirror entries on stderr */
  readonly console: boolean;
}

let settings: LoggerSettings = {
  level: levelFromEnv(),
  logDir: null,
  console: true,
};

/**
 * Apply logger settings. Call once at startup, after configuration loads.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

/**
 * Level before configuration is loaded. Tolerant of bad values: config
 * validation reports those separately.
 */
function levelFromEnv(): LogLevel {
  const value = process.env.COOKIE_WARDEN_LOG_LEVEL?.toUpperCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  if (process.env.NODE_ENV === "test") {
    return "WARN";
  }
  return process.env.NODE_ENV === "production" ? "INFO" : "DEBUG";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get current trace context for log correlation.
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const spanContext = activeSpan.spanContext();
    return {
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
    };
  }
  return {};
}

/**
 * Set secure permissions on a path (Unix only).
 * Kept local so the logger does not import file-security (which logs).
 */
function setSecurePermissions(path: string, mode: number): void {
  if (process.platform === "win32") {
    return;
  }

  try {
    chmodSync(path, mode);
  } catch {
    // Permission errors must not break logging
  }
}

/** Get the log file path for today */
function getLogFilePath(logDir: string): string {
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
    setSecurePermissions(logDir, 0o700);
  }

  const today = new Date().toISOString().split("T")[0]; // YYYY-MM-DD
  return join(logDir, `cookie-warden-${today}.log`);
}

/** Write to log file (fire-and-forget) */
function writeToFile(logDir: string, entry: string): void {
  try {
    const logPath = getLogFilePath(logDir);
    const isNewFile = !existsSync(logPath);
    appendFileSync(logPath, entry + "\n");

    if (isNewFile) {
      setSecurePermissions(logPath, 0o600);
    }
  } catch {
    // A full disk or missing directory must not take the service down
  }
}

/**
 * Format log entry for human-readable output (console + file).
 */
export function formatLogEntry(
  timestamp: string,
  level: LogLevel,
  context: string,
  message: string,
  data?: LogContext
): string {
  const dataStr = data && Object.keys(data).length > 0 ? ` ${safeStringify(data)}` : "";
  return `[${timestamp}] ${level.padEnd(5)} [${context}] ${message}${dataStr}`;
}

function safeStringify(data: LogContext): string {
  try {
    return JSON.stringify(data);
  } catch {
    return '"[unserializable]"';
  }
}

export class Logger {
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  debug(message: string, data?: LogContext): void {
    this.log("DEBUG", message, data);
  }

  info(message: string, data?: LogContext): void {
    this.log("INFO", message, data);
  }

  warn(message: string, data?: LogContext): void {
    this.log("WARN", message, data);
  }

  error(message: string, error?: unknown, data?: LogContext): void {
    const errorData: LogContext = { ...data };

    if (error instanceof Error) {
      errorData.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined && error !== null) {
      errorData.error =
        typeof error === "object"
          ? safeStringify({ value: error })
          : String(error as string | number | boolean);
    }

    this.log("ERROR", message, errorData);
  }

  private log(level: LogLevel, message: string, data?: LogContext): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[settings.level]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const traceContext = getTraceContext();

    const tracePrefix = traceContext.traceId ? ` [${traceContext.traceId.slice(0, 8)}]` : "";
    const plainText = formatLogEntry(timestamp, level, this.context + tracePrefix, message, data);

    if (settings.console) {
      process.stderr.write(plainText + "\n");
    }

    if (settings.logDir) {
      writeToFile(settings.logDir, plainText);
    }
  }
}

/**
 * Create a logger for a specific context.
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
