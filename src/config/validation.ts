/**
 * Configuration Validation
 *
 * Zod schema for the COOKIE_WARDEN_* environment variables. Every default and
 * rule lives here; invalid values are reported, never replaced.
 *
 * This module does not use the logger (the logger is configured from the
 * result of this validation). Errors are thrown to the caller.
 */

import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import {
  BROWSER_TIMEOUT_MS,
  DEFAULT_ALERT_THRESHOLD,
  DEFAULT_BACKOFF_BASE_MINUTES,
  DEFAULT_BACKOFF_MAX_MINUTES,
  DEFAULT_COOKIE_DOMAINS,
  DEFAULT_LANDING_URL,
  DEFAULT_PROBE_URL,
  DEFAULT_REFRESH_INTERVAL_HOURS,
  DEFAULT_REQUIRED_COOKIES,
  DEFAULT_SHUTDOWN_GRACE_MS,
} from "../shared/constants.js";

export const LOG_LEVEL_NAMES = ["DEBUG", "INFO", "WARN", "ERROR"] as const;
export const BROWSER_ENGINES = ["chromium", "firefox", "webkit"] as const;

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

/** Blank variables count as unset */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(blankToUndefined, schema.optional());

/** Blank or unset variables take the default */
const withDefault = <T extends z.ZodTypeAny>(schema: T, value: z.input<T>) =>
  z.preprocess(blankToUndefined, schema.default(value));

const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), {
    message: "must be one of true/false, 1/0, yes/no, on/off",
  })
  .transform((value) => TRUE_VALUES.has(value));

const numberInRange = (min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: "must be a number" })
    .finite()
    .min(min, { message: `must be >= ${min}` })
    .max(max, { message: `must be <= ${max}` });

const integerInRange = (min: number, max: number) => numberInRange(min, max).int();

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.string()).min(1, { message: "must list at least one value" }));

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" });

export const envSchema = z
  .object({
    NODE_ENV: optional(z.enum(["development", "production", "test"])),
    COOKIE_WARDEN_LOG_LEVEL: optional(
      z
        .string()
        .transform((value) => value.trim().toUpperCase())
        .pipe(z.enum(LOG_LEVEL_NAMES))
    ),
    COOKIE_WARDEN_LOG_DIR: optional(z.string()),
    COOKIE_WARDEN_STORE_DIR: optional(z.string()),
    COOKIE_WARDEN_FLAT_PATH: optional(z.string()),
    COOKIE_WARDEN_REFRESH_INTERVAL_HOURS: withDefault(numberInRange(1, 24), DEFAULT_REFRESH_INTERVAL_HOURS),
    COOKIE_WARDEN_REFRESH_ON_START: withDefault(booleanFlag, "false"),
    COOKIE_WARDEN_BROWSER: withDefault(
      z
        .string()
        .transform((value) => value.trim().toLowerCase())
        .pipe(z.enum(BROWSER_ENGINES)),
      "chromium"
    ),
    COOKIE_WARDEN_CDP_ENDPOINT: optional(httpUrl),
    COOKIE_WARDEN_SHOW_BROWSER: withDefault(booleanFlag, "false"),
    COOKIE_WARDEN_BROWSER_TIMEOUT_MS: withDefault(integerInRange(1000, 300_000), BROWSER_TIMEOUT_MS),
    COOKIE_WARDEN_ALERT_THRESHOLD: withDefault(integerInRange(1, 1000), DEFAULT_ALERT_THRESHOLD),
    COOKIE_WARDEN_BACKOFF_BASE_MINUTES: withDefault(numberInRange(0.1, 24 * 60), DEFAULT_BACKOFF_BASE_MINUTES),
    COOKIE_WARDEN_BACKOFF_MAX_MINUTES: withDefault(numberInRange(0.1, 7 * 24 * 60), DEFAULT_BACKOFF_MAX_MINUTES),
    COOKIE_WARDEN_SHUTDOWN_GRACE_MS: withDefault(integerInRange(0, 600_000), DEFAULT_SHUTDOWN_GRACE_MS),
    COOKIE_WARDEN_LANDING_URL: withDefault(httpUrl, DEFAULT_LANDING_URL),
    COOKIE_WARDEN_PROBE_URL: withDefault(httpUrl, DEFAULT_PROBE_URL),
    COOKIE_WARDEN_REQUIRED_COOKIES: withDefault(commaList, DEFAULT_REQUIRED_COOKIES.join(",")),
    COOKIE_WARDEN_COOKIE_DOMAINS: withDefault(commaList, DEFAULT_COOKIE_DOMAINS.join(",")),
    COOKIE_WARDEN_SENTRY_DSN: optional(z.string().url()),
  })
  .superRefine((env, ctx) => {
    if (env.COOKIE_WARDEN_BACKOFF_MAX_MINUTES < env.COOKIE_WARDEN_BACKOFF_BASE_MINUTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COOKIE_WARDEN_BACKOFF_MAX_MINUTES"],
        message: "must be >= COOKIE_WARDEN_BACKOFF_BASE_MINUTES",
      });
    }
  });

export type ValidatedEnv = z.output<typeof envSchema>;

/**
 * Validate raw environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const problems = result.error.issues.map((issue) => {
    const variable = issue.path.join(".") || "environment";
    return `${variable}: ${issue.message}`;
  });

  throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`, { problems });
}

/**
 * Resolve a user-supplied path, expanding a leading "~".
 */
export function resolvePath(value: string, base: string = process.cwd()): string {
  if (value === "~") {
    return homedir();
  }
  if (value.startsWith("~/")) {
    return join(homedir(), value.slice(2));
  }
  return isAbsolute(value) ? value : resolve(base, value);
}
