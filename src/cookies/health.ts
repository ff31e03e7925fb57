/**
 * Cookie Health Check
 *
 * Operator-facing check of what the downstream consumer actually reads:
 * the flat cookie file. Combines file age, file content, required-cookie
 * validity and whether the service is running.
 */

import { readFile, stat } from "node:fs/promises";
import { CookieJar, matchesDomain } from "./jar.js";
import { parseNetscape } from "./netscape.js";
import { CookieImporter, type ValidationReport } from "./importer.js";
import type { ServiceState } from "../types/index.js";
import { createLogger } from "../shared/logger.js";
import { errorMessage, isErrnoError } from "../shared/errors.js";
import {
  HEALTH_CRITICAL_AGE_HOURS,
  HEALTH_MIN_COOKIE_COUNT,
  HEALTH_WARNING_AGE_HOURS,
  MS_PER_HOUR,
} from "../shared/constants.js";

const logger = createLogger("CookieHealthCheck");

export type FileFreshness = "fresh" | "warning" | "critical" | "missing" | "empty";

export type OverallHealth = "healthy" | "degraded" | "unhealthy";

export interface FlatFileCheck {
  readonly path: string;
  readonly freshness: FileFreshness;
  readonly sizeBytes: number | null;
  readonly ageHours: number | null;
  readonly lastModified: string | null;
}

export interface ContentCheck {
  readonly valid: boolean;
  readonly cookieCount: number;
  /** Configured platform domains with at least one cookie */
  readonly domainsPresent: string[];
  readonly message: string;
}

export interface HealthReport {
  readonly status: OverallHealth;
  readonly checkedAt: string;
  readonly service: ServiceState;
  readonly file: FlatFileCheck;
  readonly content: ContentCheck | null;
  readonly required: ValidationReport | null;
  readonly issues: string[];
  readonly warnings: string[];
  readonly recommendations: string[];
}

export interface CookieHealthCheckOptions {
  readonly flatPath: string;
  readonly requiredCookies: readonly string[];
  readonly cookieDomains: readonly string[];
  readonly getServiceState: () => Promise<ServiceState>;
}

export class CookieHealthCheck {
  private readonly options: CookieHealthCheckOptions;
  private readonly importer: CookieImporter;

  constructor(options: CookieHealthCheckOptions) {
    this.options = options;
    this.importer = new CookieImporter({
      requiredCookies: options.requiredCookies,
      cookieDomains: options.cookieDomains,
    });
  }

  async checkFlatFile(now: Date = new Date()): Promise<FlatFileCheck> {
    const path = this.options.flatPath;

    try {
      const info = await stat(path);
      if (info.size === 0) {
        return { path, freshness: "empty", sizeBytes: 0, ageHours: null, lastModified: info.mtime.toISOString() };
      }

      const ageHours = Math.max(0, (now.getTime() - info.mtime.getTime()) / MS_PER_HOUR);
      return {
        path,
        freshness: classifyAge(ageHours),
        sizeBytes: info.size,
        ageHours: Math.round(ageHours * 10) / 10,
        lastModified: info.mtime.toISOString(),
      };
    } catch (error) {
      if (isErrnoError(error) && error.code === "ENOENT") {
        return { path, freshness: "missing", sizeBytes: null, ageHours: null, lastModified: null };
      }
      throw error;
    }
  }

  checkContent(jar: CookieJar): ContentCheck {
    const domainsPresent = this.options.cookieDomains.filter((domain) =>
      jar.toArray().some((cookie) => matchesDomain(cookie.domain, [domain]))
    );

    if (domainsPresent.length === 0) {
      return {
        valid: false,
        cookieCount: jar.size,
        domainsPresent,
        message: `Cookie file has no cookies for ${this.options.cookieDomains.join(", ")}`,
      };
    }

    if (jar.size < HEALTH_MIN_COOKIE_COUNT) {
      return {
        valid: false,
        cookieCount: jar.size,
        domainsPresent,
        message: `Too few cookies (${jar.size})`,
      };
    }

    return {
      valid: true,
      cookieCount: jar.size,
      domainsPresent,
      message: `Cookie file holds ${jar.size} cookies`,
    };
  }

  async run(now: Date = new Date()): Promise<HealthReport> {
    const service = await this.options.getServiceState();
    const file = await this.checkFlatFile(now);

    let content: ContentCheck | null = null;
    let required: ValidationReport | null = null;
    let readFailure: string | null = null;

    if (file.freshness !== "missing" && file.freshness !== "empty") {
      try {
        const jar = new CookieJar(parseNetscape(await readFile(file.path, "utf8")).cookies);
        content = this.checkContent(jar);
        required = this.importer.validateRequiredFields(jar, now);
      } catch (error) {
        readFailure = `Cannot read cookie file: ${errorMessage(error)}`;
        logger.warn("Health check could not read cookie file", { path: file.path, error: errorMessage(error) });
      }
    }

    const issues: string[] = [];
    const warnings: string[] = [];
    const running = service.status === "running";

    if (!running) {
      warnings.push(service.stale ? "Service is not running (stale lock found)" : "Service is not running");
    }

    switch (file.freshness) {
      case "missing":
        issues.push("Cookie file does not exist");
        break;
      case "empty":
        issues.push("Cookie file is empty");
        break;
      case "critical":
        issues.push(`Cookie file is ${file.ageHours ?? "?"} hours old`);
        break;
      case "warning":
        warnings.push(`Cookie file is ${file.ageHours ?? "?"} hours old`);
        break;
      case "fresh":
        break;
    }

    if (readFailure !== null) {
      issues.push(readFailure);
    }
    if (content !== null && !content.valid) {
      issues.push(content.message);
    }
    if (required !== null && !required.ok) {
      issues.push(...required.diagnostics.filter((line) => line.startsWith("Missing") || line.startsWith("Expired")));
    }

    const status: OverallHealth =
      issues.length > 0 ? "unhealthy" : warnings.length > 0 ? "degraded" : "healthy";

    return {
      status,
      checkedAt: now.toISOString(),
      service,
      file,
      content,
      required,
      issues,
      warnings,
      recommendations: recommend(running, file, content, required),
    };
  }
}

function classifyAge(ageHours: number): FileFreshness {
  if (ageHours > HEALTH_CRITICAL_AGE_HOURS) {
    return "critical";
  }
  if (ageHours > HEALTH_WARNING_AGE_HOURS) {
    return "warning";
  }
  return "fresh";
}

function recommend(
  running: boolean,
  file: FlatFileCheck,
  content: ContentCheck | null,
  required: ValidationReport | null
): string[] {
  const recommendations: string[] = [];

  if (!running) {
    recommendations.push("Start the service: cookie-warden start --daemon");
  }
  if (file.freshness === "missing" || file.freshness === "empty") {
    recommendations.push("Import cookies: cookie-warden import --file cookies.txt");
  }
  if (file.freshness === "warning" || file.freshness === "critical") {
    recommendations.push("Refresh now: cookie-warden refresh");
  }
  if ((content !== null && !content.valid) || (required !== null && !required.ok)) {
    recommendations.push("Re-export cookies from a signed-in browser and import them");
  }

  return recommendations;
}
