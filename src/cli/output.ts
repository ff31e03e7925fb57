/**
 * Human-readable output for the CLI. `--json` output bypasses these.
 */

import type { HealthReport } from "../cookies/health.js";
import type { RefreshSummary, ServiceState } from "../types/index.js";

const LABEL_WIDTH = 22;

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatSummary(summary: RefreshSummary | null): string {
  if (summary === null) {
    return "never";
  }
  if (summary.outcome === "success") {
    return `success at ${summary.at} (${summary.cookieCount ?? 0} cookies, ${summary.trigger})`;
  }
  return `failed at ${summary.at} (${summary.trigger}): ${summary.errorKind ?? "Error"}: ${summary.message ?? "unknown error"}`;
}

export function formatStatus(state: ServiceState): string[] {
  const status =
    state.status === "stopped"
      ? state.stale
        ? "stopped (stale lock found)"
        : "stopped"
      : `${state.status} (pid ${state.pid ?? "?"})`;

  const lines = [row("Status", status)];
  if (state.status !== "stopped") {
    lines.push(row("Started", state.startedAt ?? "-"));
    lines.push(row("Next refresh", state.nextRunAt ?? "-"));
  }
  lines.push(row("Consecutive failures", String(state.consecutiveFailures)));
  lines.push(row("Last refresh", formatSummary(state.lastRefresh)));
  lines.push(row("Last manual refresh", formatSummary(state.lastManualRefresh)));
  return lines;
}

export function formatHealth(report: HealthReport): string[] {
  const { file } = report;
  const age = file.ageHours === null ? "" : `, ${file.ageHours} hours old`;

  const lines = [
    row("Overall", report.status.toUpperCase()),
    row("Service", report.service.status),
    row("Cookie file", `${file.path} (${file.freshness}${age})`),
  ];
  if (report.content) {
    lines.push(row("Content", report.content.message));
  }

  const section = (title: string, items: readonly string[]): void => {
    if (items.length > 0) {
      lines.push("", `${title}:`, ...items.map((item) => `  - ${item}`));
    }
  };
  section("Issues", report.issues);
  section("Warnings", report.warnings);
  section("Recommendations", report.recommendations);
  return lines;
}
