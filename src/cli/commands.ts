/**
 * CLI Command Handlers
 *
 * Each handler returns the process exit code, or null when the process must
 * keep running (foreground service). Errors propagate to the entry point,
 * which maps them with `exitCodeFor`.
 */

import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { formatHealth, formatStatus, formatSummary } from "./output.js";
import type { Config } from "../config/index.js";
import { CookieHealthCheck } from "../cookies/health.js";
import { CookieImporter } from "../cookies/importer.js";
import { CookieStore } from "../cookies/store.js";
import { ServiceManager } from "../service/service-manager.js";
import { SingletonLock } from "../service/singleton-lock.js";
import type { CookieFormat } from "../types/index.js";
import {
  AlreadyRunningError,
  CookieWardenError,
  EXIT_CODES,
  ServiceNotRunningError,
  ValidationError,
  errorMessage,
  type ExitCode,
} from "../shared/errors.js";
import { ensureSecureDirectory, SECURE_FILE_MODE } from "../shared/file-security.js";

export interface CommandContext {
  readonly config: Config;
  readonly manager: ServiceManager;
  /** Normal output (stdout) */
  readonly print: (line: string) => void;
  /** Called once a foreground service has shut down */
  readonly exit: (code: number) => void;
}

export type CommandResult = ExitCode | null;

export function createStore(config: Config): CookieStore {
  return new CookieStore({
    structuredPath: config.storage.structuredPath,
    flatPath: config.storage.flatPath,
    requiredCookies: config.platform.requiredCookies,
  });
}

// --- Service lifecycle ---

export async function startCommand(
  ctx: CommandContext,
  options: { daemon?: boolean; foreground?: boolean }
): Promise<CommandResult> {
  if (options.daemon && !options.foreground) {
    const handle = await ctx.manager.startDaemon();
    ctx.print(`cookie-warden started in the background (pid ${handle.pid})`);
    ctx.print(`Logs: ${handle.logPath}`);
    return EXIT_CODES.SUCCESS;
  }

  ctx.manager.installSignalHandlers(ctx.exit);
  await ctx.manager.startForeground();
  const state = await ctx.manager.status();
  ctx.print(`cookie-warden running (pid ${process.pid}); next refresh at ${state.nextRunAt ?? "-"}`);
  return null;
}

export async function stopCommand(ctx: CommandContext): Promise<CommandResult> {
  try {
    const result = await ctx.manager.stopRemote();
    ctx.print(
      result.forced
        ? `cookie-warden (pid ${result.pid}) did not stop in time and was killed`
        : `Stopped cookie-warden (pid ${result.pid})`
    );
  } catch (error) {
    if (!(error instanceof ServiceNotRunningError)) {
      throw error;
    }
    ctx.print("cookie-warden is not running");
  }
  return EXIT_CODES.SUCCESS;
}

export async function restartCommand(
  ctx: CommandContext,
  options: { daemon?: boolean }
): Promise<CommandResult> {
  await stopCommand(ctx);
  return startCommand(ctx, { daemon: options.daemon, foreground: !options.daemon });
}

export async function statusCommand(ctx: CommandContext, options: { json?: boolean }): Promise<CommandResult> {
  const state = await ctx.manager.status();
  if (options.json) {
    ctx.print(JSON.stringify(state, null, 2));
  } else {
    formatStatus(state).forEach((line) => ctx.print(line));
  }
  return EXIT_CODES.SUCCESS;
}

/** Exit 1 when unhealthy; degraded still exits 0 */
export async function healthCommand(ctx: CommandContext, options: { json?: boolean }): Promise<CommandResult> {
  const { config } = ctx;
  const check = new CookieHealthCheck({
    flatPath: config.storage.flatPath,
    requiredCookies: config.platform.requiredCookies,
    cookieDomains: config.platform.cookieDomains,
    getServiceState: () => ctx.manager.status(),
  });

  const report = await check.run();
  if (options.json) {
    ctx.print(JSON.stringify(report, null, 2));
  } else {
    formatHealth(report).forEach((line) => ctx.print(line));
  }
  return report.status === "unhealthy" ? EXIT_CODES.FAILURE : EXIT_CODES.SUCCESS;
}

// --- Cookie data ---

export interface ImportCommandOptions {
  readonly file: string;
  readonly format?: CookieFormat;
  readonly allowIncomplete?: boolean;
}

/**
 * Parse and validate a cookie export, then merge it into the store under
 * the singleton lock. Imported cookies replace stored ones with the same
 * (domain, name, path).
 *
 * @throws ImportError, ValidationError, AlreadyRunningError
 */
export async function importCommand(ctx: CommandContext, options: ImportCommandOptions): Promise<CommandResult> {
  const { config } = ctx;

  let bytes: Buffer;
  try {
    bytes = await readFile(options.file);
  } catch (error) {
    throw new CookieWardenError(`Cannot read ${options.file}: ${errorMessage(error)}`, "IMPORT_READ_FAILED");
  }

  const importer = new CookieImporter({
    requiredCookies: config.platform.requiredCookies,
    cookieDomains: config.platform.cookieDomains,
  });
  const { format, jar, dropped, report } = importer.importBytes(bytes, options.format);

  if (!report.ok && !options.allowIncomplete) {
    throw new ValidationError(report.diagnostics.join(" "), report.missing, report.expired);
  }

  const lock = await acquireStoreLock(config, "importing");
  const store = createStore(config);
  try {
    const current = await store.load({ quarantineCorrupt: true });
    const merged = current.jar;
    merged.merge(jar);
    await store.save(merged, current.metadata, { kind: "import" });

    ctx.print(`Imported ${jar.size} cookies (${format}); the store now holds ${merged.size}`);
    if (dropped.length > 0) {
      ctx.print(`Skipped ${dropped.length} malformed records`);
    }
    report.diagnostics.forEach((line) => ctx.print(`Note: ${line}`));
    ctx.print(`Saved to ${store.structuredPath}`);
    ctx.print(`Cookie file: ${store.flatPath}`);
  } finally {
    await lock.release();
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Delete both cookie files under the singleton lock.
 *
 * @throws AlreadyRunningError while the service runs
 */
export async function resetCommand(ctx: CommandContext, options: { yes?: boolean }): Promise<CommandResult> {
  if (!options.yes) {
    throw new CookieWardenError("Refusing to delete the stored cookies without --yes", "CONFIRMATION_REQUIRED");
  }

  const lock = await acquireStoreLock(ctx.config, "resetting");
  try {
    const store = createStore(ctx.config);
    await store.reset();
    ctx.print(`Removed ${store.structuredPath} and ${store.flatPath}`);
  } finally {
    await lock.release();
  }
  return EXIT_CODES.SUCCESS;
}

export async function refreshCommand(ctx: CommandContext): Promise<CommandResult> {
  const summary = await ctx.manager.refresh();
  ctx.print(`Refresh ${formatSummary(summary)}`);
  return summary.outcome === "success" ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

export interface ExportCommandOptions {
  readonly out: string;
  readonly format: CookieFormat;
}

export async function exportCommand(ctx: CommandContext, options: ExportCommandOptions): Promise<CommandResult> {
  const store = createStore(ctx.config);
  const { jar } = await store.load();
  if (jar.isEmpty()) {
    throw new CookieWardenError("No cookies in the store; import cookies first", "EMPTY_STORE");
  }

  const content = options.format === "json" ? store.exportJson(jar) : store.exportFlat(jar);
  await ensureSecureDirectory(dirname(options.out));
  await writeFileAtomic(options.out, content, { mode: SECURE_FILE_MODE });

  ctx.print(`Exported ${jar.size} cookies to ${options.out} (${options.format})`);
  return EXIT_CODES.SUCCESS;
}

/** Only one writer touches the store: the service or a CLI command */
async function acquireStoreLock(config: Config, action: string): Promise<SingletonLock> {
  const lock = new SingletonLock(config.storage.lockPath);
  try {
    await lock.acquire();
  } catch (error) {
    if (error instanceof AlreadyRunningError) {
      throw new AlreadyRunningError(
        `cookie-warden is running${error.pid === null ? "" : ` (pid ${error.pid})`}; stop it before ${action}`,
        error.pid,
        config.storage.lockPath
      );
    }
    throw error;
  }
  return lock;
}
