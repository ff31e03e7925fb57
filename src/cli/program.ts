/**
 * Command-line interface definition.
 */

import { Command, InvalidArgumentError } from "commander";
import {
  exportCommand,
  healthCommand,
  importCommand,
  refreshCommand,
  resetCommand,
  restartCommand,
  startCommand,
  statusCommand,
  stopCommand,
  type CommandContext,
  type CommandResult,
} from "./commands.js";
import type { CookieFormat } from "../types/index.js";
import { SERVICE_VERSION } from "../shared/constants.js";

export function parseFormat(value: string): CookieFormat {
  if (value !== "netscape" && value !== "json") {
    throw new InvalidArgumentError("Format must be: netscape or json");
  }
  return value;
}

/**
 * Build the program. `context` is resolved lazily so `--help` works without
 * a valid configuration; `done` receives each command's result.
 */
export function createProgram(
  context: () => CommandContext,
  done: (result: CommandResult) => void
): Command {
  const program = new Command();

  program
    .name("cookie-warden")
    .description("Keeps a browser session's cookies fresh and exports them for downstream tools")
    .version(SERVICE_VERSION);

  program
    .command("start")
    .description("Start the refresh service")
    .option("-d, --daemon", "Run in the background")
    .option("--foreground", "Run in this process (used by --daemon)")
    .action(async (options: { daemon?: boolean; foreground?: boolean }) => {
      done(await startCommand(context(), options));
    });

  program
    .command("stop")
    .description("Stop the running service")
    .action(async () => {
      done(await stopCommand(context()));
    });

  program
    .command("restart")
    .description("Stop the service if it runs, then start it")
    .option("-d, --daemon", "Run in the background")
    .action(async (options: { daemon?: boolean }) => {
      done(await restartCommand(context(), options));
    });

  program
    .command("status")
    .description("Show service status")
    .option("--json", "Print JSON")
    .action(async (options: { json?: boolean }) => {
      done(await statusCommand(context(), options));
    });

  program
    .command("health")
    .description("Check the cookie file and the service")
    .option("--json", "Print JSON")
    .action(async (options: { json?: boolean }) => {
      done(await healthCommand(context(), options));
    });

  program
    .command("import")
    .description("Import cookies exported from a signed-in browser")
    .requiredOption("-f, --file <path>", "Cookie file (Netscape cookies.txt or JSON)")
    .option("--format <format>", "netscape or json (detected when omitted)", parseFormat)
    .option("--allow-incomplete", "Import even when required cookies are missing or expired")
    .action(async (options: { file: string; format?: CookieFormat; allowIncomplete?: boolean }) => {
      done(await importCommand(context(), options));
    });

  program
    .command("refresh")
    .description("Refresh now (through the running service when there is one)")
    .action(async () => {
      done(await refreshCommand(context()));
    });

  program
    .command("reset")
    .description("Delete the stored cookies (the service must be stopped)")
    .option("--yes", "Confirm the deletion")
    .action(async (options: { yes?: boolean }) => {
      done(await resetCommand(context(), options));
    });

  program
    .command("export")
    .description("Write the stored cookies to a file")
    .requiredOption("-o, --out <path>", "Output file")
    .option("--format <format>", "netscape or json", parseFormat, "netscape")
    .action(async (options: { out: string; format: CookieFormat }) => {
      done(await exportCommand(context(), options));
    });

  return program;
}
