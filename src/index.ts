#!/usr/bin/env node
/**
 * cookie-warden CLI
 *
 * Usage:
 *   cookie-warden start --daemon
 *   cookie-warden import --file cookies.txt
 *   cookie-warden status
 *
 * For development with tsx:
 *   tsx src/index.ts status
 */

// Load environment variables from .env file FIRST
import "dotenv/config";

// Sentry must initialise before application code loads
import "./instrumentation.js";

import { createProgram } from "./cli/program.js";
import type { CommandContext, CommandResult } from "./cli/commands.js";
import { getConfig } from "./config/index.js";
import { ServiceManager } from "./service/service-manager.js";
import { configureLogger, createLogger } from "./shared/logger.js";
import { CookieWardenError, ValidationError, errorMessage, exitCodeFor } from "./shared/errors.js";
import { Sentry } from "./shared/tracing.js";
import { SENTRY_FLUSH_TIMEOUT_MS } from "./shared/constants.js";

const logger = createLogger("Main");

let context: CommandContext | null = null;

function getContext(): CommandContext {
  if (context === null) {
    const config = getConfig();
    configureLogger({ level: config.logLevel, logDir: config.logDir });
    context = {
      config,
      manager: new ServiceManager(config),
      print: (line) => {
        process.stdout.write(line + "\n");
      },
      exit: (code) => {
        void exitProcess(code);
      },
    };
  }
  return context;
}

async function exitProcess(code: number): Promise<never> {
  await Sentry.close(SENTRY_FLUSH_TIMEOUT_MS);
  process.exit(code);
}

function reportError(error: unknown): void {
  process.stderr.write(`Error: ${errorMessage(error)}\n`);
  if (error instanceof ValidationError) {
    process.stderr.write("Export the cookies again from a browser that is signed in, or pass --allow-incomplete.\n");
  }
  if (!(error instanceof CookieWardenError)) {
    logger.error("Unexpected error", error);
    Sentry.captureException(error);
  }
}

async function main(): Promise<void> {
  const outcome: { result: CommandResult } = { result: 0 };
  const program = createProgram(getContext, (result) => {
    outcome.result = result;
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    reportError(error);
    await exitProcess(exitCodeFor(error));
  }

  // null: a foreground service keeps the process alive until a signal
  if (outcome.result !== null) {
    await exitProcess(outcome.result);
  }
}

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", reason);
});

void main();
