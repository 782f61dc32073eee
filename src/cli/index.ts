#!/usr/bin/env node

/**
 * Design Patterns Demo CLI
 * Interactive console for browsing and running the 23 GoF pattern demos
 */

import { Command } from "commander";
import chalk from "chalk";
import { menuCommand } from "./commands/menu.js";
import { listCommand } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { createLogger } from "../utils/logger.js";
import { toError } from "../utils/errors.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("patterns-demo")
  .description("Browse and run demonstrations of the 23 GoF design patterns")
  .version("1.0.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .option("--no-clear", "Do not clear the screen between menu views")
  .action(async (options: { clear: boolean }) => {
    await menuCommand(options);
  });

program
  .command("list")
  .description("List every pattern grouped by category")
  .action(async () => {
    await listCommand();
  });

program
  .command("run <pattern>")
  .description("Run one demonstration, selected by id (e.g. factory-method) or name")
  .action(async (pattern: string) => {
    process.exitCode = await runCommand(pattern);
  });

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report an error that escaped the commands and exit
 */
function handleError(error: unknown): void {
  const failure = toError(error);
  logger.error({ err: failure }, "CLI error occurred");
  console.error(chalk.red(`Application error: ${failure.message}`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(failure.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, shutting down...`));
  process.exit(0);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
