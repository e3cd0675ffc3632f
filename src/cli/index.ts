#!/usr/bin/env node

/**
 * access-lens CLI
 * Command line interface for running the visibility analysis over a snapshot
 */

import { Command } from "commander";
import chalk from "chalk";
import { CancellationTokenSource } from "../utils/async.js";
import { createLogger } from "../utils/logger.js";
import { AccessLensError } from "../core/errors.js";
import { analyzeCommand, parseConcurrency, type AnalyzeCommandOptions } from "./commands/analyze.js";
import { initCommand } from "./commands/init.js";

const logger = createLogger("cli");

const cancellation = new CancellationTokenSource();

// Create the main program
const program = new Command();

program
  .name("access-lens")
  .description("Suggests the tightest access level each declaration can take")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("analyze")
  .description("Analyze a codebase snapshot and print access level suggestions")
  .argument("<snapshot>", "Path to the snapshot JSON file")
  .option("-c, --config <path>", "Path to the configuration file")
  .option("--json", "Print the report as JSON")
  .option("--concurrency <n>", "Declarations resolved in parallel", parseConcurrency)
  .option("-d, --debug", "Enable debug logging")
  .action(async (snapshot: string, options: AnalyzeCommandOptions) => {
    await analyzeCommand(snapshot, options, cancellation.token);
  });

program
  .command("init")
  .description("Write the default configuration file")
  .option("-f, --force", "Overwrite an existing configuration file")
  .action(initCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  if (error instanceof AccessLensError) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\n${error.toString()}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Signal Handlers
// =============================================================================

/**
 * First signal cancels the running analysis, a second one exits.
 */
function shutdown(signal: string): void {
  if (cancellation.token.cancelled) {
    logger.warn("Forced shutdown");
    process.exit(130);
  }

  logger.info({ signal }, "Received shutdown signal");
  console.error(chalk.dim(`\nReceived ${signal}, cancelling analysis...`));
  cancellation.cancel(`Received ${signal}`);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
