/**
 * init command - Write the default access-lens configuration
 */

import chalk from "chalk";
import * as path from "node:path";
import { fileExists, getConfigPath, writeJson } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import { defaultConfig } from "../../core/config.js";

const logger = createLogger("init");

export interface InitOptions {
  force?: boolean;
}

/**
 * Write `access-lens.json` into the current directory
 */
export async function initCommand(options: InitOptions): Promise<void> {
  const configPath = getConfigPath();

  logger.info({ options }, "Starting initialization");

  if (fileExists(configPath) && !options.force) {
    console.log(chalk.yellow(`${path.basename(configPath)} already exists in this project.`));
    console.log(chalk.dim("Use --force to overwrite it."));
    logger.info("Already initialized, skipping");
    return;
  }

  const config = defaultConfig();
  writeJson(configPath, config);
  logger.info({ configPath }, "Configuration saved");

  console.log(chalk.green(`Wrote ${configPath}`));
  console.log();
  console.log(chalk.dim("Configuration:"));
  console.log(chalk.dim(`  Concurrency:       ${config.analysis.concurrency}`));
  console.log(chalk.dim(`  Entry annotations: ${config.entryPoints.annotations.length}`));
  console.log(chalk.dim(`  Subclass rules:    ${config.extensibility.providers.length}`));
  console.log();
  console.log(chalk.cyan("Next step:"));
  console.log(chalk.dim("  Run"), chalk.white("access-lens analyze <snapshot.json>"));
}
