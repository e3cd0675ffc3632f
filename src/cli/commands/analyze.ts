/**
 * analyze command - Run the visibility analysis over a snapshot
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import ora from "ora";
import * as path from "node:path";
import type { CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { unwrap } from "../../types/result.js";
import { loadConfig } from "../../core/config.js";
import { analyzeSnapshot } from "../../core/analyze.js";
import { loadSnapshot } from "../../core/snapshot/index.js";
import {
  presentableLevel,
  type AnalysisReport,
  type VisibilitySuggestion,
} from "../../core/visibility/index.js";

export interface AnalyzeCommandOptions {
  config?: string;
  json?: boolean;
  concurrency?: number;
  debug?: boolean;
}

/**
 * Option parser for `--concurrency`
 */
export function parseConcurrency(value: string): number {
  const concurrency = Number(value);
  if (value.trim() === "" || !Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidArgumentError("Concurrency must be a positive integer.");
  }
  return concurrency;
}

/**
 * Analyze a snapshot file and print the suggestions
 */
export async function analyzeCommand(
  snapshotPath: string,
  options: AnalyzeCommandOptions,
  token: CancellationToken
): Promise<void> {
  const logger = createLogger("analyze", { level: options.debug ? "debug" : undefined });
  logger.info({ snapshotPath, options }, "Starting analysis");

  const config = loadConfig(options.config);
  if (options.concurrency !== undefined) {
    config.analysis.concurrency = options.concurrency;
  }

  const snapshot = unwrap(loadSnapshot(path.resolve(snapshotPath)));

  const spinner = options.json ? null : ora("Resolving declarations...").start();

  let report: AnalysisReport;
  try {
    report = await analyzeSnapshot(snapshot, config, { token, logger });
  } catch (error) {
    spinner?.fail(chalk.red("Analysis failed"));
    logger.error({ err: error }, "Analysis failed");
    throw error;
  }

  if (options.json) {
    console.log(JSON.stringify(toJson(report), null, 2));
    return;
  }

  if (report.cancelled) {
    spinner?.warn(chalk.yellow("Analysis cancelled; showing completed declarations only"));
  } else {
    spinner?.succeed(chalk.green(`Analyzed ${report.stats.declarations} declarations`));
  }

  printSuggestions(report.suggestions);
  printSummary(report);
}

function printSuggestions(suggestions: readonly VisibilitySuggestion[]): void {
  if (suggestions.length === 0) {
    console.log(chalk.dim("\nNo access levels can be tightened."));
    return;
  }

  console.log();
  for (const suggestion of suggestions) {
    console.log(
      `  ${chalk.white(suggestion.declarationId)} ${chalk.dim(presentableLevel(suggestion.current) + " ->")} ${chalk.cyan(presentableLevel(suggestion.suggested))}`
    );
    console.log(chalk.dim(`    ${suggestion.message}`));
  }
}

function printSummary(report: AnalysisReport): void {
  const { stats } = report;
  console.log();
  console.log(chalk.dim("Summary:"));
  console.log(chalk.dim(`  Suggestions:  ${stats.suggestions}`));
  console.log(chalk.dim(`  Withdrawn:    ${stats.withdrawn}`));
  console.log(chalk.dim(`  Resolved:     ${stats.resolved}`));
  console.log(chalk.dim(`  Kept:         ${stats.kept}`));
  if (stats.excluded + stats.unresolvable + stats.cancelled > 0) {
    console.log(
      chalk.dim(
        `  Skipped:      ${stats.excluded} excluded, ${stats.unresolvable} unresolvable, ${stats.cancelled} cancelled`
      )
    );
  }
  console.log(chalk.dim(`  Duration:     ${stats.durationMs}ms`));
}

function toJson(report: AnalysisReport): Record<string, unknown> {
  return {
    cancelled: report.cancelled,
    stats: report.stats,
    withdrawn: report.withdrawn,
    suggestions: report.suggestions.map((suggestion) => ({
      ...suggestion,
      current: presentableLevel(suggestion.current),
      suggested: presentableLevel(suggestion.suggested),
    })),
  };
}
