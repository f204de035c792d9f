/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { SearchEngineError } from "../../core/errors.js";
import { SearchManager } from "../../core/search/search-manager.js";
import type { SearchResponse } from "../../types/index.js";
import { createLogger, getLogsDir, getProjectRoot, type Logger } from "../../utils/index.js";

let cliLogger: Logger | undefined;

/**
 * CLI logs go to `.reel-search/logs/` so they never mix with command output
 */
export function getCliLogger(): Logger {
  cliLogger ??= createLogger("cli", { logDir: getLogsDir() });
  return cliLogger;
}

export async function openEngine(): Promise<SearchManager> {
  const logger = getCliLogger();
  const manager = await SearchManager.open(getProjectRoot(), { logger });
  if (manager.index.degraded) {
    console.error(chalk.yellow("Warning: the saved index could not be loaded; starting from an empty index."));
  }
  return manager;
}

/**
 * commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? "B"}`;
}

export function printResponse(response: SearchResponse): void {
  const first = (response.page - 1) * response.pageSize + 1;
  const last = first + response.items.length - 1;

  console.log();
  if (response.totalCount === 0) {
    console.log(chalk.yellow("No results."));
  } else {
    console.log(
      chalk.cyan.bold(`${response.totalCount} result${response.totalCount === 1 ? "" : "s"}`),
      chalk.dim(`(showing ${first}-${last}, ${response.mode} mode, ${response.elapsedMs.toFixed(1)} ms)`)
    );
  }
  if (response.degraded) {
    console.log(chalk.yellow("Index is degraded; results may be incomplete."));
  }
  console.log(chalk.dim("─".repeat(40)));

  response.items.forEach((item, i) => {
    const { record } = item;
    console.log(
      `${chalk.dim(`${first + i}.`.padStart(4))} ${chalk.white.bold(record.title || record.id)}`,
      chalk.dim(`[${record.id}]`),
      chalk.green(item.score.toFixed(2))
    );
    const details = [record.fileType, formatBytes(record.fileSizeBytes), record.createdAt.slice(0, 10)];
    if (record.mood) details.push(record.mood);
    console.log(`     ${chalk.dim(details.join(" · "))}`);
    if (record.path) console.log(`     ${chalk.dim(record.path)}`);
    if (item.matchedFields.length > 0) {
      console.log(`     ${chalk.dim("matched:")} ${item.matchedFields.join(", ")}`);
    }
  });

  const facetLines: string[] = [];
  for (const [field, values = []] of Object.entries(response.facets)) {
    if (values.length === 0) continue;
    facetLines.push(`  ${field}: ${values.map((v) => `${v.value} (${v.count})`).join(", ")}`);
  }
  if (facetLines.length > 0) {
    console.log();
    console.log(chalk.white.bold("Facets"));
    for (const line of facetLines) console.log(line);
  }

  if (response.suggestions.length > 0) {
    console.log();
    console.log(chalk.dim("Did you mean:"), response.suggestions.join(", "));
  }
}

/**
 * Prints an error; query errors get a caret under the offending offset
 */
export function reportError(error: unknown, query?: string): void {
  if (error instanceof SearchEngineError) {
    getCliLogger().debug({ err: error }, "Command failed");
    console.error(chalk.red(`\n${error.name}: ${error.message}`));
    if (query !== undefined && error.position !== undefined) {
      console.error(chalk.dim(`  ${query}`));
      console.error(chalk.red(`  ${" ".repeat(error.position)}^`));
    }
    return;
  }
  getCliLogger().error({ err: error }, "Unexpected CLI error");
  console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
}
