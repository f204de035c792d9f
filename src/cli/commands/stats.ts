/**
 * stats command - Show what the index and template store hold
 */

import chalk from "chalk";
import { getConfigDir, getIndexPath } from "../../utils/index.js";
import { openEngine } from "./shared.js";

export interface StatsOptions {
  json?: boolean;
}

export async function statsCommand(options: StatsOptions): Promise<void> {
  const manager = await openEngine();
  const stats = manager.statistics();

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log();
  console.log(chalk.cyan.bold("reel-search Status"));
  console.log(chalk.dim("─".repeat(40)));

  console.log();
  console.log(chalk.white.bold("Storage"));
  console.log(`  Config dir:   ${chalk.dim(getConfigDir())}`);
  console.log(`  Index file:   ${chalk.dim(manager.config.index.persist ? getIndexPath() : "(persistence off)")}`);

  console.log();
  console.log(chalk.white.bold("Index"));
  if (stats.index.degraded) {
    console.log(chalk.yellow("  Degraded: the saved index could not be loaded"));
  }
  console.log(`  Records:      ${chalk.cyan(stats.index.recordCount)}`);
  console.log(`  Version:      ${stats.index.version}`);
  console.log(`  Vocabulary:`);
  for (const [field, count] of Object.entries(stats.index.vocabulary)) {
    console.log(`    ${field.padEnd(12)}${count}`);
  }

  console.log();
  console.log(chalk.white.bold("Templates"));
  console.log(`  Saved:        ${stats.templates}`);
  console.log();
}
