/**
 * ingest command - Add or replace records from a JSON file
 *
 * The file holds an array of media records, or `{ "records": [...] }`.
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import { ValidationError } from "../../core/errors.js";
import { readJsonFile } from "../../utils/index.js";
import { getCliLogger, openEngine } from "./shared.js";

export interface IngestOptions {
  delete?: boolean;
}

function recordsOf(data: unknown, file: string): unknown[] {
  if (Array.isArray(data)) return data;
  if (typeof data === "object" && data !== null && "records" in data && Array.isArray(data.records)) {
    return data.records;
  }
  throw new ValidationError("INVALID_RECORD", `${file} must hold an array of records or { "records": [...] }`);
}

function idOf(entry: unknown): string | undefined {
  if (typeof entry === "string") return entry;
  if (typeof entry === "object" && entry !== null && "id" in entry && typeof entry.id === "string") {
    return entry.id;
  }
  return undefined;
}

export async function ingestCommand(file: string, options: IngestOptions): Promise<void> {
  const logger = getCliLogger();
  const filePath = path.resolve(file);
  const data = await readJsonFile(filePath);
  if (data === null) {
    console.error(chalk.red(`File not found: ${filePath}`));
    process.exitCode = 1;
    return;
  }

  const entries = recordsOf(data, filePath);
  const manager = await openEngine();
  logger.info({ file: filePath, count: entries.length, delete: options.delete ?? false }, "Ingesting");

  const spinner = ora(`Applying ${entries.length} records...`).start();
  let outcomes: PromiseSettledResult<void>[];
  try {
    outcomes = await Promise.allSettled(
      entries.map(async (entry) => {
        if (!options.delete) return manager.onRecordCreated(entry);
        const id = idOf(entry);
        if (id === undefined) throw new ValidationError("INVALID_RECORD", "Entry has no string id");
        await manager.onRecordDeleted(id);
      })
    );
    spinner.text = "Saving index...";
    await manager.save();
    spinner.succeed(chalk.green("Index saved"));
  } catch (error) {
    spinner.fail(chalk.red("Ingest failed"));
    logger.error({ err: error }, "Ingest failed");
    throw error;
  }

  let failed = 0;
  outcomes.forEach((outcome, i) => {
    if (outcome.status === "fulfilled") return;
    failed += 1;
    const reason: unknown = outcome.reason;
    const message = reason instanceof Error ? reason.message : String(reason);
    console.error(chalk.yellow(`  #${i + 1} (${idOf(entries[i]) ?? "no id"}): ${message}`));
  });

  const succeeded = entries.length - failed;
  const verb = options.delete ? "Removed" : "Indexed";
  console.log(chalk.green(`${verb} ${succeeded} record${succeeded === 1 ? "" : "s"}`), chalk.dim(`from ${filePath}`));
  if (failed > 0) {
    console.log(chalk.yellow(`${failed} entr${failed === 1 ? "y was" : "ies were"} rejected`));
    process.exitCode = 1;
  }
  console.log(chalk.dim(`Index now holds ${manager.index.statistics().recordCount} records.`));
}
