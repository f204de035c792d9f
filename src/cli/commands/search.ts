/**
 * search and export commands
 */

import chalk from "chalk";
import * as path from "node:path";
import type { ExportFormat, SearchMode, SearchOptions, SearchResponse, SortBy, SortOrder } from "../../types/index.js";
import { writeFile } from "../../utils/index.js";
import { openEngine, printResponse, reportError } from "./shared.js";

export interface SearchCommandOptions {
  mode: SearchMode;
  page?: number;
  pageSize?: number;
  strict?: boolean;
  sort?: SortBy;
  order?: SortOrder;
  json?: boolean;
}

export interface ExportCommandOptions extends Omit<SearchCommandOptions, "json"> {
  format: ExportFormat;
  output?: string;
}

function searchOptions(options: Omit<SearchCommandOptions, "json">): SearchOptions {
  const result: SearchOptions = { mode: options.mode };
  if (options.page !== undefined) result.page = options.page;
  if (options.pageSize !== undefined) result.pageSize = options.pageSize;
  if (options.strict) result.strict = true;
  if (options.sort !== undefined) result.sortBy = options.sort;
  if (options.order !== undefined) result.sortOrder = options.order;
  return result;
}

/**
 * Runs one query; Ctrl+C while it runs cancels it
 */
async function interruptible(run: (signal: AbortSignal) => Promise<SearchResponse>): Promise<SearchResponse> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

export async function searchCommand(words: string[], options: SearchCommandOptions): Promise<void> {
  const query = words.join(" ");
  const manager = await openEngine();

  try {
    const response = await interruptible((signal) => manager.search(query, { ...searchOptions(options), signal }));
    if (options.json) {
      console.log(JSON.stringify(response, null, 2));
    } else {
      printResponse(response);
    }
  } catch (error) {
    reportError(error, query);
    process.exitCode = 1;
  }
}

export async function exportCommand(words: string[], options: ExportCommandOptions): Promise<void> {
  const query = words.join(" ");
  const manager = await openEngine();

  try {
    // Without --page or --page-size the whole ranking is exported
    const paged = options.page !== undefined || options.pageSize !== undefined;
    const response = await interruptible((signal) =>
      paged
        ? manager.search(query, { ...searchOptions(options), signal })
        : manager.searchAll(query, { ...searchOptions(options), signal })
    );
    const rendered = manager.exportResults(response, options.format);

    if (options.output) {
      const outputPath = path.resolve(options.output);
      await writeFile(outputPath, rendered);
      console.error(
        chalk.green(`Exported ${response.items.length} of ${response.totalCount} results`),
        chalk.dim(`to ${outputPath}`)
      );
    } else {
      process.stdout.write(rendered);
    }
  } catch (error) {
    reportError(error, query);
    process.exitCode = 1;
  }
}
