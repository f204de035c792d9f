#!/usr/bin/env node

/**
 * reel-search CLI
 * Query, export and manage templates for a local media-metadata index
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { ingestCommand } from "./commands/ingest.js";
import { exportCommand, searchCommand } from "./commands/search.js";
import { suggestCommand } from "./commands/suggest.js";
import {
  templateDeleteCommand,
  templateListCommand,
  templateRunCommand,
  templateSaveCommand,
  templateShowCommand,
} from "./commands/template.js";
import { statsCommand } from "./commands/stats.js";
import { getCliLogger, parsePositiveInt, reportError } from "./commands/shared.js";

const SEARCH_MODES = ["auto", "nl", "boolean"];
const SORT_KEYS = ["relevance", "date", "name", "size", "type"];
const SORT_ORDERS = ["asc", "desc"];

// Create the main program
const program = new Command();

program
  .name("reel-search")
  .description("Search a media-metadata index with natural language or boolean queries")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

/**
 * Options every query-running command takes
 */
function withQueryOptions(command: Command): Command {
  return command
    .addOption(new Option("-m, --mode <mode>", "query language").choices(SEARCH_MODES).default("auto"))
    .option("-p, --page <n>", "1-based result page", parsePositiveInt)
    .option("-n, --page-size <n>", "results per page", parsePositiveInt)
    .option("--strict", "reject unknown fields and invalid values instead of matching nothing")
    .addOption(new Option("-s, --sort <key>", "sort key").choices(SORT_KEYS))
    .addOption(new Option("-o, --order <order>", "sort order").choices(SORT_ORDERS));
}

// =============================================================================
// Commands
// =============================================================================

program
  .command("ingest")
  .description("Index the media records in a JSON file")
  .argument("<file>", "JSON array of records, or { \"records\": [...] }")
  .option("-d, --delete", "remove the listed records instead of indexing them")
  .action(ingestCommand);

withQueryOptions(
  program.command("search").description("Run a query").argument("<query...>", "query text")
)
  .option("--json", "print the raw response as JSON")
  .action(searchCommand);

withQueryOptions(
  program.command("export").description("Write query results as JSON or CSV").argument("<query...>", "query text")
)
  .addOption(new Option("-f, --format <format>", "output format").choices(["json", "csv"]).default("csv"))
  .option("--output <file>", "write to a file instead of stdout")
  .action(exportCommand);

program
  .command("suggest")
  .description("Complete partially typed query text")
  .argument("<partial...>", "text typed so far")
  .option("-l, --limit <n>", "most suggestions shown", parsePositiveInt)
  .action(suggestCommand);

const template = program.command("template").description("Manage saved search templates");

template
  .command("save")
  .description("Save a template from a natural-language query or --criteria JSON")
  .argument("<name>", "template name")
  .argument("[query...]", "natural-language query to translate")
  .option("-c, --criteria <json>", "search criteria as JSON")
  .option("--description <text>", "what the template is for")
  .option("-f, --force", "replace an existing template of the same name")
  .action(templateSaveCommand);

template.command("list").description("List saved templates").action(templateListCommand);

template
  .command("show")
  .description("Print a template as JSON")
  .argument("<name>", "template name")
  .action(templateShowCommand);

template
  .command("delete")
  .description("Delete a template")
  .argument("<name>", "template name")
  .action(templateDeleteCommand);

template
  .command("run")
  .description("Run a saved template")
  .argument("<name>", "template name")
  .option("-p, --page <n>", "1-based result page", parsePositiveInt)
  .option("-n, --page-size <n>", "results per page", parsePositiveInt)
  .option("--json", "print the raw response as JSON")
  .action(templateRunCommand);

program
  .command("stats")
  .description("Show index and template statistics")
  .option("--json", "print statistics as JSON")
  .action(statsCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

process.on("unhandledRejection", (reason) => {
  getCliLogger().error({ reason }, "Unhandled promise rejection");
  reportError(reason);
  process.exitCode = 1;
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error);
  process.exitCode = 1;
});
