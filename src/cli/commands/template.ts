/**
 * template commands - Save, inspect and run named search criteria
 */

import chalk from "chalk";
import type { SearchCriteriaInput } from "../../types/index.js";
import { ValidationError } from "../../core/errors.js";
import { SearchCriteriaSchema, validate } from "../../utils/validation.js";
import { openEngine, printResponse, reportError } from "./shared.js";

export interface TemplateSaveOptions {
  criteria?: string;
  description?: string;
  force?: boolean;
}

export interface TemplateRunOptions {
  page?: number;
  pageSize?: number;
  json?: boolean;
}

function parseCriteria(text: string): SearchCriteriaInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      "INVALID_CRITERIA",
      `--criteria is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return validate(SearchCriteriaSchema, parsed, "INVALID_CRITERIA", "--criteria");
}

/**
 * Saves either `--criteria` JSON or the criteria a natural-language query
 * translates to
 */
export async function templateSaveCommand(name: string, words: string[], options: TemplateSaveOptions): Promise<void> {
  try {
    const manager = await openEngine();
    let criteria: SearchCriteriaInput;
    if (options.criteria !== undefined) {
      criteria = parseCriteria(options.criteria);
    } else if (words.length > 0) {
      criteria = manager.translate(words.join(" "));
    } else {
      throw new ValidationError("INVALID_CRITERIA", "Give a query or --criteria <json>");
    }

    const saveOptions: { description?: string; overwrite?: boolean } = { overwrite: options.force ?? false };
    if (options.description !== undefined) saveOptions.description = options.description;
    const template = await manager.saveTemplate(name, criteria, saveOptions);

    console.log(chalk.green(`Saved template "${template.name}"`));
    console.log(chalk.dim(JSON.stringify(template.criteria)));
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export async function templateListCommand(): Promise<void> {
  const manager = await openEngine();
  const names = await manager.listTemplates();
  if (names.length === 0) {
    console.log(chalk.dim("No templates saved."));
    return;
  }
  for (const name of names) {
    const template = await manager.getTemplate(name);
    const description = template.description ? chalk.dim(` - ${template.description}`) : "";
    console.log(`${chalk.cyan(name)}${description}`, chalk.dim(`(used ${template.useCount}×)`));
  }
}

export async function templateShowCommand(name: string): Promise<void> {
  try {
    const manager = await openEngine();
    console.log(JSON.stringify(await manager.getTemplate(name), null, 2));
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export async function templateDeleteCommand(name: string): Promise<void> {
  try {
    const manager = await openEngine();
    await manager.deleteTemplate(name);
    console.log(chalk.green(`Deleted template "${name}"`));
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export async function templateRunCommand(name: string, options: TemplateRunOptions): Promise<void> {
  try {
    const manager = await openEngine();
    const runOptions: { page?: number; pageSize?: number } = {};
    if (options.page !== undefined) runOptions.page = options.page;
    if (options.pageSize !== undefined) runOptions.pageSize = options.pageSize;

    const response = await manager.searchTemplate(name, runOptions);
    if (options.json) {
      console.log(JSON.stringify(response, null, 2));
    } else {
      printResponse(response);
    }
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}
