/**
 * suggest command - Completions for partially typed query text
 */

import chalk from "chalk";
import { openEngine } from "./shared.js";

export interface SuggestOptions {
  limit?: number;
}

export async function suggestCommand(words: string[], options: SuggestOptions): Promise<void> {
  const manager = await openEngine();
  const suggestions = manager.suggest(words.join(" "), options.limit);

  if (suggestions.length === 0) {
    console.log(chalk.dim("No suggestions."));
    return;
  }
  for (const suggestion of suggestions) console.log(suggestion);
}
