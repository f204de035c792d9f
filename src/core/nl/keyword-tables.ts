/**
 * Keyword Tables
 *
 * The ordered rule list the natural-language translator matches against,
 * plus its date words, sort phrases and stopwords. The default tables live
 * in `data/keyword-tables.json` and are read once per translator.
 *
 * @module
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { SortBySchema, SortOrderSchema, validate } from "../../utils/validation.js";

export const KeywordRuleSchema = z.object({
  /** Informational only; order in the list is what matters */
  group: z.string().optional(),
  field: z.string().min(1),
  value: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
});

export const SortRuleSchema = z.object({
  pattern: z.string().min(1),
  sortBy: SortBySchema.optional(),
  sortOrder: SortOrderSchema.optional(),
});

export const KeywordTablesSchema = z.object({
  rules: z.array(KeywordRuleSchema).default([]),
  /** phrase → how many days back the window starts */
  dateKeywords: z.record(z.string(), z.number().int().nonnegative()).default({}),
  sortRules: z.array(SortRuleSchema).default([]),
  stopwords: z.array(z.string()).default([]),
});

export type KeywordRule = z.infer<typeof KeywordRuleSchema>;
export type SortRule = z.infer<typeof SortRuleSchema>;
export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

export const DEFAULT_TABLES_PATH = fileURLToPath(new URL("../../../data/keyword-tables.json", import.meta.url));

/**
 * Reads and validates a keyword tables file
 *
 * @throws {ValidationError} When the file does not match the tables schema
 */
export function loadKeywordTables(filePath: string = DEFAULT_TABLES_PATH): KeywordTables {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return validate(KeywordTablesSchema, raw, "INVALID_CONFIG", `keyword tables (${filePath})`);
}

/**
 * The bundled tables
 */
export function defaultKeywordTables(): KeywordTables {
  return loadKeywordTables(DEFAULT_TABLES_PATH);
}

/**
 * Builds rules for one field from a `{pattern: value}` table, in table order
 */
export function rulesFromTable(field: string, table: Record<string, string>, group?: string): KeywordRule[] {
  return Object.entries(table).map(([pattern, value]) => ({ group, field, value, patterns: [pattern] }));
}
