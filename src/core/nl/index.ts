/**
 * Natural-language query translation
 *
 * @module
 */

export { NaturalLanguageTranslator, findWithBoundaries, type TranslatorOptions } from "./translator.js";
export {
  KeywordRuleSchema,
  KeywordTablesSchema,
  SortRuleSchema,
  DEFAULT_TABLES_PATH,
  defaultKeywordTables,
  loadKeywordTables,
  rulesFromTable,
  type KeywordRule,
  type KeywordTables,
  type SortRule,
} from "./keyword-tables.js";
export { findDateExpression, findSizeExpression, type Found } from "./patterns.js";
