/**
 * Boolean query language: analysis, lexing and parsing
 *
 * @module
 */

import type { QueryNode } from "../../types/index.js";
import type { Result } from "../../types/result.js";
import type { LexError, ParseError } from "../errors.js";
import { Analyzer } from "./analyzer.js";
import { Lexer } from "./lexer.js";
import { parse } from "./parser.js";

export { Analyzer, normalizeText, isCjk, type Segmenter, type AnalyzerOptions } from "./analyzer.js";
export { Lexer, tokenize } from "./lexer.js";
export { parse } from "./parser.js";

/**
 * Raw query text straight to an AST
 */
export function parseQuery(raw: string, analyzer: Analyzer = new Analyzer()): Result<QueryNode, LexError | ParseError> {
  const tokens = new Lexer(analyzer).tokenize(raw);
  if (!tokens.ok) return tokens;
  return parse(tokens.value);
}
