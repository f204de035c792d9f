/**
 * Boolean Query Lexer
 *
 * Turns raw query text into a typed token stream. Offsets are character
 * offsets into the raw text. Bare words and phrases are normalized through
 * the analyzer; a word with no letters or numbers produces no token.
 *
 * @module
 */

import type { RangeOp, Token } from "../../types/index.js";
import { LexError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { Analyzer } from "./analyzer.js";

const OPERATOR_WORDS: Record<string, "AND" | "OR" | "NOT"> = {
  and: "AND",
  or: "OR",
  not: "NOT",
};

const FIELD_NAME = /^[A-Za-z_][\w.]*$/;

/** Characters that end a bare word */
function isDelimiter(char: string): boolean {
  return char === "(" || char === ")" || char === '"' || /\s/.test(char);
}

export class Lexer {
  private readonly analyzer: Analyzer;

  constructor(analyzer: Analyzer = new Analyzer()) {
    this.analyzer = analyzer;
  }

  tokenize(raw: string): Result<Token[], LexError> {
    const tokens: Token[] = [];
    let i = 0;

    while (i < raw.length) {
      const char = raw.charAt(i);

      if (/\s/.test(char)) {
        i++;
        continue;
      }

      if (char === "(" || char === ")") {
        tokens.push({ kind: char === "(" ? "LPAREN" : "RPAREN", offset: i, raw: char });
        i++;
        continue;
      }

      if (char === '"') {
        const close = raw.indexOf('"', i + 1);
        if (close === -1) {
          return err(new LexError("UNTERMINATED_PHRASE", "Unterminated quoted phrase", i));
        }
        const value = this.analyzer.normalizeQueryText(raw.slice(i + 1, close));
        if (value !== "") {
          tokens.push({ kind: "PHRASE", value, offset: i, raw: raw.slice(i, close + 1) });
        }
        i = close + 1;
        continue;
      }

      if (raw.startsWith("&&", i) || raw.startsWith("||", i)) {
        tokens.push({ kind: char === "&" ? "AND" : "OR", offset: i, raw: raw.slice(i, i + 2) });
        i += 2;
        continue;
      }

      // `!x` and `-x` negate the operand that follows
      if ((char === "!" || char === "-") && i + 1 < raw.length && !isDelimiter(raw.charAt(i + 1))) {
        tokens.push({ kind: "NOT", offset: i, raw: char });
        i++;
        continue;
      }
      if (char === "!") {
        tokens.push({ kind: "NOT", offset: i, raw: char });
        i++;
        continue;
      }

      let end = i;
      while (end < raw.length && !isDelimiter(raw.charAt(end))) end++;
      const word = raw.slice(i, end);

      const operator = OPERATOR_WORDS[word.toLowerCase()];
      if (operator) {
        tokens.push({ kind: operator, offset: i, raw: word });
        i = end;
        continue;
      }

      const colon = word.indexOf(":");
      const fieldName = colon > 0 ? word.slice(0, colon) : "";
      if (colon > 0 && FIELD_NAME.test(fieldName)) {
        const fieldResult = this.readField(raw, i, end, fieldName.toLowerCase(), word.slice(colon + 1));
        if (!fieldResult.ok) return fieldResult;
        tokens.push(fieldResult.value.token);
        i = fieldResult.value.next;
        continue;
      }

      const value = this.analyzer.normalizeQueryText(word);
      if (value !== "") {
        tokens.push({ kind: "TERM", value, offset: i, raw: word });
      }
      i = end;
    }

    return ok(tokens);
  }

  /**
   * Reads the value part of `field:value`, `field:"quoted"`, `field:>v` or
   * `field:a..b`. `wordEnd` is where the bare word stopped.
   */
  private readField(
    raw: string,
    start: number,
    wordEnd: number,
    field: string,
    rest: string
  ): Result<{ token: Token; next: number }, LexError> {
    if (rest === "") {
      if (raw.charAt(wordEnd) === '"') {
        const close = raw.indexOf('"', wordEnd + 1);
        if (close === -1) {
          return err(new LexError("UNTERMINATED_PHRASE", "Unterminated quoted field value", wordEnd));
        }
        const value = raw.slice(wordEnd + 1, close);
        if (value.trim() === "") {
          return err(new LexError("EMPTY_FIELD_VALUE", `Field "${field}" has an empty value`, start));
        }
        return ok({
          token: { kind: "FIELD_VALUE", field, value, quoted: true, offset: start, raw: raw.slice(start, close + 1) },
          next: close + 1,
        });
      }
      return err(new LexError("EMPTY_FIELD_VALUE", `Field "${field}" has an empty value`, start));
    }

    const word = raw.slice(start, wordEnd);
    const comparison = /^(>=|<=|>|<)(.*)$/.exec(rest);
    if (comparison) {
      const symbol = comparison[1] ?? "";
      const value = comparison[2] ?? "";
      if (value === "") {
        return err(new LexError("MALFORMED_RANGE", `Range on "${field}" is missing a value`, start));
      }
      return ok({
        token: { kind: "RANGE", field, op: comparisonOp(symbol), value, offset: start, raw: word },
        next: wordEnd,
      });
    }

    const dots = rest.indexOf("..");
    if (dots !== -1) {
      const lower = rest.slice(0, dots);
      const upper = rest.slice(dots + 2);
      if (lower === "" || upper === "") {
        return err(new LexError("MALFORMED_RANGE", `Range on "${field}" is missing a bound`, start));
      }
      return ok({
        token: { kind: "RANGE", field, op: "between", value: lower, upper, offset: start, raw: word },
        next: wordEnd,
      });
    }

    return ok({
      token: { kind: "FIELD_VALUE", field, value: rest, quoted: false, offset: start, raw: word },
      next: wordEnd,
    });
  }
}

function comparisonOp(symbol: string): RangeOp {
  switch (symbol) {
    case ">=":
      return "gte";
    case "<=":
      return "lte";
    case "<":
      return "lt";
    default:
      return "gt";
  }
}

/**
 * Tokenizes with a default analyzer
 */
export function tokenize(raw: string, analyzer?: Analyzer): Result<Token[], LexError> {
  return new Lexer(analyzer).tokenize(raw);
}
