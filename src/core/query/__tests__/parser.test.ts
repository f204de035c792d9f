/**
 * Boolean Parser Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { parseQuery } from "../index.js";
import type { QueryNode } from "../../../types/index.js";
import type { LexError, ParseError } from "../../errors.js";

function ast(raw: string): QueryNode {
  const result = parseQuery(raw);
  if (!result.ok) throw result.error;
  return result.value;
}

function failure(raw: string): LexError | ParseError {
  const result = parseQuery(raw);
  if (result.ok) throw new Error(`expected "${raw}" to fail`);
  return result.error;
}

const term = (value: string): QueryNode => ({ type: "term", value });

describe("Boolean Parser", () => {
  describe("precedence", () => {
    it("should parse an explicit AND", () => {
      expect(ast("Taipei AND happy")).toEqual({ type: "and", children: [term("taipei"), term("happy")] });
    });

    it("should treat adjacency as AND", () => {
      expect(ast("Taipei happy")).toEqual(ast("Taipei AND happy"));
    });

    it("should bind AND tighter than OR", () => {
      const expected: QueryNode = {
        type: "or",
        children: [term("a"), { type: "and", children: [term("b"), term("c")] }],
      };
      expect(ast("A OR B AND C")).toEqual(expected);
      expect(ast("A OR (B AND C)")).toEqual(expected);
    });

    it("should let parentheses override precedence", () => {
      expect(ast("(a OR b) AND c")).toEqual({
        type: "and",
        children: [{ type: "or", children: [term("a"), term("b")] }, term("c")],
      });
    });

    it("should bind NOT tightest", () => {
      expect(ast("NOT a b")).toEqual({ type: "and", children: [{ type: "not", child: term("a") }, term("b")] });
    });

    it("should flatten nested nodes of the same type", () => {
      expect(ast("a AND (b AND c)")).toEqual({ type: "and", children: [term("a"), term("b"), term("c")] });
      expect(ast("(a OR b) OR (c OR d)")).toEqual({
        type: "or",
        children: [term("a"), term("b"), term("c"), term("d")],
      });
    });
  });

  describe("leaves", () => {
    it("should build phrase and field leaves", () => {
      expect(ast('"Taipei rain" mood:sad size:>1048576')).toEqual({
        type: "and",
        children: [
          { type: "phrase", value: "taipei rain" },
          { type: "field", field: "mood", op: "eq", value: "sad" },
          { type: "field", field: "size", op: "gt", value: "1048576" },
        ],
      });
    });

    it("should carry the upper bound of a between range", () => {
      expect(ast("size:1MB..5MB")).toEqual({ type: "field", field: "size", op: "between", value: "1MB", upper: "5MB" });
    });

    it("should keep unknown fields for the executor", () => {
      expect(ast("colour:red")).toEqual({ type: "field", field: "colour", op: "eq", value: "red" });
    });

    it("should read a multi-run word as a term with joined runs", () => {
      expect(ast("hello-world")).toEqual(term("hello world"));
    });

    it("should return match_all for empty input", () => {
      expect(ast("")).toEqual({ type: "match_all" });
      expect(ast("   ")).toEqual({ type: "match_all" });
    });
  });

  describe("whitespace insensitivity", () => {
    const pairs: Array<[string, string]> = [
      ["(a OR b) AND c", "  (  a   OR b)AND   c  "],
      ["NOT a OR b", "NOT   a\tOR\n b"],
      ['"x y" AND mood:happy', ' "x y"   AND   mood:happy '],
    ];

    for (const [compact, spaced] of pairs) {
      it(`should parse "${compact}" the same with extra whitespace`, () => {
        expect(ast(spaced)).toEqual(ast(compact));
      });
    }
  });

  describe("errors", () => {
    it("should report an unclosed parenthesis at its offset", () => {
      const error = failure("x (a OR b");
      expect(error.kind).toBe("UNBALANCED_PARENS");
      expect(error.position).toBe(2);
    });

    it("should report a stray closing parenthesis at its offset", () => {
      const error = failure("a OR b)");
      expect(error.kind).toBe("UNBALANCED_PARENS");
      expect(error.position).toBe(6);
    });

    it("should reject empty groups", () => {
      const error = failure("a ()");
      expect(error.kind).toBe("EMPTY_GROUP");
      expect(error.position).toBe(2);
    });

    it("should reject dangling operators", () => {
      expect(failure("a AND").position).toBe(2);
      expect(failure("OR a").kind).toBe("DANGLING_OPERATOR");
      expect(failure("NOT").kind).toBe("DANGLING_OPERATOR");
      const doubled = failure("a OR OR b");
      expect(doubled.kind).toBe("DANGLING_OPERATOR");
      expect(doubled.position).toBe(2);
    });

    it("should surface lexer errors unchanged", () => {
      expect(failure('"open').toJSON()).toEqual({
        kind: "UNTERMINATED_PHRASE",
        code: "E1000",
        message: "Unterminated quoted phrase",
        position: 0,
      });
    });
  });
});
