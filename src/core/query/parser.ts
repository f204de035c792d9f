/**
 * Boolean Query Parser
 *
 * Recursive descent over the token stream. Precedence, high to low:
 * NOT, AND, OR. Adjacent operands with no operator between them are ANDed.
 * Unknown field names are not rejected here; the executor decides.
 *
 * @module
 */

import type { QueryNode, Token } from "../../types/index.js";
import { ParseError, type ParseErrorKind } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parseQuery(): QueryNode {
    if (this.tokens.length === 0) {
      return { type: "match_all" };
    }

    const node = this.parseOr();
    const leftover = this.peek();
    if (leftover) {
      // Only a stray closing paren can stop parseOr early
      this.fail("UNBALANCED_PARENS", "Unmatched closing parenthesis", leftover.offset);
    }
    return node;
  }

  private parseOr(): QueryNode {
    const children = [this.parseAnd()];
    let op = this.peek();
    while (op?.kind === "OR") {
      this.pos++;
      this.expectOperand(op);
      children.push(this.parseAnd());
      op = this.peek();
    }
    return combine("or", children);
  }

  private parseAnd(): QueryNode {
    const children = [this.parseUnary()];
    for (;;) {
      const next = this.peek();
      if (next?.kind === "AND") {
        this.pos++;
        this.expectOperand(next);
        children.push(this.parseUnary());
      } else if (next && startsOperand(next)) {
        children.push(this.parseUnary());
      } else {
        break;
      }
    }
    return combine("and", children);
  }

  private parseUnary(): QueryNode {
    const next = this.peek();
    if (next?.kind === "NOT") {
      this.pos++;
      this.expectOperand(next);
      return { type: "not", child: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): QueryNode {
    const token = this.peek();
    if (!token) {
      // Callers check for an operand before descending
      return this.fail("DANGLING_OPERATOR", "Expected an operand", this.endOffset());
    }
    this.pos++;

    switch (token.kind) {
      case "TERM":
        return { type: "term", value: token.value };
      case "PHRASE":
        return { type: "phrase", value: token.value };
      case "FIELD_VALUE":
        return { type: "field", field: token.field, op: "eq", value: token.value };
      case "RANGE":
        return token.upper !== undefined
          ? { type: "field", field: token.field, op: token.op, value: token.value, upper: token.upper }
          : { type: "field", field: token.field, op: token.op, value: token.value };
      case "LPAREN": {
        const next = this.peek();
        if (next?.kind === "RPAREN") {
          return this.fail("EMPTY_GROUP", "Empty parentheses", token.offset);
        }
        if (!next) {
          return this.fail("UNBALANCED_PARENS", "Unclosed parenthesis", token.offset);
        }
        const inner = this.parseOr();
        if (this.peek()?.kind !== "RPAREN") {
          return this.fail("UNBALANCED_PARENS", "Unclosed parenthesis", token.offset);
        }
        this.pos++;
        return inner;
      }
      case "RPAREN":
        return this.fail("UNBALANCED_PARENS", "Unmatched closing parenthesis", token.offset);
      case "AND":
      case "OR":
      case "NOT":
        return this.fail("DANGLING_OPERATOR", `Operator ${token.kind} has no left operand`, token.offset);
    }
  }

  /**
   * After consuming a binary or unary operator the next token must begin an operand.
   */
  private expectOperand(operator: Token): void {
    const next = this.peek();
    if (!next || !startsOperand(next)) {
      this.fail("DANGLING_OPERATOR", `Operator ${operator.kind} has no operand`, operator.offset);
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private endOffset(): number {
    const last = this.tokens[this.tokens.length - 1];
    return last ? last.offset + last.raw.length : 0;
  }

  /** Unwinds to parse(), which returns the error as a Result */
  private fail(kind: ParseErrorKind, message: string, position: number): never {
    throw new ParseError(kind, message, position);
  }
}

function startsOperand(token: Token): boolean {
  switch (token.kind) {
    case "TERM":
    case "PHRASE":
    case "FIELD_VALUE":
    case "RANGE":
    case "NOT":
    case "LPAREN":
      return true;
    default:
      return false;
  }
}

/**
 * Builds an and/or node, flattening nested nodes of the same type
 */
function combine(type: "and" | "or", children: QueryNode[]): QueryNode {
  const first = children[0];
  if (children.length === 1 && first) return first;

  const flat: QueryNode[] = [];
  for (const child of children) {
    if ((child.type === "and" || child.type === "or") && child.type === type) {
      flat.push(...child.children);
    } else {
      flat.push(child);
    }
  }
  return { type, children: flat };
}

/**
 * Parses a token stream into a query AST
 */
export function parse(tokens: Token[]): Result<QueryNode, ParseError> {
  try {
    return ok(new Parser(tokens).parseQuery());
  } catch (error) {
    if (error instanceof ParseError) {
      return err(error);
    }
    throw error;
  }
}
