/**
 * Error Classes for reel-search
 * Structured error handling with error codes and kinds
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Query language errors (1xxx)
  LEX_FAILED = "E1000",
  PARSE_FAILED = "E1100",

  // Execution errors (2xxx)
  EXECUTION_FAILED = "E2000",
  SEARCH_CANCELLED = "E2001",

  // Index errors (3xxx)
  INDEX_CORRUPTION = "E3000",
  SCHEMA_VERSION_MISMATCH = "E3001",

  // Template errors (4xxx)
  TEMPLATE_NOT_FOUND = "E4000",
  TEMPLATE_CONFLICT = "E4001",

  // Validation errors (5xxx)
  VALIDATION_FAILED = "E5000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

export type LexErrorKind = "UNTERMINATED_PHRASE" | "MALFORMED_RANGE" | "EMPTY_FIELD_VALUE";
export type ParseErrorKind = "UNBALANCED_PARENS" | "DANGLING_OPERATOR" | "EMPTY_GROUP";
export type ExecutionErrorKind = "UNKNOWN_FIELD" | "INVALID_OPERATOR" | "INVALID_VALUE";
export type ValidationErrorKind = "INVALID_RECORD" | "INVALID_CRITERIA" | "INVALID_CONFIG";

export type ErrorKind =
  | LexErrorKind
  | ParseErrorKind
  | ExecutionErrorKind
  | ValidationErrorKind
  | "CANCELLED"
  | "INDEX_CORRUPTION"
  | "MIGRATION_REQUIRED"
  | "TEMPLATE_NOT_FOUND"
  | "TEMPLATE_CONFLICT"
  | "UNKNOWN";

/**
 * Structured shape every error serializes to
 */
export interface StructuredError {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
  position?: number;
}

/**
 * Base error class for all reel-search errors
 */
export class SearchEngineError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly position?: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind = "UNKNOWN",
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: { position?: number; context?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = "SearchEngineError";
    this.kind = kind;
    this.code = code;
    this.position = options.position;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): StructuredError {
    const json: StructuredError = { kind: this.kind, code: this.code, message: this.message };
    if (this.position !== undefined) json.position = this.position;
    return json;
  }

  override toString(): string {
    const at = this.position !== undefined ? ` at offset ${this.position}` : "";
    return `[${this.code}] ${this.name}(${this.kind}): ${this.message}${at}`;
  }
}

/**
 * Raised by the lexer; the query is rejected outright
 */
export class LexError extends SearchEngineError {
  constructor(kind: LexErrorKind, message: string, position: number) {
    super(message, kind, ErrorCode.LEX_FAILED, { position });
    this.name = "LexError";
  }
}

/**
 * Raised by the boolean parser; nothing is executed
 */
export class ParseError extends SearchEngineError {
  constructor(kind: ParseErrorKind, message: string, position: number) {
    super(message, kind, ErrorCode.PARSE_FAILED, { position });
    this.name = "ParseError";
  }
}

/**
 * Raised during evaluation, only when strict field checking is on
 */
export class ExecutionError extends SearchEngineError {
  public readonly field: string;

  constructor(kind: ExecutionErrorKind, message: string, field: string) {
    super(message, kind, ErrorCode.EXECUTION_FAILED, { context: { field } });
    this.name = "ExecutionError";
    this.field = field;
  }
}

export class SearchCancelledError extends SearchEngineError {
  constructor(reason?: string) {
    super(reason ?? "Search was cancelled", "CANCELLED", ErrorCode.SEARCH_CANCELLED);
    this.name = "SearchCancelledError";
  }
}

export class IndexCorruptionError extends SearchEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INDEX_CORRUPTION", ErrorCode.INDEX_CORRUPTION, { context });
    this.name = "IndexCorruptionError";
  }
}

export class SchemaVersionError extends SearchEngineError {
  public readonly expected: number;
  public readonly found: unknown;

  constructor(what: string, expected: number, found: unknown) {
    super(
      `${what} has schemaVersion ${String(found)}, expected ${expected}; migration required`,
      "MIGRATION_REQUIRED",
      ErrorCode.SCHEMA_VERSION_MISMATCH,
      { context: { expected, found } }
    );
    this.name = "SchemaVersionError";
    this.expected = expected;
    this.found = found;
  }
}

export class TemplateNotFoundError extends SearchEngineError {
  constructor(name: string) {
    super(`Template "${name}" does not exist`, "TEMPLATE_NOT_FOUND", ErrorCode.TEMPLATE_NOT_FOUND, {
      context: { name },
    });
    this.name = "TemplateNotFoundError";
  }
}

export class TemplateConflictError extends SearchEngineError {
  constructor(name: string) {
    super(`Template "${name}" already exists`, "TEMPLATE_CONFLICT", ErrorCode.TEMPLATE_CONFLICT, {
      context: { name },
    });
    this.name = "TemplateConflictError";
  }
}

export class ValidationError extends SearchEngineError {
  public readonly issues: string[];

  constructor(kind: ValidationErrorKind, message: string, issues: string[] = []) {
    super(message, kind, ErrorCode.VALIDATION_FAILED, { context: { issues } });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Check if an error is a SearchEngineError
 */
export function isSearchEngineError(error: unknown): error is SearchEngineError {
  return error instanceof SearchEngineError;
}

/**
 * Wrap an unknown error in a SearchEngineError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred"
): SearchEngineError {
  if (isSearchEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SearchEngineError(error.message || defaultMessage, "UNKNOWN", ErrorCode.UNKNOWN_ERROR, {
      context: { originalError: error.name, originalStack: error.stack },
    });
  }

  return new SearchEngineError(typeof error === "string" ? error : defaultMessage);
}
