/**
 * Search Predicate
 *
 * The one internal representation both query forms lower to. Text leaves
 * resolve through postings; attribute leaves test stored record values and
 * never look at tokenised text.
 *
 * @module
 */

import type {
  AnalyzedTerm,
  DateRange,
  FieldOp,
  FieldPredicate,
  MediaRecord,
  QueryNode,
  Scalar,
  SearchCriteria,
  SizeRange,
  TextField,
} from "../../types/index.js";
import { ExecutionError, type ExecutionErrorKind } from "../errors.js";
import { fieldValues } from "../index/builder.js";
import type { Analyzer } from "../query/analyzer.js";
import { DAY_MS, parseByteSize, parseDateValue, startOfUtcDay } from "../query/values.js";

export type Predicate =
  | { kind: "all" }
  | { kind: "none" }
  | {
      kind: "text";
      scope: TextField | "all";
      /** Query terms with their required relative positions */
      terms: AnalyzedTerm[];
      /** Quoted by the user; earns the phrase bonus when it has several terms */
      phrase: boolean;
    }
  | { kind: "attr"; field: string; test: (record: MediaRecord) => boolean }
  | { kind: "and"; children: Predicate[] }
  | { kind: "or"; children: Predicate[] }
  | { kind: "not"; child: Predicate };

export interface LoweringContext {
  analyzer: Analyzer;
  /** Raise ExecutionError instead of matching nothing */
  strict: boolean;
  now: Date;
}

const ALL: Predicate = { kind: "all" };
const NONE: Predicate = { kind: "none" };

// =============================================================================
// Field resolution
// =============================================================================

type ResolvedField =
  | { kind: "text"; field: TextField }
  | { kind: "string"; name: string; get: (record: MediaRecord) => string }
  | { kind: "size" }
  | { kind: "date"; name: string; get: (record: MediaRecord) => string }
  | { kind: "path" }
  | { kind: "tech"; key: string };

const FIELD_ALIASES: Record<string, ResolvedField> = {
  title: { kind: "text", field: "title" },
  description: { kind: "text", field: "description" },
  desc: { kind: "text", field: "description" },
  tags: { kind: "text", field: "tags" },
  tag: { kind: "text", field: "tags" },
  keywords: { kind: "text", field: "keywords" },
  keyword: { kind: "text", field: "keywords" },
  kw: { kind: "text", field: "keywords" },
  category: { kind: "text", field: "category" },
  cat: { kind: "text", field: "category" },
  mood: { kind: "string", name: "mood", get: (record) => record.mood },
  type: { kind: "string", name: "fileType", get: (record) => record.fileType },
  filetype: { kind: "string", name: "fileType", get: (record) => record.fileType },
  size: { kind: "size" },
  created: { kind: "date", name: "createdAt", get: (record) => record.createdAt },
  createdat: { kind: "date", name: "createdAt", get: (record) => record.createdAt },
  date: { kind: "date", name: "createdAt", get: (record) => record.createdAt },
  modified: { kind: "date", name: "modifiedAt", get: (record) => record.modifiedAt },
  modifiedat: { kind: "date", name: "modifiedAt", get: (record) => record.modifiedAt },
  path: { kind: "path" },
};

function resolveField(name: string): ResolvedField | null {
  const lower = name.toLowerCase();
  if (lower.startsWith("tech.") && lower.length > "tech.".length) {
    return { kind: "tech", key: name.slice("tech.".length) };
  }
  return Object.hasOwn(FIELD_ALIASES, lower) ? (FIELD_ALIASES[lower] ?? null) : null;
}

function reject(ctx: LoweringContext, kind: ExecutionErrorKind, message: string, field: string): Predicate {
  if (ctx.strict) throw new ExecutionError(kind, message, field);
  return NONE;
}

function textLeaf(ctx: LoweringContext, scope: TextField | "all", value: string, phrase: boolean): Predicate {
  const terms = ctx.analyzer.analyzeQuery(value);
  if (terms.length === 0) return NONE;
  return { kind: "text", scope, terms, phrase: phrase && terms.length > 1 };
}

// =============================================================================
// Comparisons
// =============================================================================

interface Bounds {
  min?: number;
  minExclusive?: boolean;
  max?: number;
  maxExclusive?: boolean;
}

function inBounds(value: number, bounds: Bounds): boolean {
  if (bounds.min !== undefined && (bounds.minExclusive ? value <= bounds.min : value < bounds.min)) return false;
  if (bounds.max !== undefined && (bounds.maxExclusive ? value >= bounds.max : value > bounds.max)) return false;
  return true;
}

function boundsFor(op: Exclude<FieldOp, "eq">, lower: number, upper: number): Bounds {
  switch (op) {
    case "gt":
      return { min: lower, minExclusive: true };
    case "gte":
      return { min: lower };
    case "lt":
      return { max: lower, maxExclusive: true };
    case "lte":
      return { max: lower };
    case "between":
      return { min: lower, max: upper };
  }
}

/**
 * Date bounds. A whole-day value covers the full UTC day, so `created:>2024-01-01`
 * starts the next day and `created:<=2024-01-01` ends at its last millisecond.
 */
function dateBounds(
  op: FieldOp,
  lower: { time: number; wholeDay: boolean },
  upper: { time: number; wholeDay: boolean } | null
): Bounds {
  const lowerEnd = lower.wholeDay ? lower.time + DAY_MS : lower.time;
  switch (op) {
    case "eq":
      return lower.wholeDay ? { min: lower.time, max: lowerEnd, maxExclusive: true } : { min: lower.time, max: lower.time };
    case "gt":
      return lower.wholeDay ? { min: lowerEnd } : { min: lower.time, minExclusive: true };
    case "gte":
      return { min: lower.time };
    case "lt":
      return { max: lower.time, maxExclusive: true };
    case "lte":
      return lower.wholeDay ? { max: lowerEnd, maxExclusive: true } : { max: lower.time };
    case "between": {
      if (!upper) return { min: lower.time };
      return upper.wholeDay
        ? { min: lower.time, max: upper.time + DAY_MS, maxExclusive: true }
        : { min: lower.time, max: upper.time };
    }
  }
}

function numericValue(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function techValue(record: MediaRecord, key: string): string | number | boolean | undefined {
  if (Object.hasOwn(record.technicalAttrs, key)) return record.technicalAttrs[key];
  const lower = key.toLowerCase();
  for (const [name, value] of Object.entries(record.technicalAttrs)) {
    if (name.toLowerCase() === lower) return value;
  }
  return undefined;
}

// =============================================================================
// AST lowering
// =============================================================================

/**
 * Lowers a boolean query AST
 *
 * @throws {ExecutionError} In strict mode, for unknown fields, operators a
 *   field does not support, and values that do not parse
 */
export function lowerQuery(node: QueryNode, ctx: LoweringContext): Predicate {
  switch (node.type) {
    case "match_all":
      return ALL;
    case "term":
      return textLeaf(ctx, "all", node.value, false);
    case "phrase":
      return textLeaf(ctx, "all", node.value, true);
    case "and":
      return { kind: "and", children: node.children.map((child) => lowerQuery(child, ctx)) };
    case "or":
      return { kind: "or", children: node.children.map((child) => lowerQuery(child, ctx)) };
    case "not":
      return { kind: "not", child: lowerQuery(node.child, ctx) };
    case "field":
      return lowerFieldNode(node.field, node.op, node.value, node.upper, ctx);
  }
}

function lowerFieldNode(
  name: string,
  op: FieldOp,
  value: string,
  upper: string | undefined,
  ctx: LoweringContext
): Predicate {
  const field = resolveField(name);
  if (!field) return reject(ctx, "UNKNOWN_FIELD", `Unknown field "${name}"`, name);

  const notOrderable = (): Predicate =>
    reject(ctx, "INVALID_OPERATOR", `Field "${name}" does not support range comparisons`, name);

  switch (field.kind) {
    case "text":
      return op === "eq" ? textLeaf(ctx, field.field, value, true) : notOrderable();

    case "string":
      if (op !== "eq") return notOrderable();
      return { kind: "attr", field: field.name, test: (record) => sameText(field.get(record), value) };

    case "path": {
      if (op !== "eq") return notOrderable();
      const needle = value.toLowerCase();
      return { kind: "attr", field: "path", test: (record) => record.path.toLowerCase().includes(needle) };
    }

    case "size": {
      const lower = parseByteSize(value);
      const upperBytes = upper === undefined ? null : parseByteSize(upper);
      if (lower === null || (upper !== undefined && upperBytes === null)) {
        return reject(ctx, "INVALID_VALUE", `"${value}" is not a size`, name);
      }
      const bounds = op === "eq" ? { min: lower, max: lower } : boundsFor(op, lower, upperBytes ?? lower);
      return { kind: "attr", field: "fileSizeBytes", test: (record) => inBounds(record.fileSizeBytes, bounds) };
    }

    case "date": {
      const lower = parseDateValue(value, ctx.now);
      const upperDate = upper === undefined ? null : parseDateValue(upper, ctx.now);
      if (lower === null || (upper !== undefined && upperDate === null)) {
        return reject(ctx, "INVALID_VALUE", `"${value}" is not a date`, name);
      }
      const bounds = dateBounds(op, lower, upperDate);
      return {
        kind: "attr",
        field: field.name,
        test: (record) => inBounds(Date.parse(field.get(record)), bounds),
      };
    }

    case "tech": {
      const key = field.key;
      if (op === "eq") {
        return {
          kind: "attr",
          field: `tech.${key}`,
          test: (record) => {
            const stored = techValue(record, key);
            return stored !== undefined && sameText(String(stored), value);
          },
        };
      }
      const lower = numericValue(value);
      const upperNumber = upper === undefined ? null : numericValue(upper);
      if (lower === null || (upper !== undefined && upperNumber === null)) {
        return reject(ctx, "INVALID_VALUE", `"${value}" is not a number`, name);
      }
      const bounds = boundsFor(op, lower, upperNumber ?? lower);
      return {
        kind: "attr",
        field: `tech.${key}`,
        test: (record) => {
          const stored = numericValue(techValue(record, key));
          return stored !== null && inBounds(stored, bounds);
        },
      };
    }
  }
}

// =============================================================================
// Criteria lowering
// =============================================================================

/**
 * Lowers flat criteria: term groups are OR-ed across every text field, and
 * everything else is AND-ed onto them. Empty criteria match every record.
 *
 * @throws {ExecutionError} In strict mode, as for {@link lowerQuery}
 */
export function lowerCriteria(criteria: SearchCriteria, ctx: LoweringContext): Predicate {
  const clauses: Predicate[] = [];

  const groups = criteria.termGroups.map((group) => textLeaf(ctx, "all", group, true)).filter((p) => p.kind !== "none");
  const [onlyGroup] = groups;
  if (groups.length === 1 && onlyGroup) {
    clauses.push(onlyGroup);
  } else if (groups.length > 1) {
    clauses.push({ kind: "or", children: groups });
  }

  for (const [name, predicate] of Object.entries(criteria.fieldFilters)) {
    clauses.push(lowerFieldFilter(name, predicate, ctx));
  }

  for (const tag of criteria.tags) {
    clauses.push({ kind: "attr", field: "tags", test: (record) => record.tags.some((value) => sameText(value, tag)) });
  }

  for (const term of criteria.excludeTerms) {
    const excluded = textLeaf(ctx, "all", term, false);
    if (excluded.kind !== "none") clauses.push({ kind: "not", child: excluded });
  }

  if (criteria.dateRange) clauses.push(dateRangeClause(criteria.dateRange, ctx.now));
  if (criteria.sizeRange) clauses.push(sizeRangeClause(criteria.sizeRange));

  const [first] = clauses;
  if (clauses.length === 1 && first) return first;
  return clauses.length === 0 ? ALL : { kind: "and", children: clauses };
}

function dateRangeClause(range: DateRange, now: Date): Predicate {
  const bounds: Bounds =
    "lastDays" in range
      ? { min: startOfUtcDay(now) - range.lastDays * DAY_MS }
      : {
          min: range.from === undefined ? undefined : Date.parse(range.from),
          max: range.to === undefined ? undefined : Date.parse(range.to),
        };
  return { kind: "attr", field: "createdAt", test: (record) => inBounds(Date.parse(record.createdAt), bounds) };
}

function sizeRangeClause(range: SizeRange): Predicate {
  return { kind: "attr", field: "fileSizeBytes", test: (record) => inBounds(record.fileSizeBytes, range) };
}

/**
 * Values a field filter compares against, as strings for text-like fields
 */
type Accessor =
  | { kind: "strings"; get: (record: MediaRecord) => readonly string[] }
  | { kind: "number"; get: (record: MediaRecord) => number | null }
  | { kind: "date"; get: (record: MediaRecord) => number };

function accessorFor(field: ResolvedField): Accessor {
  switch (field.kind) {
    case "text":
      return { kind: "strings", get: (record) => fieldValues(record, field.field) };
    case "string":
      return { kind: "strings", get: (record) => [field.get(record)] };
    case "path":
      return { kind: "strings", get: (record) => [record.path] };
    case "size":
      return { kind: "number", get: (record) => record.fileSizeBytes };
    case "date":
      return { kind: "date", get: (record) => Date.parse(field.get(record)) };
    case "tech":
      return {
        kind: "strings",
        get: (record) => {
          const stored = techValue(record, field.key);
          return stored === undefined ? [] : [String(stored)];
        },
      };
  }
}

function scalarToNumber(value: Scalar, accessor: Accessor): number | null {
  if (accessor.kind === "date") {
    const time = typeof value === "number" ? value : Date.parse(value);
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === "string") return parseByteSize(value) ?? numericValue(value);
  return numericValue(value);
}

function lowerFieldFilter(name: string, predicate: FieldPredicate, ctx: LoweringContext): Predicate {
  const field = resolveField(name);
  if (!field) return reject(ctx, "UNKNOWN_FIELD", `Unknown field "${name}"`, name);
  const accessor = accessorFor(field);
  const label = field.kind === "text" ? field.field : name;

  if (predicate.op === "range") {
    const orderable = accessor.kind !== "strings" || field.kind === "tech";
    if (!orderable) {
      return reject(ctx, "INVALID_OPERATOR", `Field "${name}" does not support range comparisons`, name);
    }
    const numeric: Accessor = accessor.kind === "strings" ? { kind: "number", get: techNumber(field) } : accessor;
    const min = predicate.min === undefined ? undefined : scalarToNumber(predicate.min, numeric);
    const max = predicate.max === undefined ? undefined : scalarToNumber(predicate.max, numeric);
    if (min === null || max === null) {
      return reject(ctx, "INVALID_VALUE", `Range on "${name}" has a bound that does not parse`, name);
    }
    const bounds: Bounds = {
      min,
      max,
      minExclusive: predicate.minExclusive,
      maxExclusive: predicate.maxExclusive,
    };
    return {
      kind: "attr",
      field: label,
      test: (record) => {
        const value = numeric.get(record);
        return value !== null && !Number.isNaN(value) && inBounds(value, bounds);
      },
    };
  }

  if (predicate.op === "contains") {
    const needle = predicate.value.toLowerCase();
    if (accessor.kind !== "strings") {
      return reject(ctx, "INVALID_OPERATOR", `Field "${name}" does not support contains`, name);
    }
    return {
      kind: "attr",
      field: label,
      test: (record) => accessor.get(record).some((value) => value.toLowerCase().includes(needle)),
    };
  }

  const wanted = predicate.op === "eq" ? [predicate.value] : predicate.values;

  if (accessor.kind === "strings") {
    const lowered = wanted.map((value) => String(value).toLowerCase());
    return {
      kind: "attr",
      field: label,
      test: (record) => accessor.get(record).some((value) => lowered.includes(value.toLowerCase())),
    };
  }

  const numbers: number[] = [];
  for (const value of wanted) {
    const parsed = scalarToNumber(value, accessor);
    if (parsed === null) return reject(ctx, "INVALID_VALUE", `"${String(value)}" does not parse for "${name}"`, name);
    numbers.push(parsed);
  }
  return {
    kind: "attr",
    field: label,
    test: (record) => {
      const value = accessor.get(record);
      return value !== null && numbers.includes(value);
    },
  };
}

function techNumber(field: ResolvedField): (record: MediaRecord) => number | null {
  if (field.kind !== "tech") return () => null;
  return (record) => numericValue(techValue(record, field.key));
}

/**
 * Text and attribute leaves outside any NOT; only these contribute to ranking
 */
export function positiveLeaves(predicate: Predicate): Array<Extract<Predicate, { kind: "text" | "attr" }>> {
  switch (predicate.kind) {
    case "text":
    case "attr":
      return [predicate];
    case "and":
    case "or":
      return predicate.children.flatMap(positiveLeaves);
    default:
      return [];
  }
}
