/**
 * Shared types for reel-search
 */

export type {
  MediaRecord,
  MediaRecordInput,
  SearchCriteria,
  SearchCriteriaInput,
  FieldPredicate,
  DateRange,
  SizeRange,
  SortBy,
  SortOrder,
  Scalar,
  SearchTemplate,
  EngineConfig,
  EngineConfigInput,
  RankingConfig,
  FieldWeights,
  FacetField,
} from "../utils/validation.js";

import type { FacetField, MediaRecord, SearchCriteria, SortBy, SortOrder } from "../utils/validation.js";

// =============================================================================
// Fields
// =============================================================================

/**
 * Fields with their own positional posting lists
 */
export const TEXT_FIELDS = ["title", "description", "tags", "keywords", "category", "mood"] as const;

export type TextField = (typeof TEXT_FIELDS)[number];

export function isTextField(value: string): value is TextField {
  return TEXT_FIELDS.some((field) => field === value);
}

// =============================================================================
// Tokens
// =============================================================================

/**
 * One analyzed term and its position relative to the start of the analyzed text
 */
export interface AnalyzedTerm {
  term: string;
  position: number;
}

export type RangeOp = "gt" | "gte" | "lt" | "lte" | "between";

interface TokenBase {
  /** Character offset of the token's first character in the raw query */
  offset: number;
  /** The token's raw source text */
  raw: string;
}

export type Token =
  | (TokenBase & { kind: "TERM"; value: string })
  | (TokenBase & { kind: "PHRASE"; value: string })
  | (TokenBase & { kind: "FIELD_VALUE"; field: string; value: string; quoted: boolean })
  | (TokenBase & { kind: "RANGE"; field: string; op: RangeOp; value: string; upper?: string })
  | (TokenBase & { kind: "AND" | "OR" | "NOT" | "LPAREN" | "RPAREN" });

// =============================================================================
// Query AST
// =============================================================================

export type FieldOp = "eq" | RangeOp;

/**
 * Boolean query AST. Nodes carry no source offsets.
 * Term and phrase values hold normalized text runs joined by single spaces.
 */
export type QueryNode =
  | { type: "match_all" }
  | { type: "term"; value: string }
  | { type: "phrase"; value: string }
  | { type: "field"; field: string; op: FieldOp; value: string; upper?: string }
  | { type: "and"; children: QueryNode[] }
  | { type: "or"; children: QueryNode[] }
  | { type: "not"; child: QueryNode };

// =============================================================================
// Results
// =============================================================================

export type SearchMode = "nl" | "boolean" | "auto";

/**
 * How a response was produced: a translated phrase, a boolean query, or
 * criteria supplied directly (including templates)
 */
export type ResponseMode = "nl" | "boolean" | "criteria";

/**
 * Direction used when a sort key is given without one
 */
export const DEFAULT_SORT_ORDER: Readonly<Record<SortBy, SortOrder>> = {
  relevance: "desc",
  date: "desc",
  size: "desc",
  name: "asc",
  type: "asc",
};

/**
 * A contiguous run of matched positions in one field
 */
export interface MatchSpan {
  field: TextField;
  start: number;
  end: number;
}

export interface SearchResult {
  recordId: string;
  score: number;
  record: MediaRecord;
  matchedFields: TextField[];
  spans: MatchSpan[];
}

export interface FacetValue {
  value: string;
  count: number;
}

export type Facets = Partial<Record<FacetField, FacetValue[]>>;

export interface SearchResponse {
  query: string;
  items: SearchResult[];
  totalCount: number;
  facets: Facets;
  suggestions: string[];
  elapsedMs: number;
  mode: ResponseMode;
  /** The criteria the query ran as, for natural-language and criteria searches */
  criteria?: SearchCriteria;
  page: number;
  pageSize: number;
  /** True when the index fell back to empty after a failed load */
  degraded: boolean;
}

export interface SearchOptions {
  mode?: SearchMode;
  /** 1-based */
  page?: number;
  pageSize?: number;
  signal?: AbortSignal;
  strict?: boolean;
  sortBy?: SortBy;
  sortOrder?: SortOrder;
}

// =============================================================================
// Statistics
// =============================================================================

export interface IndexStatistics {
  version: number;
  recordCount: number;
  /** Distinct tokens per field */
  vocabulary: Record<TextField, number>;
  degraded: boolean;
}

export interface EngineStatistics {
  index: IndexStatistics;
  templates: number;
  cache: { size: number; maxSize: number; hits: number; misses: number; hitRate: number };
}

export interface SearchAnalytics {
  totalSearches: number;
  uniqueQueries: number;
  popularQueries: Array<{ query: string; count: number }>;
  averageQueryLength: number;
  recentQueries: string[];
}

export type ExportFormat = "json" | "csv";
