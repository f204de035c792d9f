/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating records, criteria, configuration and persisted
 * files at runtime. Types are inferred from the schemas so the two never drift.
 *
 * @module
 */

import { z } from "zod";
import { ValidationError, type ValidationErrorKind } from "../core/errors.js";

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * ISO-8601 date or date-time string
 */
export const IsoDateSchema = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be an ISO-8601 date" });

export const ScalarSchema = z.union([z.string(), z.number()]);

export type Scalar = z.infer<typeof ScalarSchema>;

// =============================================================================
// Media Record Schema
// =============================================================================

/**
 * A media record as delivered by the ingestion collaborator.
 * Text fields default to empty so partially classified media can be indexed.
 */
export const MediaRecordSchema = z.object({
  id: z.string().min(1),
  fileType: z.string().min(1),
  title: z.string().default(""),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  category: z.string().default(""),
  mood: z.string().default(""),
  technicalAttrs: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
  createdAt: IsoDateSchema,
  modifiedAt: IsoDateSchema,
  fileSizeBytes: z.number().int().nonnegative(),
  path: z.string().default(""),
});

export type MediaRecord = z.infer<typeof MediaRecordSchema>;
export type MediaRecordInput = z.input<typeof MediaRecordSchema>;

// =============================================================================
// Search Criteria Schema
// =============================================================================

export const FieldPredicateSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("eq"), value: ScalarSchema }),
  z.object({ op: z.literal("in"), values: z.array(ScalarSchema).min(1) }),
  z.object({ op: z.literal("contains"), value: z.string() }),
  z.object({
    op: z.literal("range"),
    min: ScalarSchema.optional(),
    max: ScalarSchema.optional(),
    minExclusive: z.boolean().optional(),
    maxExclusive: z.boolean().optional(),
  }),
]);

export type FieldPredicate = z.infer<typeof FieldPredicateSchema>;

/**
 * Either a relative window ending now, or absolute ISO bounds (inclusive)
 */
export const DateRangeSchema = z.union([
  z.object({ lastDays: z.number().int().nonnegative() }).strict(),
  z.object({ from: IsoDateSchema.optional(), to: IsoDateSchema.optional() }).strict(),
]);

export type DateRange = z.infer<typeof DateRangeSchema>;

/**
 * Inclusive byte bounds
 */
export const SizeRangeSchema = z
  .object({
    min: z.number().int().nonnegative().optional(),
    max: z.number().int().nonnegative().optional(),
  })
  .strict();

export type SizeRange = z.infer<typeof SizeRangeSchema>;

export const SortBySchema = z.enum(["relevance", "date", "name", "size", "type"]);
export const SortOrderSchema = z.enum(["asc", "desc"]);

export type SortBy = z.infer<typeof SortBySchema>;
export type SortOrder = z.infer<typeof SortOrderSchema>;

export const SearchCriteriaSchema = z.object({
  termGroups: z.array(z.string()).default([]),
  fieldFilters: z.record(z.string(), FieldPredicateSchema).default({}),
  dateRange: DateRangeSchema.optional(),
  sizeRange: SizeRangeSchema.optional(),
  tags: z.array(z.string()).default([]),
  excludeTerms: z.array(z.string()).default([]),
  sortBy: SortBySchema.default("relevance"),
  sortOrder: SortOrderSchema.default("desc"),
  limit: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().optional(),
});

export type SearchCriteria = z.infer<typeof SearchCriteriaSchema>;
export type SearchCriteriaInput = z.input<typeof SearchCriteriaSchema>;

// =============================================================================
// Engine Configuration Schema
// =============================================================================

export const FieldWeightsSchema = z.object({
  title: z.number().nonnegative().default(3),
  tags: z.number().nonnegative().default(2),
  keywords: z.number().nonnegative().default(2),
  category: z.number().nonnegative().default(1.5),
  mood: z.number().nonnegative().default(1.5),
  description: z.number().nonnegative().default(1),
});

export type FieldWeights = z.infer<typeof FieldWeightsSchema>;

export const RankingConfigSchema = z.object({
  fieldWeights: FieldWeightsSchema.default({}),
  /** Added once per record when a phrase matched in some field */
  phraseBonus: z.number().nonnegative().default(2),
  /** Added per field filter a record satisfied */
  fieldMatchBonus: z.number().nonnegative().default(1.5),
  /** Maximum recency contribution, for a record modified just now */
  recencyWeight: z.number().nonnegative().default(0.5),
  recencyHalfLifeDays: z.number().positive().default(30),
});

export type RankingConfig = z.infer<typeof RankingConfigSchema>;

export const FacetFieldSchema = z.enum(["fileType", "category", "mood", "tags"]);
export type FacetField = z.infer<typeof FacetFieldSchema>;

export const EngineConfigSchema = z.object({
  ranking: RankingConfigSchema.default({}),
  facets: z
    .object({
      fields: z.array(FacetFieldSchema).default(["fileType", "category", "mood", "tags"]),
      topN: z.number().int().positive().default(10),
    })
    .default({}),
  search: z
    .object({
      defaultPageSize: z.number().int().positive().default(20),
      maxPageSize: z.number().int().positive().default(200),
      strict: z.boolean().default(false),
      resultCacheSize: z.number().int().nonnegative().default(100),
    })
    .default({}),
  index: z
    .object({
      maxGram: z.number().int().min(1).max(4).default(2),
      maxBatchSize: z.number().int().positive().default(256),
      persist: z.boolean().default(true),
    })
    .default({}),
  suggestions: z
    .object({
      limit: z.number().int().positive().default(10),
      maxHistory: z.number().int().positive().default(1000),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// =============================================================================
// Persisted File Schemas
// =============================================================================

export const IndexFileSchema = z.object({
  schemaVersion: z.number().int(),
  records: z.array(MediaRecordSchema),
  postings: z.record(z.string(), z.record(z.string(), z.array(z.string()))),
});

export type IndexFile = z.infer<typeof IndexFileSchema>;

export const SearchTemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  criteria: SearchCriteriaSchema,
  createdAt: IsoDateSchema,
  lastUsedAt: IsoDateSchema.optional(),
  useCount: z.number().int().nonnegative().default(0),
});

export type SearchTemplate = z.infer<typeof SearchTemplateSchema>;

export const TemplatesFileSchema = z.object({
  schemaVersion: z.number().int(),
  templates: z.record(z.string(), SearchTemplateSchema),
});

export type TemplatesFile = z.infer<typeof TemplatesFileSchema>;

/**
 * Only the version field, read before the full shape is trusted
 */
export const VersionedFileSchema = z.object({ schemaVersion: z.unknown() }).passthrough();

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate data against a schema, throwing a ValidationError of the given kind
 *
 * @throws {ValidationError} If validation fails
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  kind: ValidationErrorKind,
  what: string
): z.infer<S> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  const issues = formatZodError(result.error);
  throw new ValidationError(kind, `Invalid ${what}: ${issues.join("; ")}`, issues);
}
