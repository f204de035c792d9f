/**
 * Query execution, ranking, faceting and the search façade
 *
 * @module
 */

export { SearchManager, detectMode, type IngestionEvents, type SearchManagerOptions } from "./search-manager.js";
export { lowerCriteria, lowerQuery, positiveLeaves, type LoweringContext, type Predicate } from "./predicate.js";
export { execute, type Candidate, type ExecuteOptions, type MatchEvidence } from "./executor.js";
export { Ranker, paginate, type RankOptions } from "./ranker.js";
export { aggregateFacets } from "./facets.js";
export { exportResults, csvField, CSV_COLUMNS } from "./export.js";
export { LRUCache, type CacheStats, type LRUCacheConfig } from "./lru-cache.js";
