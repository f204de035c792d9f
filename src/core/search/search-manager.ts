/**
 * Search Manager
 *
 * The façade the CLI and any UI talk to. It owns one MediaIndex, one
 * TemplateStore, the NL translator and the suggestion model, and runs every
 * query form through the same pipeline:
 *
 *   query → {translator | lexer + parser} → predicate → executor(snapshot)
 *         → ranker + facets → SearchResponse
 *
 * Nothing thrown out of a public method is anything but a SearchEngineError.
 *
 * @module
 */

import {
  DEFAULT_SORT_ORDER,
  type EngineConfig,
  type EngineStatistics,
  type ExportFormat,
  type Facets,
  type MediaRecord,
  type ResponseMode,
  type SearchAnalytics,
  type SearchCriteria,
  type SearchCriteriaInput,
  type SearchMode,
  type SearchOptions,
  type SearchResponse,
  type SearchResult,
  type SearchTemplate,
  type SortBy,
  type SortOrder,
} from "../../types/index.js";
import type { EventBus } from "../../utils/events.js";
import { createLogger, getIndexPath, getTemplatesPath, type Logger } from "../../utils/index.js";
import { MediaRecordSchema, SearchCriteriaSchema, validate } from "../../utils/validation.js";
import { loadConfig, resolveConfig } from "../config.js";
import { SearchCancelledError, wrapError } from "../errors.js";
import { MediaIndex } from "../index/media-index.js";
import { NaturalLanguageTranslator } from "../nl/translator.js";
import { Analyzer } from "../query/analyzer.js";
import { parseQuery } from "../query/index.js";
import { SuggestionModel } from "../suggestions/suggestion-model.js";
import { TemplateStore, type CreateTemplateOptions, type TemplateUpdate } from "../templates/template-store.js";
import { execute } from "./executor.js";
import { exportResults } from "./export.js";
import { aggregateFacets } from "./facets.js";
import { LRUCache } from "./lru-cache.js";
import { lowerCriteria, lowerQuery, type LoweringContext, type Predicate } from "./predicate.js";
import { Ranker, paginate } from "./ranker.js";

/**
 * Record lifecycle events pushed by the ingestion collaborator
 */
export interface IngestionEvents {
  "record:created": unknown;
  "record:updated": unknown;
  "record:deleted": { id: string };
}

export interface SearchManagerOptions {
  config?: EngineConfig;
  index?: MediaIndex;
  templates?: TemplateStore;
  translator?: NaturalLanguageTranslator;
  suggestions?: SuggestionModel;
  /** Where `save()` writes the index; nothing is written when omitted */
  indexPath?: string;
  clock?: () => Date;
  logger?: Logger;
}

/** Queries with boolean operators, parentheses or `field:` syntax */
const BOOLEAN_SYNTAX = /\b(AND|OR|NOT)\b|[()]|&&|\|\||(^|\s)[A-Za-z_][\w.]*:\S/;

const RESPONSE_SUGGESTIONS = 5;

interface RankedEntry {
  ranked: SearchResult[];
  facets: Facets;
}

interface PreparedQuery {
  mode: ResponseMode;
  predicate: Predicate;
  /** Stable text of what the query lowered from */
  cacheText: string;
  criteria?: SearchCriteria;
  sortBy: SortBy;
  sortOrder: SortOrder;
}

/**
 * Picks boolean mode for text that uses the boolean language's syntax
 */
export function detectMode(rawQuery: string): Exclude<SearchMode, "auto"> {
  return BOOLEAN_SYNTAX.test(rawQuery) ? "boolean" : "nl";
}

export class SearchManager {
  readonly config: EngineConfig;
  readonly index: MediaIndex;
  readonly templates: TemplateStore;
  private readonly translator: NaturalLanguageTranslator;
  private readonly suggestions: SuggestionModel;
  private readonly ranker: Ranker;
  private readonly cache: LRUCache<string, RankedEntry>;
  private readonly indexPath: string | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: SearchManagerOptions = {}) {
    this.config = options.config ?? resolveConfig();
    this.logger = options.logger ?? createLogger("search");
    this.clock = options.clock ?? (() => new Date());
    this.index =
      options.index ??
      new MediaIndex({
        analyzer: new Analyzer({ maxGram: this.config.index.maxGram }),
        maxBatchSize: this.config.index.maxBatchSize,
        logger: this.logger.child({ component: "index" }),
      });
    this.templates =
      options.templates ?? new TemplateStore({ clock: this.clock, logger: this.logger.child({ component: "templates" }) });
    this.translator =
      options.translator ?? new NaturalLanguageTranslator({ logger: this.logger.child({ component: "nl" }) });
    this.suggestions =
      options.suggestions ??
      new SuggestionModel({
        limit: this.config.suggestions.limit,
        maxHistory: this.config.suggestions.maxHistory,
        logger: this.logger.child({ component: "suggestions" }),
      });
    this.ranker = new Ranker(this.config.ranking);
    this.cache = new LRUCache({ maxSize: this.config.search.resultCacheSize });
    this.indexPath = options.indexPath;
  }

  /**
   * Opens the engine for a project: configuration from `.reel-search/config.json`,
   * and when persistence is on, the saved index and template store.
   */
  static async open(projectRoot?: string, options: Omit<SearchManagerOptions, "config"> = {}): Promise<SearchManager> {
    try {
      const config = await loadConfig(projectRoot);
      const logger = options.logger ?? createLogger("search");
      const analyzer = new Analyzer({ maxGram: config.index.maxGram });

      if (!config.index.persist) {
        return new SearchManager({ ...options, config, logger });
      }

      const indexPath = getIndexPath(projectRoot);
      const index =
        options.index ??
        (await MediaIndex.load(indexPath, {
          analyzer,
          maxBatchSize: config.index.maxBatchSize,
          logger: logger.child({ component: "index" }),
        }));
      if (index.degraded) {
        logger.warn({ indexPath, err: index.lastLoadError }, "Index could not be loaded; starting empty");
      }
      const templates =
        options.templates ??
        (await TemplateStore.open(getTemplatesPath(projectRoot), {
          clock: options.clock,
          logger: logger.child({ component: "templates" }),
        }));

      return new SearchManager({ ...options, config, index, templates, indexPath, logger });
    } catch (error) {
      throw wrapError(error, "Failed to open search engine");
    }
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Runs a natural-language or boolean query. `auto` (the default) picks
   * boolean mode when the text uses operators, parentheses or `field:` syntax.
   */
  async search(rawQuery: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.guard("Search failed", async () => {
      const started = performance.now();
      const response = await this.run(rawQuery, this.prepareQuery(rawQuery, options), options, started, "page");
      this.suggestions.observe(rawQuery);
      return response;
    });
  }

  /**
   * Like `search`, but the response holds every ranked result instead of
   * one page. Used for export.
   */
  async searchAll(rawQuery: string, options: Omit<SearchOptions, "page" | "pageSize"> = {}): Promise<SearchResponse> {
    return this.guard("Search failed", async () => {
      const started = performance.now();
      const response = await this.run(rawQuery, this.prepareQuery(rawQuery, options), options, started, "all");
      this.suggestions.observe(rawQuery);
      return response;
    });
  }

  /**
   * Runs criteria built by hand. `limit` and `offset` in the criteria page
   * the results unless the options ask for a page.
   */
  async searchCriteria(criteria: SearchCriteriaInput, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.guard("Search failed", () => {
      const started = performance.now();
      const validated = validate(SearchCriteriaSchema, criteria, "INVALID_CRITERIA", "search criteria");
      const prepared = this.prepareCriteria("criteria", validated, options, this.loweringContext(options));
      return this.run("", prepared, options, started, "page");
    });
  }

  /**
   * Runs a saved template and records the use
   *
   * @throws {TemplateNotFoundError}
   */
  async searchTemplate(name: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.guard("Template search failed", async () => {
      const started = performance.now();
      const criteria = await this.templates.markUsed(name);
      const prepared = this.prepareCriteria("criteria", criteria, options, this.loweringContext(options));
      return this.run(name, prepared, options, started, "page");
    });
  }

  /**
   * The criteria a natural-language query runs as, without running it
   */
  translate(rawQuery: string): SearchCriteria {
    try {
      return this.translator.translate(rawQuery);
    } catch (error) {
      throw wrapError(error, "Failed to translate query");
    }
  }

  private prepareQuery(rawQuery: string, options: SearchOptions): PreparedQuery {
    const mode = !options.mode || options.mode === "auto" ? detectMode(rawQuery) : options.mode;
    const context = this.loweringContext(options);

    if (mode === "nl") {
      return this.prepareCriteria("nl", this.translator.translate(rawQuery), options, context);
    }

    const parsed = parseQuery(rawQuery, this.index.analyzer);
    if (!parsed.ok) throw parsed.error;
    const sortBy = options.sortBy ?? "relevance";
    return {
      mode,
      predicate: lowerQuery(parsed.value, context),
      cacheText: JSON.stringify(parsed.value),
      sortBy,
      sortOrder: options.sortOrder ?? DEFAULT_SORT_ORDER[sortBy],
    };
  }

  private loweringContext(options: SearchOptions): LoweringContext {
    return {
      analyzer: this.index.analyzer,
      strict: options.strict ?? this.config.search.strict,
      now: this.clock(),
    };
  }

  private prepareCriteria(
    mode: ResponseMode,
    criteria: SearchCriteria,
    options: SearchOptions,
    context: LoweringContext
  ): PreparedQuery {
    const sortBy = options.sortBy ?? criteria.sortBy;
    const sortOrder =
      options.sortOrder ?? (options.sortBy === undefined ? criteria.sortOrder : DEFAULT_SORT_ORDER[sortBy]);
    return {
      mode,
      predicate: lowerCriteria(criteria, context),
      cacheText: JSON.stringify({ ...criteria, limit: undefined, offset: undefined }),
      criteria,
      sortBy,
      sortOrder,
    };
  }

  private async run(
    query: string,
    prepared: PreparedQuery,
    options: SearchOptions,
    started: number,
    paging: "page" | "all"
  ): Promise<SearchResponse> {
    if (options.signal?.aborted) throw new SearchCancelledError();

    const snapshot = this.index.snapshot();
    const key = [snapshot.version, prepared.sortBy, prepared.sortOrder, prepared.cacheText].join("|");

    let entry = this.cache.get(key);
    if (!entry) {
      const candidates = await execute(prepared.predicate, snapshot, { signal: options.signal });
      entry = {
        ranked: this.ranker.rank(candidates, {
          sortBy: prepared.sortBy,
          sortOrder: prepared.sortOrder,
          now: this.clock(),
        }),
        facets: aggregateFacets(
          candidates.map((candidate) => candidate.record),
          this.config.facets.fields,
          this.config.facets.topN
        ),
      };
      this.cache.set(key, entry);
    }

    const { items, page, pageSize } =
      paging === "all"
        ? { items: entry.ranked, page: 1, pageSize: entry.ranked.length }
        : this.page(entry.ranked, prepared.criteria, options);
    const response: SearchResponse = {
      query,
      items,
      totalCount: entry.ranked.length,
      facets: entry.facets,
      suggestions:
        query === "" ? [] : this.suggestions.suggest(query, snapshot.vocabulary(), RESPONSE_SUGGESTIONS),
      elapsedMs: performance.now() - started,
      mode: prepared.mode,
      page,
      pageSize,
      degraded: snapshot.degraded,
    };
    if (prepared.criteria) response.criteria = prepared.criteria;

    this.logger.debug(
      { mode: prepared.mode, totalCount: response.totalCount, version: snapshot.version, elapsedMs: response.elapsedMs },
      "Search complete"
    );
    return response;
  }

  private page(
    ranked: SearchResult[],
    criteria: SearchCriteria | undefined,
    options: SearchOptions
  ): { items: SearchResult[]; page: number; pageSize: number } {
    const maxPageSize = this.config.search.maxPageSize;
    const criteriaLimit = options.page === undefined && options.pageSize === undefined ? criteria?.limit : undefined;

    if (criteriaLimit !== undefined) {
      const limit = Math.min(criteriaLimit, maxPageSize);
      const offset = criteria?.offset ?? 0;
      return {
        items: ranked.slice(offset, offset + limit),
        page: Math.floor(offset / limit) + 1,
        pageSize: limit,
      };
    }

    const page = Math.max(1, Math.floor(options.page ?? 1));
    const pageSize = Math.min(Math.max(1, Math.floor(options.pageSize ?? this.config.search.defaultPageSize)), maxPageSize);
    return { items: paginate(ranked, page, pageSize), page, pageSize };
  }

  // ==========================================================================
  // Templates
  // ==========================================================================

  async saveTemplate(
    name: string,
    criteria: SearchCriteriaInput,
    options: CreateTemplateOptions = {}
  ): Promise<SearchTemplate> {
    return this.guard("Failed to save template", () => this.templates.create(name, criteria, options));
  }

  /**
   * @throws {TemplateNotFoundError}
   */
  async loadTemplate(name: string): Promise<SearchCriteria> {
    return this.guard("Failed to load template", async () => (await this.templates.get(name)).criteria);
  }

  async getTemplate(name: string): Promise<SearchTemplate> {
    return this.guard("Failed to load template", () => this.templates.get(name));
  }

  async listTemplates(): Promise<string[]> {
    return this.guard("Failed to list templates", () => this.templates.list());
  }

  async updateTemplate(name: string, update: TemplateUpdate): Promise<SearchTemplate> {
    return this.guard("Failed to update template", () => this.templates.update(name, update));
  }

  async deleteTemplate(name: string): Promise<void> {
    return this.guard("Failed to delete template", () => this.templates.delete(name));
  }

  // ==========================================================================
  // Suggestions and analytics
  // ==========================================================================

  suggest(partialQuery: string, limit?: number): string[] {
    try {
      return this.suggestions.suggest(partialQuery, this.index.snapshot().vocabulary(), limit);
    } catch (error) {
      throw wrapError(error, "Failed to build suggestions");
    }
  }

  analytics(): SearchAnalytics {
    return this.suggestions.analytics();
  }

  /**
   * Resolves once recorded searches are reflected in suggestions and analytics
   */
  async flushHistory(): Promise<void> {
    await this.suggestions.flush();
  }

  statistics(): EngineStatistics {
    const cache = this.cache.stats();
    return {
      index: this.index.statistics(),
      templates: this.templates.size,
      cache: { size: cache.size, maxSize: cache.maxSize, hits: cache.hits, misses: cache.misses, hitRate: cache.hitRate },
    };
  }

  exportResults(response: SearchResponse, format: ExportFormat): string {
    return exportResults(response, format);
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * @throws {ValidationError} INVALID_RECORD when the record fails validation
   */
  async onRecordCreated(record: unknown): Promise<void> {
    return this.guard("Failed to index record", () => this.index.upsert(this.validateRecord(record)));
  }

  async onRecordUpdated(record: unknown): Promise<void> {
    return this.guard("Failed to index record", () => this.index.upsert(this.validateRecord(record)));
  }

  /**
   * @returns Whether the record was indexed
   */
  async onRecordDeleted(id: string): Promise<boolean> {
    return this.guard("Failed to remove record", () => this.index.remove(id));
  }

  /**
   * Subscribes to an ingestion event bus
   *
   * @returns Detach function
   */
  attach(bus: EventBus<IngestionEvents>): () => void {
    const report = (event: keyof IngestionEvents) => (error: unknown) =>
      this.logger.error({ err: error, event }, "Ingestion event failed");

    const unsubscribers = [
      bus.on("record:created", (record) => {
        this.onRecordCreated(record).catch(report("record:created"));
      }),
      bus.on("record:updated", (record) => {
        this.onRecordUpdated(record).catch(report("record:updated"));
      }),
      bus.on("record:deleted", ({ id }) => {
        this.onRecordDeleted(id).catch(report("record:deleted"));
      }),
    ];
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  /**
   * Waits for queued record changes and, when the engine was opened with
   * persistence, writes the index.
   */
  async save(): Promise<void> {
    return this.guard("Failed to save index", async () => {
      await this.index.flush();
      if (this.indexPath) await this.index.save(this.indexPath);
    });
  }

  private validateRecord(record: unknown): MediaRecord {
    return validate(MediaRecordSchema, record, "INVALID_RECORD", "media record");
  }

  private async guard<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const wrapped = wrapError(error, operation);
      if (wrapped.kind === "UNKNOWN") {
        this.logger.error({ err: error }, operation);
      }
      throw wrapped;
    }
  }
}
