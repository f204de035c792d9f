/**
 * Suggestion Model
 *
 * Best-effort frequency table of past queries, used for autocomplete and
 * search analytics. Observations are applied on a later macrotask so they
 * never sit on the query path; readers may briefly see stale counts.
 *
 * @module
 */

import type { SearchAnalytics } from "../../types/index.js";
import { nextTick, runDetached } from "../../utils/async.js";
import { compareStrings, createLogger, type Logger } from "../../utils/index.js";
import { normalizeText } from "../query/analyzer.js";

export interface SuggestionModelOptions {
  /** Distinct queries remembered; the least recently seen are forgotten first */
  maxHistory?: number;
  /** Default number of suggestions returned */
  limit?: number;
  logger?: Logger;
}

interface QueryStats {
  count: number;
  lastSeen: number;
}

interface Suggestion {
  text: string;
  /** 0 = extends the typed text, 1 = contains it */
  rank: number;
  frequency: number;
}

/** Completions offered for the field syntax of the boolean language */
export const FIELD_COMPLETIONS = [
  "category:",
  "created:",
  "description:",
  "keywords:",
  "modified:",
  "mood:",
  "path:",
  "size:",
  "tags:",
  "title:",
  "type:",
] as const;

const RECENT_LIMIT = 10;
const POPULAR_LIMIT = 10;

export class SuggestionModel {
  private readonly queries = new Map<string, QueryStats>();
  private readonly recent: string[] = [];
  private readonly maxHistory: number;
  private readonly limit: number;
  private readonly logger: Logger;
  private sequence = 0;
  private totalSearches = 0;
  private totalLength = 0;

  constructor(options: SuggestionModelOptions = {}) {
    this.maxHistory = options.maxHistory ?? 1000;
    this.limit = options.limit ?? 10;
    this.logger = options.logger ?? createLogger("suggestions");
  }

  /**
   * Records a query without waiting for the update
   */
  observe(query: string): void {
    runDetached(
      () => this.record(query),
      (error) => this.logger.warn({ err: error }, "Failed to record query")
    );
  }

  /**
   * Resolves once every observation made so far has been applied
   */
  flush(): Promise<void> {
    return nextTick();
  }

  /**
   * Completions for partially typed text: past queries, then index
   * vocabulary completing the last word, then field names. Ordered by how
   * they match (extensions before containment), then frequency, then text.
   *
   * @param vocabulary Token and document frequency pairs from the index
   */
  suggest(partial: string, vocabulary: Iterable<[string, number]> = [], limit: number = this.limit): string[] {
    const typed = normalizeText(partial);
    const found = new Map<string, Suggestion>();
    const offer = (suggestion: Suggestion): void => {
      const existing = found.get(suggestion.text);
      if (
        !existing ||
        suggestion.rank < existing.rank ||
        (suggestion.rank === existing.rank && suggestion.frequency > existing.frequency)
      ) {
        found.set(suggestion.text, suggestion);
      }
    };

    for (const [query, stats] of this.queries) {
      if (query === typed) continue;
      if (query.startsWith(typed)) {
        offer({ text: query, rank: 0, frequency: stats.count });
      } else if (query.includes(typed)) {
        offer({ text: query, rank: 1, frequency: stats.count });
      }
    }

    const lastSpace = typed.lastIndexOf(" ");
    const head = typed.slice(0, lastSpace + 1);
    const lastWord = typed.slice(lastSpace + 1);

    if (lastWord !== "" && !lastWord.includes(":")) {
      for (const [token, frequency] of vocabulary) {
        if (token !== lastWord && token.startsWith(lastWord)) {
          offer({ text: head + token, rank: 0, frequency });
        }
      }
      for (const field of FIELD_COMPLETIONS) {
        if (field.startsWith(lastWord)) {
          offer({ text: head + field, rank: 0, frequency: 0 });
        }
      }
    }

    return [...found.values()]
      .sort((a, b) => a.rank - b.rank || b.frequency - a.frequency || compareStrings(a.text, b.text))
      .slice(0, limit)
      .map((suggestion) => suggestion.text);
  }

  analytics(): SearchAnalytics {
    const popularQueries = [...this.queries]
      .map(([query, stats]) => ({ query, count: stats.count }))
      .sort((a, b) => b.count - a.count || compareStrings(a.query, b.query))
      .slice(0, POPULAR_LIMIT);

    return {
      totalSearches: this.totalSearches,
      uniqueQueries: this.queries.size,
      popularQueries,
      averageQueryLength: this.totalSearches === 0 ? 0 : this.totalLength / this.totalSearches,
      recentQueries: [...this.recent].reverse(),
    };
  }

  private record(query: string): void {
    const normalized = normalizeText(query);
    if (normalized === "") return;

    this.sequence += 1;
    this.totalSearches += 1;
    this.totalLength += normalized.length;

    const stats = this.queries.get(normalized);
    this.queries.set(normalized, { count: (stats?.count ?? 0) + 1, lastSeen: this.sequence });

    this.recent.push(normalized);
    if (this.recent.length > RECENT_LIMIT) this.recent.shift();

    if (this.queries.size > this.maxHistory) this.forgetOldest();
  }

  private forgetOldest(): void {
    let oldest: string | undefined;
    let oldestSeen = Infinity;
    for (const [query, stats] of this.queries) {
      if (stats.lastSeen < oldestSeen) {
        oldest = query;
        oldestSeen = stats.lastSeen;
      }
    }
    if (oldest !== undefined) this.queries.delete(oldest);
  }
}
