/**
 * Ranker
 *
 * Scores candidates and orders them. Relevance is
 *
 *   Σ tf × fieldWeight + phraseBonus + fieldMatchBonus × fieldMatches + recency
 *
 * where recency decays with a half-life on `modifiedAt`. An explicit sort key
 * replaces relevance entirely; ties always break by record id ascending.
 *
 * @module
 */

import type { RankingConfig, SearchResult, SortBy, SortOrder, TextField } from "../../types/index.js";
import { compareStrings } from "../../utils/index.js";
import { DAY_MS } from "../query/values.js";
import type { Candidate } from "./executor.js";

export interface RankOptions {
  sortBy: SortBy;
  sortOrder: SortOrder;
  now: Date;
}

export class Ranker {
  constructor(private readonly config: RankingConfig) {}

  score(candidate: Candidate, now: Date): number {
    const { evidence, record } = candidate;
    let score = 0;

    for (const [field, frequency] of Object.entries(evidence.termFrequency)) {
      score += (frequency ?? 0) * this.weight(field);
    }
    if (evidence.phraseHits > 0) score += this.config.phraseBonus;
    score += this.config.fieldMatchBonus * evidence.fieldMatches;

    const modified = Date.parse(record.modifiedAt);
    if (!Number.isNaN(modified) && this.config.recencyWeight > 0) {
      const ageDays = Math.max(0, (now.getTime() - modified) / DAY_MS);
      score += this.config.recencyWeight * 0.5 ** (ageDays / this.config.recencyHalfLifeDays);
    }

    return score;
  }

  /**
   * Scores and fully orders the candidates
   */
  rank(candidates: readonly Candidate[], options: RankOptions): SearchResult[] {
    const results = candidates.map(
      (candidate): SearchResult => ({
        recordId: candidate.recordId,
        score: this.score(candidate, options.now),
        record: candidate.record,
        matchedFields: matchedFields(candidate),
        spans: candidate.evidence.spans,
      })
    );

    const direction = options.sortOrder === "asc" ? 1 : -1;
    const compareKey = sortKey(options.sortBy);
    return results.sort(
      (a, b) => direction * compareKey(a, b) || compareStrings(a.recordId, b.recordId)
    );
  }

  private weight(field: string): number {
    switch (field) {
      case "title":
      case "description":
      case "tags":
      case "keywords":
      case "category":
      case "mood":
        return this.config.fieldWeights[field];
      default:
        return 0;
    }
  }
}

function matchedFields(candidate: Candidate): TextField[] {
  const fields: TextField[] = [];
  for (const span of candidate.evidence.spans) {
    if (!fields.includes(span.field)) fields.push(span.field);
  }
  return fields;
}

function sortKey(sortBy: SortBy): (a: SearchResult, b: SearchResult) => number {
  switch (sortBy) {
    case "relevance":
      return (a, b) => a.score - b.score;
    case "date":
      return (a, b) => Date.parse(a.record.createdAt) - Date.parse(b.record.createdAt);
    case "name":
      return (a, b) => compareStrings(a.record.title.toLowerCase(), b.record.title.toLowerCase());
    case "size":
      return (a, b) => a.record.fileSizeBytes - b.record.fileSizeBytes;
    case "type":
      return (a, b) => compareStrings(a.record.fileType.toLowerCase(), b.record.fileType.toLowerCase());
  }
}

/**
 * One page of an ordered list; pages are 1-based
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): T[] {
  const start = (page - 1) * pageSize;
  return items.slice(start, start + pageSize);
}
