/**
 * Query Executor
 *
 * Evaluates a predicate against one index snapshot. Sets are evaluated
 * first; match evidence (term frequencies, spans, phrase hits) is gathered
 * afterwards for the surviving candidates only.
 *
 * @module
 */

import { TEXT_FIELDS, type MatchSpan, type MediaRecord, type TextField } from "../../types/index.js";
import { nextTick } from "../../utils/async.js";
import { compareStrings } from "../../utils/index.js";
import { SearchCancelledError } from "../errors.js";
import type { IndexSnapshot } from "../index/snapshot.js";
import { positiveLeaves, type Predicate } from "./predicate.js";

type TextPredicate = Extract<Predicate, { kind: "text" }>;

export interface MatchEvidence {
  /** Occurrences per field, counting a phrase occurrence once */
  termFrequency: Partial<Record<TextField, number>>;
  /** Positive phrase leaves that matched */
  phraseHits: number;
  /** Positive field-scoped leaves (scoped text and attribute filters) that matched */
  fieldMatches: number;
  spans: MatchSpan[];
}

export interface Candidate {
  recordId: string;
  record: MediaRecord;
  evidence: MatchEvidence;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** Records scanned between yields to the event loop */
const YIELD_INTERVAL = 1024;

/**
 * Evaluates the predicate and returns matching records with their evidence,
 * ordered by record id. Long scans yield to the event loop, so other work
 * runs meanwhile and an abort takes effect mid-search.
 *
 * @throws {SearchCancelledError} When the signal aborts
 */
export async function execute(
  predicate: Predicate,
  snapshot: IndexSnapshot,
  options: ExecuteOptions = {}
): Promise<Candidate[]> {
  const evaluator = new Evaluator(snapshot, options.signal);
  const ids = [...(await evaluator.evaluate(predicate))].sort(compareStrings);
  const leaves = positiveLeaves(predicate);

  const candidates: Candidate[] = [];
  for (const id of ids) {
    await evaluator.step();
    const record = snapshot.getRecord(id);
    if (!record) continue;
    candidates.push({ recordId: id, record, evidence: evaluator.evidence(id, record, leaves) });
  }
  evaluator.checkAborted();
  return candidates;
}

class Evaluator {
  private scanned = 0;

  constructor(
    private readonly snapshot: IndexSnapshot,
    private readonly signal: AbortSignal | undefined
  ) {}

  checkAborted(): void {
    if (this.signal?.aborted) {
      const reason: unknown = this.signal.reason;
      throw new SearchCancelledError(reason instanceof Error ? reason.message : undefined);
    }
  }

  /**
   * Counts one scanned record; every YIELD_INTERVAL records, yields a
   * macrotask and then checks the signal
   */
  async step(): Promise<void> {
    this.scanned += 1;
    if (this.scanned % YIELD_INTERVAL !== 0) return;
    await nextTick();
    this.checkAborted();
  }

  /**
   * Ids satisfying the predicate, restricted to `within` when given
   */
  async evaluate(predicate: Predicate, within?: ReadonlySet<string>): Promise<Set<string>> {
    this.checkAborted();

    switch (predicate.kind) {
      case "all": {
        const result = new Set<string>();
        for (const id of within ?? this.snapshot.records.keys()) {
          await this.step();
          result.add(id);
        }
        return result;
      }

      case "none":
        return new Set();

      case "text": {
        const matched = await this.matchText(predicate);
        return within ? intersect(matched, within) : matched;
      }

      case "attr": {
        const result = new Set<string>();
        for (const id of within ?? this.snapshot.records.keys()) {
          await this.step();
          const record = this.snapshot.getRecord(id);
          if (record && predicate.test(record)) result.add(id);
        }
        return result;
      }

      case "and": {
        // Cheapest child first so later children only scan survivors
        const ordered = [...predicate.children].sort((a, b) => this.cost(a) - this.cost(b));
        let current: ReadonlySet<string> | undefined = within;
        for (const child of ordered) {
          current = await this.evaluate(child, current);
          if (current.size === 0) break;
        }
        return current ? new Set(current) : this.evaluate({ kind: "all" });
      }

      case "or": {
        const result = new Set<string>();
        for (const child of predicate.children) {
          for (const id of await this.evaluate(child, within)) result.add(id);
        }
        return result;
      }

      case "not": {
        const excluded = await this.evaluate(predicate.child, within);
        const result = new Set<string>();
        for (const id of within ?? this.snapshot.records.keys()) {
          await this.step();
          if (!excluded.has(id)) result.add(id);
        }
        return result;
      }
    }
  }

  /**
   * Upper bound on the result size, used to order AND children
   */
  private cost(predicate: Predicate): number {
    switch (predicate.kind) {
      case "none":
        return 0;
      case "text":
        return Math.min(...predicate.terms.map(({ term }) => this.frequency(term, predicate.scope)));
      case "and":
        return Math.min(this.snapshot.size, ...predicate.children.map((child) => this.cost(child)));
      case "or":
        return predicate.children.reduce((sum, child) => sum + this.cost(child), 0);
      default:
        // Attribute scans and complements touch every record
        return this.snapshot.size + 1;
    }
  }

  private frequency(term: string, scope: TextField | "all"): number {
    return scope === "all" ? this.snapshot.documentFrequency(term) : this.snapshot.postings(scope, term).size;
  }

  private async matchText(predicate: TextPredicate): Promise<Set<string>> {
    const [first] = predicate.terms;
    if (!first) return new Set();

    if (predicate.terms.length === 1) {
      return this.snapshot.lookup(first.term, predicate.scope === "all" ? undefined : predicate.scope);
    }

    const fields = predicate.scope === "all" ? TEXT_FIELDS : [predicate.scope];
    const result = new Set<string>();
    for (const field of fields) {
      for (const id of this.snapshot.postings(field, first.term).keys()) {
        await this.step();
        if (result.has(id)) continue;
        if (this.phraseStarts(predicate.terms, field, id).length > 0) result.add(id);
      }
    }
    return result;
  }

  /**
   * Positions in the field where every term sits at its relative offset
   */
  private phraseStarts(terms: TextPredicate["terms"], field: TextField, id: string): number[] {
    const [first, ...rest] = terms;
    if (!first) return [];
    const starts = this.snapshot.postings(field, first.term).get(id) ?? [];
    if (rest.length === 0) return [...starts];

    const others = rest.map(({ term, position }) => ({
      positions: this.snapshot.postings(field, term).get(id) ?? [],
      offset: position - first.position,
    }));
    if (others.some(({ positions }) => positions.length === 0)) return [];

    return starts.filter((start) => others.every(({ positions, offset }) => contains(positions, start + offset)));
  }

  evidence(id: string, record: MediaRecord, leaves: ReturnType<typeof positiveLeaves>): MatchEvidence {
    const evidence: MatchEvidence = { termFrequency: {}, phraseHits: 0, fieldMatches: 0, spans: [] };

    for (const leaf of leaves) {
      if (leaf.kind === "attr") {
        if (leaf.test(record)) evidence.fieldMatches += 1;
        continue;
      }

      const fields = leaf.scope === "all" ? TEXT_FIELDS : [leaf.scope];
      const last = leaf.terms[leaf.terms.length - 1];
      const first = leaf.terms[0];
      const width = last && first ? last.position - first.position + 1 : 1;
      let matched = false;

      for (const field of fields) {
        const starts = this.phraseStarts(leaf.terms, field, id);
        if (starts.length === 0) continue;
        matched = true;
        evidence.termFrequency[field] = (evidence.termFrequency[field] ?? 0) + starts.length;
        for (const start of starts) {
          evidence.spans.push({ field, start, end: start + width });
        }
      }

      if (matched && leaf.phrase) evidence.phraseHits += 1;
      if (matched && leaf.scope !== "all") evidence.fieldMatches += 1;
    }

    evidence.spans.sort(
      (a, b) => TEXT_FIELDS.indexOf(a.field) - TEXT_FIELDS.indexOf(b.field) || a.start - b.start || a.end - b.end
    );
    return evidence;
  }
}

function intersect(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const result = new Set<string>();
  for (const id of small) {
    if (large.has(id)) result.add(id);
  }
  return result;
}

/**
 * Binary search over ascending positions
 */
function contains(positions: readonly number[], target: number): boolean {
  let low = 0;
  let high = positions.length - 1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const value = positions[mid];
    if (value === undefined) return false;
    if (value === target) return true;
    if (value < target) low = mid + 1;
    else high = mid - 1;
  }
  return false;
}
