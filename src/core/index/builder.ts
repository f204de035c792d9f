/**
 * Snapshot Builder
 *
 * Applies a batch of mutations on top of a base snapshot, copying only what
 * the batch touches: the record store, the touched field segments, and within
 * them the touched tokens' posting maps. Everything else is shared with the
 * base snapshot.
 *
 * @module
 */

import { TEXT_FIELDS, type MediaRecord, type TextField } from "../../types/index.js";
import type { Analyzer } from "../query/analyzer.js";
import { IndexSnapshot, type FieldSegment, type TokenPostings } from "./snapshot.js";

type WritablePostings = Map<string, readonly number[]>;
type WritableSegment = Map<string, TokenPostings>;

/**
 * Raw values of each text field; multi-valued fields keep one entry per value
 */
export function fieldValues(record: MediaRecord, field: TextField): string[] {
  switch (field) {
    case "tags":
      return record.tags;
    case "keywords":
      return record.keywords;
    default:
      return [record[field]];
  }
}

/**
 * token → ascending positions for one field of a record. Values of a
 * multi-valued field are separated by a gap so phrases never span two values.
 */
export function fieldTokens(analyzer: Analyzer, record: MediaRecord, field: TextField): Map<string, number[]> {
  const tokens = new Map<string, number[]>();
  let offset = 0;

  for (const value of fieldValues(record, field)) {
    let last = -1;
    for (const { term, position } of analyzer.analyzeForIndex(value)) {
      const absolute = offset + position;
      const positions = tokens.get(term);
      if (positions) {
        positions.push(absolute);
      } else {
        tokens.set(term, [absolute]);
      }
      last = Math.max(last, position);
    }
    offset += last + 2;
  }

  return tokens;
}

/**
 * Freezes a record and its arrays so readers can share it safely
 */
export function freezeRecord(record: MediaRecord): MediaRecord {
  const tags = [...record.tags];
  const keywords = [...record.keywords];
  const technicalAttrs = { ...record.technicalAttrs };
  Object.freeze(tags);
  Object.freeze(keywords);
  Object.freeze(technicalAttrs);
  return Object.freeze({ ...record, tags, keywords, technicalAttrs });
}

export class SnapshotBuilder {
  private records: Map<string, MediaRecord> | null = null;
  private readonly segments = new Map<TextField, WritableSegment>();
  private readonly ownedPostings = new Map<TextField, Map<string, WritablePostings>>();
  private all: Map<string, ReadonlyMap<string, number>> | null = null;
  private readonly ownedAll = new Map<string, Map<string, number>>();
  private changed = false;

  constructor(
    private readonly base: IndexSnapshot,
    private readonly analyzer: Analyzer
  ) {}

  /**
   * Full replace of any record with the same id.
   *
   * @returns true when a record was replaced
   */
  upsert(record: MediaRecord): boolean {
    const frozen = freezeRecord(record);
    const existing = this.currentRecord(frozen.id);
    if (existing) {
      this.unpost(existing);
    }
    this.post(frozen);
    this.writableRecords().set(frozen.id, frozen);
    this.changed = true;
    return existing !== undefined;
  }

  /**
   * @returns true when a record was removed
   */
  remove(id: string): boolean {
    const existing = this.currentRecord(id);
    if (!existing) return false;
    this.unpost(existing);
    this.writableRecords().delete(id);
    this.changed = true;
    return true;
  }

  has(id: string): boolean {
    return this.currentRecord(id) !== undefined;
  }

  /**
   * Publishes the batch. Returns the base unchanged when nothing was applied.
   */
  build(): IndexSnapshot {
    if (!this.changed) return this.base;

    const fields = new Map<TextField, FieldSegment>(this.base.fields);
    for (const [field, segment] of this.segments) {
      const owned = this.ownedPostings.get(field);
      if (owned) {
        for (const [token, postings] of owned) {
          if (postings.size === 0) segment.delete(token);
        }
      }
      fields.set(field, segment);
    }

    let all = this.base.all;
    if (this.all) {
      for (const [token, counts] of this.ownedAll) {
        if (counts.size === 0) this.all.delete(token);
      }
      all = this.all;
    }

    return new IndexSnapshot(
      this.base.version + 1,
      this.records ?? this.base.records,
      fields,
      all,
      this.base.degraded
    );
  }

  // ==========================================================================
  // Internal Methods
  // ==========================================================================

  private currentRecord(id: string): MediaRecord | undefined {
    return (this.records ?? this.base.records).get(id);
  }

  private post(record: MediaRecord): void {
    for (const field of TEXT_FIELDS) {
      for (const [token, positions] of fieldTokens(this.analyzer, record, field)) {
        Object.freeze(positions);
        this.writablePostings(field, token).set(record.id, positions);
        const counts = this.writableAll(token);
        counts.set(record.id, (counts.get(record.id) ?? 0) + positions.length);
      }
    }
  }

  private unpost(record: MediaRecord): void {
    for (const field of TEXT_FIELDS) {
      for (const token of fieldTokens(this.analyzer, record, field).keys()) {
        this.writablePostings(field, token).delete(record.id);
        this.writableAll(token).delete(record.id);
      }
    }
  }

  private writableRecords(): Map<string, MediaRecord> {
    if (!this.records) {
      this.records = new Map(this.base.records);
    }
    return this.records;
  }

  private writableSegment(field: TextField): WritableSegment {
    let segment = this.segments.get(field);
    if (!segment) {
      segment = new Map(this.base.segment(field));
      this.segments.set(field, segment);
    }
    return segment;
  }

  private writablePostings(field: TextField, token: string): WritablePostings {
    let owned = this.ownedPostings.get(field);
    if (!owned) {
      owned = new Map();
      this.ownedPostings.set(field, owned);
    }

    const segment = this.writableSegment(field);
    let postings = owned.get(token);
    if (!postings) {
      const shared = segment.get(token);
      postings = shared ? new Map(shared) : new Map<string, readonly number[]>();
      owned.set(token, postings);
    }
    segment.set(token, postings);
    return postings;
  }

  private writableAll(token: string): Map<string, number> {
    if (!this.all) {
      this.all = new Map(this.base.all);
    }
    let counts = this.ownedAll.get(token);
    if (!counts) {
      const shared = this.all.get(token);
      counts = shared ? new Map(shared) : new Map<string, number>();
      this.ownedAll.set(token, counts);
    }
    this.all.set(token, counts);
    return counts;
  }
}
