/**
 * Index Snapshot
 *
 * An immutable, point-in-time view of the record store and its postings.
 * Snapshots share unchanged field segments and token posting maps with the
 * snapshot they were derived from; nothing reachable from a published
 * snapshot is ever mutated.
 *
 * @module
 */

import { TEXT_FIELDS, type MediaRecord, type TextField } from "../../types/index.js";

/** record id → ascending positions of the token in the field */
export type TokenPostings = ReadonlyMap<string, readonly number[]>;

/** token → postings, for one field */
export type FieldSegment = ReadonlyMap<string, TokenPostings>;

/** token → record id → occurrences across every text field */
export type AllFieldsSegment = ReadonlyMap<string, ReadonlyMap<string, number>>;

const EMPTY_POSTINGS: TokenPostings = new Map();
const EMPTY_SEGMENT: FieldSegment = new Map();

export class IndexSnapshot {
  constructor(
    readonly version: number,
    readonly records: ReadonlyMap<string, MediaRecord>,
    readonly fields: ReadonlyMap<TextField, FieldSegment>,
    readonly all: AllFieldsSegment,
    readonly degraded: boolean = false
  ) {
    Object.freeze(this);
  }

  static empty(degraded = false): IndexSnapshot {
    const fields = new Map<TextField, FieldSegment>();
    for (const field of TEXT_FIELDS) fields.set(field, new Map());
    return new IndexSnapshot(0, new Map(), fields, new Map(), degraded);
  }

  get size(): number {
    return this.records.size;
  }

  getRecord(id: string): MediaRecord | undefined {
    return this.records.get(id);
  }

  segment(field: TextField): FieldSegment {
    return this.fields.get(field) ?? EMPTY_SEGMENT;
  }

  postings(field: TextField, token: string): TokenPostings {
    return this.segment(field).get(token) ?? EMPTY_POSTINGS;
  }

  /**
   * Ids of records containing the token, in one field or in any field
   */
  lookup(token: string, field?: TextField): Set<string> {
    if (field) {
      return new Set(this.postings(field, token).keys());
    }
    return new Set(this.all.get(token)?.keys());
  }

  /**
   * Number of records containing the token in any field
   */
  documentFrequency(token: string): number {
    return this.all.get(token)?.size ?? 0;
  }

  /**
   * Every token with its document frequency
   */
  *vocabulary(): IterableIterator<[string, number]> {
    for (const [token, ids] of this.all) {
      yield [token, ids.size];
    }
  }

  vocabularySize(field: TextField): number {
    return this.segment(field).size;
  }
}
