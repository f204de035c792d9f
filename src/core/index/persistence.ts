/**
 * Index Persistence
 *
 * Snapshot file layout: `{schemaVersion, records[], postings: field → token → [ids]}`.
 * On load the postings are rebuilt from the records and compared with the
 * persisted ones; any disagreement is treated as corruption.
 *
 * @module
 */

import { TEXT_FIELDS, isTextField } from "../../types/index.js";
import { IndexCorruptionError, SchemaVersionError } from "../errors.js";
import { IndexFileSchema, VersionedFileSchema, formatZodError, type IndexFile } from "../../utils/validation.js";
import { compareStrings } from "../../utils/index.js";
import type { Analyzer } from "../query/analyzer.js";
import { SnapshotBuilder } from "./builder.js";
import { IndexSnapshot } from "./snapshot.js";

export const INDEX_SCHEMA_VERSION = 1;

type PersistedPostings = IndexFile["postings"];

const NO_TOKENS: Readonly<Record<string, string[]>> = {};

/**
 * Serializes a snapshot with records, tokens and ids in sorted order
 */
export function serializeSnapshot(snapshot: IndexSnapshot): IndexFile {
  const records = [...snapshot.records.values()].sort((a, b) => compareStrings(a.id, b.id));

  // fromEntries defines own keys, so tokens such as "__proto__" survive
  const postings: PersistedPostings = Object.fromEntries(
    TEXT_FIELDS.map((field) => [
      field,
      Object.fromEntries(
        [...snapshot.segment(field).keys()]
          .sort(compareStrings)
          .map((token) => [token, [...snapshot.postings(field, token).keys()].sort(compareStrings)])
      ),
    ])
  );

  return { schemaVersion: INDEX_SCHEMA_VERSION, records, postings };
}

/**
 * Rebuilds a snapshot from persisted data.
 *
 * @throws {SchemaVersionError} When the file was written by another schema version
 * @throws {IndexCorruptionError} When the file fails validation or its postings
 *   disagree with its records
 */
export function restoreSnapshot(data: unknown, analyzer: Analyzer): IndexSnapshot {
  const versioned = VersionedFileSchema.safeParse(data);
  if (!versioned.success) {
    throw new IndexCorruptionError("Index snapshot is not an object");
  }
  if (versioned.data.schemaVersion !== INDEX_SCHEMA_VERSION) {
    throw new SchemaVersionError("Index snapshot", INDEX_SCHEMA_VERSION, versioned.data.schemaVersion);
  }

  const parsed = IndexFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new IndexCorruptionError("Index snapshot failed validation", {
      issues: formatZodError(parsed.error),
    });
  }

  const builder = new SnapshotBuilder(IndexSnapshot.empty(), analyzer);
  for (const record of parsed.data.records) {
    if (builder.has(record.id)) {
      throw new IndexCorruptionError(`Duplicate record id "${record.id}"`, { id: record.id });
    }
    builder.upsert(record);
  }
  const snapshot = builder.build();

  const mismatch = findPostingMismatch(snapshot, parsed.data.postings);
  if (mismatch) {
    throw new IndexCorruptionError("Persisted postings do not match the records", mismatch);
  }

  return snapshot;
}

function findPostingMismatch(snapshot: IndexSnapshot, persisted: PersistedPostings): Record<string, unknown> | null {
  // Maps, so inherited Object.prototype members never read as tokens
  const persistedFields = new Map(Object.entries(persisted));
  const fields = new Set<string>([...TEXT_FIELDS, ...persistedFields.keys()]);

  for (const field of fields) {
    const actual = new Map(Object.entries(persistedFields.get(field) ?? NO_TOKENS));
    const segment = isTextField(field) ? snapshot.segment(field) : undefined;
    const tokens = new Set([...(segment?.keys() ?? []), ...actual.keys()]);

    for (const token of tokens) {
      const expectedIds = [...(segment?.get(token)?.keys() ?? [])].sort(compareStrings);
      const actualIds = [...(actual.get(token) ?? [])].sort(compareStrings);
      if (expectedIds.length !== actualIds.length || expectedIds.some((id, i) => id !== actualIds[i])) {
        return { field, token };
      }
    }
  }
  return null;
}
