/**
 * Inverted index with copy-on-write snapshots
 *
 * @module
 */

export { MediaIndex, type MediaIndexOptions } from "./media-index.js";
export { IndexSnapshot, type FieldSegment, type TokenPostings, type AllFieldsSegment } from "./snapshot.js";
export { SnapshotBuilder, fieldTokens, fieldValues, freezeRecord } from "./builder.js";
export { INDEX_SCHEMA_VERSION, serializeSnapshot, restoreSnapshot } from "./persistence.js";
