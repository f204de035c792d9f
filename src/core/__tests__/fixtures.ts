/**
 * Shared test fixtures
 */

import { MediaRecordSchema, type MediaRecord, type MediaRecordInput } from "../../utils/validation.js";

export const NOW = new Date("2024-06-15T12:00:00.000Z");

/**
 * A valid record with neutral defaults for everything not overridden
 */
export function makeRecord(overrides: Partial<MediaRecordInput> & { id: string }): MediaRecord {
  return MediaRecordSchema.parse({
    fileType: "video",
    createdAt: "2024-06-01T00:00:00.000Z",
    modifiedAt: "2024-06-01T00:00:00.000Z",
    fileSizeBytes: 1000,
    ...overrides,
  });
}

/**
 * The two records most scenarios run against
 */
export function taipeiRecords(): MediaRecord[] {
  return [
    makeRecord({ id: "R1", title: "Taipei sunset interview", mood: "happy", fileSizeBytes: 500_000 }),
    makeRecord({ id: "R2", title: "Taipei rain report", mood: "sad", fileSizeBytes: 2_000_000 }),
  ];
}
