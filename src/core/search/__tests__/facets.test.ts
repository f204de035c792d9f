/**
 * Facet Aggregator Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { aggregateFacets } from "../facets.js";
import { makeRecord } from "../../__tests__/fixtures.js";

describe("aggregateFacets", () => {
  const records = [
    makeRecord({ id: "R1", fileType: "video", mood: "happy", tags: ["city", "dusk", "city"] }),
    makeRecord({ id: "R2", fileType: "video", mood: "sad", tags: ["city"] }),
    makeRecord({ id: "R3", fileType: "image" }),
  ];

  it("should count values by descending count then ascending value", () => {
    expect(aggregateFacets(records, ["fileType", "category", "mood", "tags"], 10)).toEqual({
      fileType: [
        { value: "video", count: 2 },
        { value: "image", count: 1 },
      ],
      category: [],
      mood: [
        { value: "happy", count: 1 },
        { value: "sad", count: 1 },
      ],
      tags: [
        { value: "city", count: 2 },
        { value: "dusk", count: 1 },
      ],
    });
  });

  it("should sum single-valued counts to the records that have a value", () => {
    const facets = aggregateFacets(records, ["fileType", "mood"], 10);
    expect(facets.fileType?.reduce((sum, { count }) => sum + count, 0)).toBe(3);
    expect(facets.mood?.reduce((sum, { count }) => sum + count, 0)).toBe(2);
  });

  it("should cap each field at top-N", () => {
    expect(aggregateFacets(records, ["fileType"], 1)).toEqual({ fileType: [{ value: "video", count: 2 }] });
  });
});
