/**
 * Facet Aggregator
 *
 * @module
 */

import type { FacetField, Facets, FacetValue, MediaRecord } from "../../types/index.js";
import { compareStrings } from "../../utils/index.js";

function facetValues(record: MediaRecord, field: FacetField): string[] {
  if (field === "tags") {
    return [...new Set(record.tags.filter((tag) => tag !== ""))];
  }
  const value = record[field];
  return value === "" ? [] : [value];
}

/**
 * Counts values over the whole candidate set, count descending then value
 * ascending, at most `topN` per field. A record counts once per distinct tag;
 * empty values are not counted.
 */
export function aggregateFacets(records: Iterable<MediaRecord>, fields: readonly FacetField[], topN: number): Facets {
  const counts = new Map<FacetField, Map<string, number>>();
  for (const field of fields) counts.set(field, new Map());

  for (const record of records) {
    for (const [field, tally] of counts) {
      for (const value of facetValues(record, field)) {
        tally.set(value, (tally.get(value) ?? 0) + 1);
      }
    }
  }

  const facets: Facets = {};
  for (const [field, tally] of counts) {
    facets[field] = [...tally]
      .map(([value, count]): FacetValue => ({ value, count }))
      .sort((a, b) => b.count - a.count || compareStrings(a.value, b.value))
      .slice(0, topN);
  }
  return facets;
}
