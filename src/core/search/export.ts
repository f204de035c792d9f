/**
 * Result export
 *
 * @module
 */

import type { ExportFormat, SearchResponse } from "../../types/index.js";

export const CSV_COLUMNS = ["id", "title", "fileType", "path", "score", "category", "mood", "tags", "createdAt"] as const;

/**
 * Quotes a CSV field when it contains a comma, quote, CR or LF (RFC 4180)
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatScore(score: number): string {
  return String(Math.round(score * 10_000) / 10_000);
}

/**
 * Renders the page of results a response holds
 */
export function exportResults(response: SearchResponse, format: ExportFormat): string {
  if (format === "json") {
    return JSON.stringify(
      {
        query: response.query,
        totalCount: response.totalCount,
        page: response.page,
        pageSize: response.pageSize,
        items: response.items.map((item) => ({ score: item.score, ...item.record })),
      },
      null,
      2
    );
  }

  const lines = [CSV_COLUMNS.join(",")];
  for (const { record, score } of response.items) {
    const row = [
      record.id,
      record.title,
      record.fileType,
      record.path,
      formatScore(score),
      record.category,
      record.mood,
      record.tags.join(";"),
      record.createdAt,
    ];
    lines.push(row.map(csvField).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}
