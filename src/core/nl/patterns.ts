/**
 * Date and size expressions in natural-language queries
 *
 * Both finders take normalized text and return the first expression found
 * with its span, so the caller can blank it out.
 *
 * @module
 */

import type { DateRange, SizeRange } from "../../types/index.js";
import { DAY_MS, dayEndIso, dayStartIso, unitMultiplier } from "../query/values.js";

export interface Found<T> {
  start: number;
  end: number;
  range: T;
}

const ISO_DAY = String.raw`(\d{4}-\d{2}-\d{2})`;
const UNIT = String.raw`(bytes|byte|kb|mb|gb|tb|b)`;
const NUMBER = String.raw`(\d+(?:\.\d+)?)`;

const DAYS_PER_UNIT: Record<string, number> = { day: 1, week: 7, month: 30, year: 365 };

function dayTime(day: string): number | null {
  const time = Date.parse(`${day}T00:00:00.000Z`);
  return Number.isNaN(time) ? null : time;
}

function pad(value: string): string {
  return value.padStart(2, "0");
}

type DateRule = (match: RegExpExecArray) => DateRange | null;

const DATE_RULES: ReadonlyArray<[RegExp, DateRule]> = [
  [
    new RegExp(String.raw`\bbetween\s+${ISO_DAY}\s+and\s+${ISO_DAY}\b`),
    (m) => {
      const from = dayTime(m[1] ?? "");
      const to = dayTime(m[2] ?? "");
      return from === null || to === null ? null : { from: dayStartIso(from), to: dayEndIso(to) };
    },
  ],
  [
    new RegExp(String.raw`\b(since|from|after)\s+${ISO_DAY}\b`),
    (m) => {
      const time = dayTime(m[2] ?? "");
      if (time === null) return null;
      return { from: dayStartIso(m[1] === "after" ? time + DAY_MS : time) };
    },
  ],
  [
    new RegExp(String.raw`\b(before|until)\s+${ISO_DAY}\b`),
    (m) => {
      const time = dayTime(m[2] ?? "");
      if (time === null) return null;
      return { to: m[1] === "until" ? dayEndIso(time) : dayEndIso(time - DAY_MS) };
    },
  ],
  [
    /\b(?:last|past|previous)\s+(\d+)\s+(day|week|month|year)s?\b/,
    (m) => ({ lastDays: Number(m[1]) * (DAYS_PER_UNIT[m[2] ?? "day"] ?? 1) }),
  ],
];

const DAY_RULES: ReadonlyArray<[RegExp, (m: RegExpExecArray) => string]> = [
  [new RegExp(String.raw`\b${ISO_DAY}\b`), (m) => m[1] ?? ""],
  [/(\d{4})年(\d{1,2})月(\d{1,2})日/, (m) => `${m[1]}-${pad(m[2] ?? "")}-${pad(m[3] ?? "")}`],
  [/\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/, (m) => `${m[3]}-${pad(m[1] ?? "")}-${pad(m[2] ?? "")}`],
];

/**
 * Finds a date expression. Explicit ranges and "last N days" come first,
 * then the date keywords (longest first), then a bare date meaning that day.
 */
export function findDateExpression(
  text: string,
  dateKeywords: ReadonlyArray<[string, number]>
): Found<DateRange> | null {
  for (const [pattern, build] of DATE_RULES) {
    const match = pattern.exec(text);
    if (!match) continue;
    const range = build(match);
    if (range) return { start: match.index, end: match.index + match[0].length, range };
  }

  for (const [phrase, days] of dateKeywords) {
    const span = findPhrase(text, phrase);
    if (span) return { ...span, range: { lastDays: days } };
  }

  for (const [pattern, toDay] of DAY_RULES) {
    const match = pattern.exec(text);
    if (!match) continue;
    const time = dayTime(toDay(match));
    if (time === null) continue;
    return {
      start: match.index,
      end: match.index + match[0].length,
      range: { from: dayStartIso(time), to: dayEndIso(time) },
    };
  }

  return null;
}

const SIZE_BETWEEN = new RegExp(String.raw`\bbetween\s+${NUMBER}\s*${UNIT}?\s+and\s+${NUMBER}\s*${UNIT}\b`);
const SIZE_COMPARISON = new RegExp(
  String.raw`\b(larger than|bigger than|greater than|more than|over|above|at least|smaller than|less than|under|below|at most)\s+${NUMBER}\s*${UNIT}\b`
);

/**
 * Finds a size expression such as "larger than 5mb", "under 500 kb" or
 * "between 1mb and 5mb". A unit is required.
 */
export function findSizeExpression(text: string): Found<SizeRange> | null {
  const between = SIZE_BETWEEN.exec(text);
  if (between) {
    const upperUnit = unitMultiplier(between[4]) ?? 1;
    const lowerUnit = between[2] ? unitMultiplier(between[2]) ?? 1 : upperUnit;
    return {
      start: between.index,
      end: between.index + between[0].length,
      range: {
        min: Math.ceil(Number(between[1]) * lowerUnit),
        max: Math.floor(Number(between[3]) * upperUnit),
      },
    };
  }

  const comparison = SIZE_COMPARISON.exec(text);
  if (!comparison) return null;

  const bytes = Number(comparison[2]) * (unitMultiplier(comparison[3]) ?? 1);
  const span = { start: comparison.index, end: comparison.index + comparison[0].length };
  switch (comparison[1]) {
    case "at least":
      return { ...span, range: { min: Math.ceil(bytes) } };
    case "at most":
      return { ...span, range: { max: Math.floor(bytes) } };
    case "smaller than":
    case "less than":
    case "under":
    case "below":
      return { ...span, range: { max: Math.max(0, Math.ceil(bytes) - 1) } };
    default:
      return { ...span, range: { min: Math.floor(bytes) + 1 } };
  }
}

/**
 * Phrase occurrence with word boundaries on Latin edges
 */
function findPhrase(text: string, phrase: string): { start: number; end: number } | null {
  const wordChar = /[\p{L}\p{N}]/u;
  const cjk = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;
  let from = 0;
  for (;;) {
    const start = text.indexOf(phrase, from);
    if (start === -1) return null;
    const end = start + phrase.length;
    const before = text.charAt(start - 1);
    const after = text.charAt(end);
    const leftOk = start === 0 || !wordChar.test(before) || cjk.test(before) || cjk.test(phrase.charAt(0));
    const rightOk = end >= text.length || !wordChar.test(after) || cjk.test(after) || cjk.test(phrase.charAt(phrase.length - 1));
    if (leftOk && rightOk) return { start, end };
    from = start + 1;
  }
}
