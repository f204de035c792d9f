/**
 * Text Analyzer
 *
 * Shared by the index and the query side so both normalize identically.
 * Text is NFKC-normalized, lower-cased and split into runs of letters and
 * numbers. A run of Han, Hiragana, Katakana or Hangul characters is kept
 * apart from the Latin text around it.
 *
 * Positions advance by one per non-CJK run and by one per character inside
 * a CJK run, so the same text always yields the same relative positions on
 * both sides:
 *
 * - index time: every CJK n-gram of length 1..maxGram at its start position
 * - query time: a CJK run no longer than maxGram as itself, a longer run as
 *   its maxGram-grams, which the executor then matches positionally
 *
 * @module
 */

import type { AnalyzedTerm } from "../../types/index.js";

/**
 * Splits a CJK run into words. When supplied it replaces n-gram generation
 * on both the index and the query side.
 */
export interface Segmenter {
  segment(run: string): string[];
}

export interface AnalyzerOptions {
  /** Longest CJK n-gram posted at index time */
  maxGram?: number;
  segmenter?: Segmenter;
}

const RUN_PATTERN = /[\p{L}\p{N}\p{M}]+/gu;
const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;

export function isCjk(char: string): boolean {
  return CJK_CHAR.test(char);
}

/**
 * NFKC, lower-case, whitespace collapsed and trimmed
 */
export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

export class Analyzer {
  readonly maxGram: number;
  private readonly segmenter: Segmenter | undefined;

  constructor(options: AnalyzerOptions = {}) {
    this.maxGram = Math.max(1, options.maxGram ?? 2);
    this.segmenter = options.segmenter;
  }

  /**
   * Splits text into normalized runs, each either wholly CJK or wholly not.
   */
  runs(text: string): string[] {
    const runs: string[] = [];
    const normalized = text.normalize("NFKC").toLowerCase();
    for (const match of normalized.matchAll(RUN_PATTERN)) {
      runs.push(...splitByScript(match[0]));
    }
    return runs;
  }

  /**
   * Normalized runs joined by single spaces; empty when the text has no
   * letters or numbers
   */
  normalizeQueryText(text: string): string {
    return this.runs(text).join(" ");
  }

  /**
   * Terms to post for a field value.
   */
  analyzeForIndex(text: string): AnalyzedTerm[] {
    const terms: AnalyzedTerm[] = [];
    let position = 0;

    for (const run of this.runs(text)) {
      if (!isCjkRun(run)) {
        terms.push({ term: run, position });
        position += 1;
        continue;
      }

      if (this.segmenter) {
        for (const word of this.segmenter.segment(run)) {
          terms.push({ term: word, position });
          position += 1;
        }
        continue;
      }

      const chars = Array.from(run);
      for (let start = 0; start < chars.length; start++) {
        for (let size = 1; size <= this.maxGram && start + size <= chars.length; size++) {
          terms.push({ term: chars.slice(start, start + size).join(""), position: position + start });
        }
      }
      position += chars.length;
    }

    return terms;
  }

  /**
   * Terms to look up for query text. More than one term means the terms
   * must appear at the returned relative positions.
   */
  analyzeQuery(text: string): AnalyzedTerm[] {
    const terms: AnalyzedTerm[] = [];
    let position = 0;

    for (const run of this.runs(text)) {
      if (!isCjkRun(run)) {
        terms.push({ term: run, position });
        position += 1;
        continue;
      }

      if (this.segmenter) {
        for (const word of this.segmenter.segment(run)) {
          terms.push({ term: word, position });
          position += 1;
        }
        continue;
      }

      const chars = Array.from(run);
      if (chars.length <= this.maxGram) {
        terms.push({ term: run, position });
      } else {
        for (let start = 0; start + this.maxGram <= chars.length; start++) {
          terms.push({ term: chars.slice(start, start + this.maxGram).join(""), position: position + start });
        }
      }
      position += chars.length;
    }

    return terms;
  }
}

function isCjkRun(run: string): boolean {
  const first = Array.from(run)[0];
  return first !== undefined && isCjk(first);
}

function splitByScript(run: string): string[] {
  const parts: string[] = [];
  let current = "";
  let currentIsCjk = false;

  for (const char of run) {
    const cjk = isCjk(char);
    if (current !== "" && cjk !== currentIsCjk) {
      parts.push(current);
      current = "";
    }
    current += char;
    currentIsCjk = cjk;
  }
  if (current !== "") parts.push(current);

  return parts;
}
