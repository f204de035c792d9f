/**
 * Natural-Language Translator
 *
 * Turns free text into SearchCriteria. Never fails: when nothing in the
 * text is recognized the whole normalized text becomes one free-text group.
 *
 * Steps, in order:
 * 1. normalize (NFKC, lower-case, collapsed whitespace)
 * 2. lift `"quoted phrases"`, `-excluded` words and `#tags`
 * 3. keyword rules, longest match first, ties by rule order
 * 4. date, size and sort expressions
 * 5. residual words minus stopwords become free-text groups
 *
 * @module
 */

import {
  DEFAULT_SORT_ORDER,
  type DateRange,
  type FieldPredicate,
  type SearchCriteria,
  type SizeRange,
  type SortBy,
  type SortOrder,
} from "../../types/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { isCjk, normalizeText } from "../query/analyzer.js";
import { defaultKeywordTables, type KeywordRule, type KeywordTables, type SortRule } from "./keyword-tables.js";
import { findDateExpression, findSizeExpression } from "./patterns.js";

interface CompiledPattern {
  text: string;
  ruleIndex: number;
  field: string;
  value: string;
}

interface Span {
  start: number;
  end: number;
}

interface RuleMatch extends Span {
  pattern: CompiledPattern;
}

export interface TranslatorOptions {
  /** Replaces the matching parts of the bundled tables */
  tables?: Partial<KeywordTables>;
  logger?: Logger;
}

const WORD_CHAR = /[\p{L}\p{N}\p{M}]/u;
const RESIDUAL_WORD = /[\p{L}\p{N}\p{M}]+(?:['-][\p{L}\p{N}\p{M}]+)*/gu;

export class NaturalLanguageTranslator {
  private readonly patterns: readonly CompiledPattern[];
  private readonly sortRules: readonly SortRule[];
  private readonly dateKeywords: ReadonlyArray<[string, number]>;
  private readonly stopwords: ReadonlySet<string>;
  private readonly cjkStopChars: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: TranslatorOptions = {}) {
    const defaults = options.tables && isComplete(options.tables) ? null : defaultKeywordTables();
    const rules: KeywordRule[] = options.tables?.rules ?? defaults?.rules ?? [];

    this.patterns = Object.freeze(
      rules.flatMap((rule, ruleIndex) =>
        rule.patterns.map((pattern) => ({ text: normalizeText(pattern), ruleIndex, field: rule.field, value: rule.value }))
      )
    );

    // Longer sort phrases first so "oldest first" wins over "oldest"
    this.sortRules = Object.freeze(
      [...(options.tables?.sortRules ?? defaults?.sortRules ?? [])]
        .map((rule) => ({ ...rule, pattern: normalizeText(rule.pattern) }))
        .sort((a, b) => b.pattern.length - a.pattern.length)
    );

    this.dateKeywords = Object.freeze(
      Object.entries(options.tables?.dateKeywords ?? defaults?.dateKeywords ?? {})
        .map(([phrase, days]): [string, number] => [normalizeText(phrase), days])
        .sort((a, b) => b[0].length - a[0].length)
    );

    const stopwords = (options.tables?.stopwords ?? defaults?.stopwords ?? []).map(normalizeText);
    this.stopwords = new Set(stopwords);
    this.cjkStopChars = new Set(stopwords.filter((word) => Array.from(word).length === 1 && isCjk(word)));

    this.logger = options.logger ?? createLogger("nl-translator");
  }

  translate(phrase: string): SearchCriteria {
    const normalized = normalizeText(phrase);
    const termGroups: string[] = [];
    const excludeTerms: string[] = [];
    const tags: string[] = [];

    if (normalized === "") {
      return emptyCriteria();
    }

    let text = normalized;

    // Step 2: quoted phrases, exclusions, tags
    text = text.replace(/"([^"]*)"/g, (_, inner: string) => {
      const group = normalizeText(inner);
      if (group !== "") pushUnique(termGroups, group);
      return " ";
    });
    text = text.replace(/"/g, " ");
    text = text.replace(/(^|\s)-([\p{L}\p{N}][\p{L}\p{N}\p{M}_-]*)/gu, (_, lead: string, word: string) => {
      pushUnique(excludeTerms, word);
      return `${lead} `;
    });
    text = text.replace(/(^|\s)#([\p{L}\p{N}][\p{L}\p{N}\p{M}_-]*)/gu, (_, lead: string, tag: string) => {
      pushUnique(tags, tag);
      return `${lead} `;
    });

    // Step 3: keyword rules
    const { filters, remaining } = this.applyRules(text);
    text = remaining;

    // Step 4: dates, sizes, sort phrases
    const date = findDateExpression(text, this.dateKeywords);
    let dateRange: DateRange | undefined;
    if (date) {
      dateRange = date.range;
      text = blank(text, date);
    }

    const size = findSizeExpression(text);
    let sizeRange: SizeRange | undefined;
    if (size) {
      sizeRange = size.range;
      text = blank(text, size);
    }

    let sortBy: SortBy | undefined;
    let sortOrder: SortOrder | undefined;
    for (const rule of this.sortRules) {
      const span = findWithBoundaries(text, rule.pattern);
      if (!span) continue;
      if (rule.sortBy && !sortBy) sortBy = rule.sortBy;
      if (rule.sortOrder && !sortOrder) sortOrder = rule.sortOrder;
      text = blank(text, span);
    }

    // Step 5: residual words
    for (const word of this.residualWords(text)) {
      pushUnique(termGroups, word);
    }

    const recognized =
      termGroups.length > 0 ||
      excludeTerms.length > 0 ||
      tags.length > 0 ||
      filters.size > 0 ||
      dateRange !== undefined ||
      sizeRange !== undefined ||
      sortBy !== undefined ||
      sortOrder !== undefined;
    if (!recognized) {
      termGroups.push(normalized);
    }

    const criteria: SearchCriteria = {
      termGroups,
      fieldFilters: buildFieldFilters(filters),
      tags,
      excludeTerms,
      sortBy: sortBy ?? "relevance",
      sortOrder: sortOrder ?? DEFAULT_SORT_ORDER[sortBy ?? "relevance"],
    };
    if (dateRange) criteria.dateRange = dateRange;
    if (sizeRange) criteria.sizeRange = sizeRange;

    this.logger.debug({ phrase, criteria }, "Translated natural-language query");
    return criteria;
  }

  /**
   * Matches every pattern, keeps the longest non-overlapping matches (ties
   * by rule order, then position) and blanks them out of the text.
   */
  private applyRules(text: string): { filters: Map<string, string[]>; remaining: string } {
    const matches: RuleMatch[] = [];
    for (const pattern of this.patterns) {
      if (pattern.text === "") continue;
      let from = 0;
      for (;;) {
        const start = text.indexOf(pattern.text, from);
        if (start === -1) break;
        const end = start + pattern.text.length;
        if (hasBoundaries(text, start, end)) {
          matches.push({ start, end, pattern });
        }
        from = start + 1;
      }
    }

    matches.sort(
      (a, b) =>
        b.end - b.start - (a.end - a.start) || a.pattern.ruleIndex - b.pattern.ruleIndex || a.start - b.start
    );

    const taken = new Array<boolean>(text.length).fill(false);
    const accepted: RuleMatch[] = [];
    for (const match of matches) {
      let free = true;
      for (let i = match.start; i < match.end; i++) {
        if (taken[i]) {
          free = false;
          break;
        }
      }
      if (!free) continue;
      for (let i = match.start; i < match.end; i++) taken[i] = true;
      accepted.push(match);
    }

    accepted.sort((a, b) => a.start - b.start);
    const filters = new Map<string, string[]>();
    let remaining = text;
    for (const match of accepted) {
      const values = filters.get(match.pattern.field) ?? [];
      if (!values.includes(match.pattern.value)) values.push(match.pattern.value);
      filters.set(match.pattern.field, values);
      remaining = blank(remaining, match);
    }

    return { filters, remaining };
  }

  private residualWords(text: string): string[] {
    const words: string[] = [];
    for (const match of text.matchAll(RESIDUAL_WORD)) {
      const pieces = isCjk(match[0].charAt(0)) ? this.splitCjkStopChars(match[0]) : [match[0]];
      for (const word of pieces) {
        if (this.stopwords.has(word)) continue;
        if (/^\d+$/.test(word)) continue;
        if (Array.from(word).length === 1 && !isCjk(word)) continue;
        words.push(word);
      }
    }
    return words;
  }

  private splitCjkStopChars(word: string): string[] {
    const pieces: string[] = [];
    let current = "";
    for (const char of word) {
      if (this.cjkStopChars.has(char)) {
        if (current !== "") pieces.push(current);
        current = "";
      } else {
        current += char;
      }
    }
    if (current !== "") pieces.push(current);
    return pieces;
  }
}

function isComplete(tables: Partial<KeywordTables>): boolean {
  return (
    tables.rules !== undefined &&
    tables.sortRules !== undefined &&
    tables.dateKeywords !== undefined &&
    tables.stopwords !== undefined
  );
}

function emptyCriteria(): SearchCriteria {
  return { termGroups: [], fieldFilters: {}, tags: [], excludeTerms: [], sortBy: "relevance", sortOrder: "desc" };
}

function buildFieldFilters(filters: Map<string, string[]>): Record<string, FieldPredicate> {
  const result: Record<string, FieldPredicate> = {};
  for (const [field, values] of filters) {
    const [first] = values;
    if (first === undefined) continue;
    result[field] = values.length === 1 ? { op: "eq", value: first } : { op: "in", values };
  }
  return result;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

/**
 * A Latin-script edge of a match must not continue into a neighbouring word.
 * CJK text has no word boundaries, so CJK edges always qualify.
 */
function hasBoundaries(text: string, start: number, end: number): boolean {
  const before = text.charAt(start - 1);
  const first = text.charAt(start);
  const last = text.charAt(end - 1);
  const after = text.charAt(end);

  const leftOk = start === 0 || !WORD_CHAR.test(before) || isCjk(before) || isCjk(first);
  const rightOk = end >= text.length || !WORD_CHAR.test(after) || isCjk(after) || isCjk(last);
  return leftOk && rightOk;
}

export function findWithBoundaries(text: string, pattern: string): Span | null {
  let from = 0;
  for (;;) {
    const start = text.indexOf(pattern, from);
    if (start === -1) return null;
    const end = start + pattern.length;
    if (hasBoundaries(text, start, end)) return { start, end };
    from = start + 1;
  }
}

function blank(text: string, span: Span): string {
  return text.slice(0, span.start) + " ".repeat(span.end - span.start) + text.slice(span.end);
}
