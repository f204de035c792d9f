/**
 * Natural-Language Translator Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { NaturalLanguageTranslator } from "../translator.js";
import { rulesFromTable } from "../keyword-tables.js";

describe("NaturalLanguageTranslator", () => {
  const translator = new NaturalLanguageTranslator();

  describe("keyword rules", () => {
    it("should lift an emotion word into a mood filter and keep the rest as free text", () => {
      const custom = new NaturalLanguageTranslator({ tables: { rules: rulesFromTable("mood", { happy: "happy" }) } });

      expect(custom.translate("happy taipei")).toEqual({
        termGroups: ["taipei"],
        fieldFilters: { mood: { op: "eq", value: "happy" } },
        tags: [],
        excludeTerms: [],
        sortBy: "relevance",
        sortOrder: "desc",
      });
    });

    it("should prefer the longest overlapping match", () => {
      const custom = new NaturalLanguageTranslator({
        tables: {
          rules: [
            { field: "category", value: "objects", patterns: ["close"] },
            { field: "tech.shot_type", value: "close-up", patterns: ["close up"] },
          ],
        },
      });

      const criteria = custom.translate("close up portrait");
      expect(criteria.fieldFilters).toEqual({ "tech.shot_type": { op: "eq", value: "close-up" } });
      expect(criteria.termGroups).toEqual(["portrait"]);
    });

    it("should break equal-length ties by rule order", () => {
      const custom = new NaturalLanguageTranslator({
        tables: {
          rules: [
            { field: "mood", value: "calm", patterns: ["quiet"] },
            { field: "category", value: "nature", patterns: ["quiet"] },
          ],
        },
      });

      expect(custom.translate("quiet").fieldFilters).toEqual({ mood: { op: "eq", value: "calm" } });
    });

    it("should combine several values for one field into an in filter", () => {
      expect(translator.translate("happy or sad clips").fieldFilters).toEqual({
        mood: { op: "in", values: ["happy", "sad"] },
        type: { op: "eq", value: "video" },
      });
    });

    it("should not match a pattern inside a longer word", () => {
      const criteria = translator.translate("party");
      expect(criteria.fieldFilters).toEqual({});
      expect(criteria.termGroups).toEqual(["party"]);
    });

    it("should match CJK patterns without word boundaries", () => {
      const criteria = translator.translate("快樂的台北");
      expect(criteria.fieldFilters).toEqual({ mood: { op: "eq", value: "happy" } });
      expect(criteria.termGroups).toEqual(["台北"]);
    });
  });

  describe("quotes, exclusions and tags", () => {
    it("should lift quoted phrases, minus words and hash tags", () => {
      const criteria = translator.translate('"Taipei rain" -night #city');

      expect(criteria.termGroups).toEqual(["taipei rain"]);
      expect(criteria.excludeTerms).toEqual(["night"]);
      expect(criteria.tags).toEqual(["city"]);
    });
  });

  describe("dates", () => {
    it("should read a relative day count", () => {
      const criteria = translator.translate("sunset last 30 days");
      expect(criteria.dateRange).toEqual({ lastDays: 30 });
      expect(criteria.termGroups).toEqual(["sunset"]);
    });

    it("should convert weeks to days", () => {
      expect(translator.translate("past 2 weeks").dateRange).toEqual({ lastDays: 14 });
    });

    it("should read date keywords", () => {
      expect(translator.translate("today").dateRange).toEqual({ lastDays: 0 });
      expect(translator.translate("interviews last week").dateRange).toEqual({ lastDays: 14 });
    });

    it("should read an open-ended start date", () => {
      const criteria = translator.translate("interviews since 2024-01-01");
      expect(criteria.dateRange).toEqual({ from: "2024-01-01T00:00:00.000Z" });
      expect(criteria.termGroups).toEqual(["interviews"]);
    });

    it("should end a before range on the previous day", () => {
      expect(translator.translate("before 2024-03-01").dateRange).toEqual({ to: "2024-02-29T23:59:59.999Z" });
    });

    it("should read an explicit date range", () => {
      expect(translator.translate("between 2024-01-01 and 2024-01-31").dateRange).toEqual({
        from: "2024-01-01T00:00:00.000Z",
        to: "2024-01-31T23:59:59.999Z",
      });
    });

    it("should read a CJK calendar date as that whole day", () => {
      const criteria = translator.translate("2024年3月5日 影片");
      expect(criteria.dateRange).toEqual({ from: "2024-03-05T00:00:00.000Z", to: "2024-03-05T23:59:59.999Z" });
      expect(criteria.fieldFilters).toEqual({ type: { op: "eq", value: "video" } });
    });
  });

  describe("sizes", () => {
    it("should read a strict lower bound in binary units", () => {
      const criteria = translator.translate("videos larger than 1mb");
      expect(criteria.sizeRange).toEqual({ min: 1_048_577 });
      expect(criteria.fieldFilters).toEqual({ type: { op: "eq", value: "video" } });
    });

    it("should read a strict upper bound", () => {
      expect(translator.translate("under 500 kb").sizeRange).toEqual({ max: 511_999 });
    });

    it("should read a size range", () => {
      expect(translator.translate("between 1mb and 5mb").sizeRange).toEqual({ min: 1_048_576, max: 5_242_880 });
    });
  });

  describe("sorting", () => {
    it("should prefer the longer sort phrase", () => {
      const criteria = translator.translate("oldest first sunset");
      expect(criteria.sortBy).toBe("date");
      expect(criteria.sortOrder).toBe("asc");
      expect(criteria.termGroups).toEqual(["sunset"]);
    });

    it("should default the order to the sort key's natural direction", () => {
      expect(translator.translate("sunset by size")).toMatchObject({ sortBy: "size", sortOrder: "desc" });
      expect(translator.translate("sunset by name")).toMatchObject({ sortBy: "name", sortOrder: "asc" });
    });
  });

  describe("fallback", () => {
    it("should search the whole text when nothing is recognized", () => {
      expect(translator.translate("the of").termGroups).toEqual(["the of"]);
    });

    it("should give empty criteria for blank input", () => {
      expect(translator.translate("   ")).toEqual({
        termGroups: [],
        fieldFilters: {},
        tags: [],
        excludeTerms: [],
        sortBy: "relevance",
        sortOrder: "desc",
      });
    });
  });
});
