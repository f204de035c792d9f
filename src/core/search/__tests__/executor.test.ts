/**
 * Query Executor Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MediaIndex } from "../../index/media-index.js";
import { parseQuery } from "../../query/index.js";
import { execute, type Candidate } from "../executor.js";
import { lowerCriteria, lowerQuery, type LoweringContext } from "../predicate.js";
import { ExecutionError, SearchCancelledError } from "../../errors.js";
import { NOW, makeRecord, taipeiRecords } from "../../__tests__/fixtures.js";
import type { MediaRecord, QueryNode, SearchCriteria } from "../../../types/index.js";

describe("Query Executor", () => {
  let index: MediaIndex;

  async function load(records: MediaRecord[]): Promise<void> {
    await Promise.all(records.map((record) => index.upsert(record)));
  }

  function context(strict = false): LoweringContext {
    return { analyzer: index.analyzer, strict, now: NOW };
  }

  function ast(raw: string): QueryNode {
    const parsed = parseQuery(raw, index.analyzer);
    if (!parsed.ok) throw parsed.error;
    return parsed.value;
  }

  function run(raw: string): Promise<Candidate[]> {
    return execute(lowerQuery(ast(raw), context()), index.snapshot());
  }

  async function ids(raw: string): Promise<string[]> {
    return (await run(raw)).map((candidate) => candidate.recordId);
  }

  async function criteriaIds(criteria: Partial<SearchCriteria>): Promise<string[]> {
    const full: SearchCriteria = {
      termGroups: [],
      fieldFilters: {},
      tags: [],
      excludeTerms: [],
      sortBy: "relevance",
      sortOrder: "desc",
      ...criteria,
    };
    return (await execute(lowerCriteria(full, context()), index.snapshot())).map((candidate) => candidate.recordId);
  }

  beforeEach(() => {
    index = new MediaIndex();
  });

  describe("boolean queries", () => {
    beforeEach(async () => {
      await load([...taipeiRecords(), makeRecord({ id: "R3", title: "Kyoto morning", createdAt: "2024-05-01T00:00:00.000Z" })]);
    });

    it("should intersect AND operands", async () => {
      expect(await ids("Taipei AND happy")).toEqual(["R1"]);
    });

    it("should union OR operands", async () => {
      expect(await ids("sunset OR kyoto")).toEqual(["R1", "R3"]);
    });

    it("should return exactly the complement for NOT", async () => {
      expect(await ids("NOT taipei")).toEqual(["R3"]);
      expect([...(await ids("taipei")), ...(await ids("NOT taipei"))].sort()).toEqual(["R1", "R2", "R3"]);
    });

    it("should match every record for an empty query", async () => {
      expect(await ids("")).toEqual(["R1", "R2", "R3"]);
    });

    it("should match a bare title term case-insensitively", async () => {
      expect(await ids("KYOTO")).toEqual(["R3"]);
    });

    it("should filter on size ranges", async () => {
      expect(await ids("size:>1048576")).toEqual(["R2"]);
      expect(await ids("size:<=500kb")).toEqual(["R1", "R3"]);
      expect(await ids("size:1kb..1mb")).toEqual(["R1"]);
    });

    it("should compare stored mood values case-insensitively", async () => {
      expect(await ids("mood:HAPPY")).toEqual(["R1"]);
    });

    it("should scope terms to a text field", async () => {
      expect(await ids("title:sunset")).toEqual(["R1"]);
      expect(await ids("description:sunset")).toEqual([]);
    });

    it("should treat a whole-day date as that UTC day", async () => {
      expect(await ids("created:2024-06-01")).toEqual(["R1", "R2"]);
      expect(await ids("created:<2024-05-15")).toEqual(["R3"]);
      expect(await ids("created:>2024-05-01")).toEqual(["R1", "R2"]);
    });
  });

  describe("phrases", () => {
    beforeEach(async () => {
      await load([
        makeRecord({ id: "R2", title: "Taipei rain report" }),
        makeRecord({ id: "R3", title: "rain in Taipei" }),
      ]);
    });

    it("should require the phrase words to be adjacent and in order", async () => {
      expect(await ids('"Taipei rain"')).toEqual(["R2"]);
    });

    it("should not join words across two tags", async () => {
      await index.upsert(makeRecord({ id: "R4", tags: ["taipei", "rain"] }));
      expect(await ids('tags:"taipei rain"')).toEqual([]);
    });
  });

  describe("CJK text", () => {
    beforeEach(async () => {
      await load([makeRecord({ id: "C1", title: "台北市夜景" })]);
    });

    it("should match a substring no longer than the n-gram size", async () => {
      expect(await ids("台北")).toEqual(["C1"]);
      expect(await ids("夜")).toEqual(["C1"]);
    });

    it("should match a longer substring positionally", async () => {
      expect(await ids("北市夜")).toEqual(["C1"]);
      expect(await ids("台夜景")).toEqual([]);
    });
  });

  describe("technical attributes", () => {
    beforeEach(async () => {
      await load([makeRecord({ id: "T1", technicalAttrs: { shot_type: "Aerial", fps: 60 } })]);
    });

    it("should compare strings case-insensitively and numbers numerically", async () => {
      expect(await ids("tech.shot_type:aerial")).toEqual(["T1"]);
      expect(await ids("tech.fps:>=30")).toEqual(["T1"]);
      expect(await ids("tech.fps:>60")).toEqual([]);
    });
  });

  describe("field errors", () => {
    beforeEach(async () => {
      await load(taipeiRecords());
    });

    it("should match nothing for an unknown field", async () => {
      expect(await ids("color:red")).toEqual([]);
      expect(await ids("color:red OR taipei")).toEqual(["R1", "R2"]);
    });

    function strictError(raw: string): unknown {
      try {
        lowerQuery(ast(raw), context(true));
      } catch (error) {
        return error;
      }
      throw new Error(`expected "${raw}" to be rejected`);
    }

    it("should raise for an unknown field in strict mode", async () => {
      const error = strictError("color:red");
      expect(error).toBeInstanceOf(ExecutionError);
      expect(error).toMatchObject({ kind: "UNKNOWN_FIELD", field: "color" });
    });

    it("should reject a range on a field that is not orderable in strict mode", async () => {
      expect(await ids("title:>a")).toEqual([]);
      expect(strictError("title:>a")).toMatchObject({ kind: "INVALID_OPERATOR" });
    });

    it("should reject a value that does not parse in strict mode", async () => {
      expect(strictError("size:>big")).toMatchObject({ kind: "INVALID_VALUE" });
    });
  });

  describe("evidence", () => {
    beforeEach(async () => {
      await load(taipeiRecords());
    });

    it("should report term frequencies and spans per field", async () => {
      const [r1] = await run("Taipei AND happy");
      expect(r1?.evidence).toEqual({
        termFrequency: { title: 1, mood: 1 },
        phraseHits: 0,
        fieldMatches: 0,
        spans: [
          { field: "title", start: 0, end: 1 },
          { field: "mood", start: 0, end: 1 },
        ],
      });
    });

    it("should count a matched phrase once and span its words", async () => {
      const [r1] = await run('"taipei sunset"');
      expect(r1?.evidence.phraseHits).toBe(1);
      expect(r1?.evidence.spans).toEqual([{ field: "title", start: 0, end: 2 }]);
    });

    it("should credit matched field filters", async () => {
      const [r1] = await run("taipei mood:happy");
      expect(r1?.evidence.fieldMatches).toBe(1);
    });

    it("should not collect evidence from negated leaves", async () => {
      const [r2] = await run("taipei NOT sunset");
      expect(r2?.recordId).toBe("R2");
      expect(r2?.evidence.termFrequency).toEqual({ title: 1 });
    });
  });

  describe("criteria", () => {
    beforeEach(async () => {
      await load([
        makeRecord({ id: "R1", title: "Taipei sunset interview", mood: "happy", tags: ["City"], fileSizeBytes: 500_000 }),
        makeRecord({ id: "R2", title: "Taipei rain report", mood: "sad", fileSizeBytes: 2_000_000 }),
        makeRecord({ id: "R3", title: "Kyoto morning", mood: "happy", createdAt: "2024-05-01T00:00:00.000Z" }),
      ]);
    });

    it("should match every record for empty criteria", async () => {
      expect(await criteriaIds({})).toEqual(["R1", "R2", "R3"]);
    });

    it("should AND field filters onto term groups", async () => {
      expect(await criteriaIds({ termGroups: ["taipei"], fieldFilters: { mood: { op: "eq", value: "happy" } } })).toEqual([
        "R1",
      ]);
    });

    it("should OR term groups together", async () => {
      expect(await criteriaIds({ termGroups: ["sunset", "kyoto"] })).toEqual(["R1", "R3"]);
    });

    it("should accept any of several values", async () => {
      expect(await criteriaIds({ fieldFilters: { mood: { op: "in", values: ["sad", "calm"] } } })).toEqual(["R2"]);
    });

    it("should require every tag", async () => {
      expect(await criteriaIds({ tags: ["city"] })).toEqual(["R1"]);
    });

    it("should drop records containing an excluded term", async () => {
      expect(await criteriaIds({ termGroups: ["taipei"], excludeTerms: ["rain"] })).toEqual(["R1"]);
    });

    it("should apply a relative date window from the start of today", async () => {
      expect(await criteriaIds({ dateRange: { lastDays: 30 } })).toEqual(["R1", "R2"]);
    });

    it("should apply absolute date bounds", async () => {
      expect(await criteriaIds({ dateRange: { to: "2024-05-31T23:59:59.999Z" } })).toEqual(["R3"]);
    });

    it("should apply inclusive size bounds", async () => {
      expect(await criteriaIds({ sizeRange: { min: 500_000, max: 1_000_000 } })).toEqual(["R1"]);
    });

    it("should evaluate numeric range filters", async () => {
      expect(
        await criteriaIds({ fieldFilters: { size: { op: "range", min: 1000, max: 2_000_000, maxExclusive: true } } })
      ).toEqual(["R1", "R3"]);
    });
  });

  describe("cancellation", () => {
    it("should abort evaluation when the signal fires", async () => {
      await load(taipeiRecords());
      const controller = new AbortController();
      controller.abort();

      await expect(
        execute(lowerQuery(ast("taipei"), context()), index.snapshot(), { signal: controller.signal })
      ).rejects.toBeInstanceOf(SearchCancelledError);
    });

    it("should stop a scan that is already running", async () => {
      await load(Array.from({ length: 3000 }, (_, i) => makeRecord({ id: `N${i}`, title: `clip ${i}` })));
      const controller = new AbortController();

      const pending = execute(lowerQuery(ast("NOT zzz"), context()), index.snapshot(), { signal: controller.signal });
      setImmediate(() => controller.abort());

      expect(controller.signal.aborted).toBe(false);
      await expect(pending).rejects.toBeInstanceOf(SearchCancelledError);
    });

    it("should let other work run while scanning", async () => {
      await load(Array.from({ length: 3000 }, (_, i) => makeRecord({ id: `N${i}`, title: `clip ${i}` })));
      let ticked = false;
      setImmediate(() => {
        ticked = true;
      });

      const candidates = await execute(lowerQuery(ast("NOT zzz"), context()), index.snapshot());

      expect(candidates).toHaveLength(3000);
      expect(ticked).toBe(true);
    });
  });
});
