import { describe, it, expect } from "vitest";
import { Analyzer, normalizeText, type Segmenter } from "../analyzer.js";

describe("Analyzer", () => {
  const analyzer = new Analyzer();

  it("should normalize width and case", () => {
    expect(normalizeText("  Ｔａｉｐｅｉ\t RAIN ")).toBe("taipei rain");
  });

  it("should give one position per Latin word", () => {
    expect(analyzer.analyzeForIndex("Sunset, Interview!")).toEqual([
      { term: "sunset", position: 0 },
      { term: "interview", position: 1 },
    ]);
  });

  it("should post every CJK n-gram up to maxGram at index time", () => {
    expect(analyzer.analyzeForIndex("台北市")).toEqual([
      { term: "台", position: 0 },
      { term: "台北", position: 0 },
      { term: "北", position: 1 },
      { term: "北市", position: 1 },
      { term: "市", position: 2 },
    ]);
  });

  it("should query a long CJK run by its maxGram-grams", () => {
    expect(analyzer.analyzeQuery("台北市")).toEqual([
      { term: "台北", position: 0 },
      { term: "北市", position: 1 },
    ]);
    expect(analyzer.analyzeQuery("北")).toEqual([{ term: "北", position: 0 }]);
  });

  it("should split mixed-script runs and keep positions aligned", () => {
    expect(analyzer.runs("台北rain")).toEqual(["台北", "rain"]);
    expect(analyzer.analyzeQuery("台北 rain")).toEqual([
      { term: "台北", position: 0 },
      { term: "rain", position: 2 },
    ]);
    const indexed = analyzer.analyzeForIndex("台北rain").filter((t) => t.term === "rain");
    expect(indexed).toEqual([{ term: "rain", position: 2 }]);
  });

  it("should defer to a segmenter on both sides", () => {
    const segmenter: Segmenter = { segment: (run) => (run === "台北市政府" ? ["台北市", "政府"] : [run]) };
    const segmented = new Analyzer({ segmenter });
    expect(segmented.analyzeForIndex("台北市政府")).toEqual([
      { term: "台北市", position: 0 },
      { term: "政府", position: 1 },
    ]);
    expect(segmented.analyzeQuery("台北市政府")).toEqual(segmented.analyzeForIndex("台北市政府"));
  });
});
