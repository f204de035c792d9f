/**
 * Configuration Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadConfig, resolveConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { getConfigPath } from "../../utils/index.js";

describe("resolveConfig", () => {
  it("should fill every default", () => {
    const config = resolveConfig();

    expect(config.search).toEqual({ defaultPageSize: 20, maxPageSize: 200, strict: false, resultCacheSize: 100 });
    expect(config.index.maxGram).toBe(2);
    expect(config.facets.fields).toEqual(["fileType", "category", "mood", "tags"]);
  });

  it("should merge nested overrides", () => {
    const config = resolveConfig({ search: { strict: true }, ranking: { fieldWeights: { title: 5 } } });

    expect(config.search.strict).toBe(true);
    expect(config.search.defaultPageSize).toBe(20);
    expect(config.ranking.fieldWeights.title).toBe(5);
    expect(config.ranking.fieldWeights.tags).toBe(2);
  });

  it("should reject out-of-range values", () => {
    expect(() => resolveConfig({ index: { maxGram: 9 } })).toThrow(ValidationError);
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "reel-config-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("should use the defaults without a config file", async () => {
    expect(await loadConfig(root)).toEqual(resolveConfig());
  });

  it("should read the project's config file", async () => {
    const file = getConfigPath(root);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ facets: { topN: 3 } }));

    expect((await loadConfig(root)).facets.topN).toBe(3);
  });

  it("should report malformed JSON as invalid configuration", async () => {
    const file = getConfigPath(root);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "{ not json");

    await expect(loadConfig(root)).rejects.toMatchObject({ kind: "INVALID_CONFIG" });
  });
});
