/**
 * Template Store Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { TemplateStore } from "../template-store.js";
import { SchemaVersionError, TemplateConflictError, TemplateNotFoundError, ValidationError } from "../../errors.js";
import { NOW } from "../../__tests__/fixtures.js";

describe("TemplateStore", () => {
  let store: TemplateStore;

  beforeEach(() => {
    store = new TemplateStore({ clock: () => NOW });
  });

  describe("CRUD", () => {
    it("should fill criteria defaults when creating", async () => {
      const template = await store.create("rainy", { termGroups: ["rain"] }, { description: "Rain footage" });

      expect(template).toEqual({
        name: "rainy",
        description: "Rain footage",
        criteria: {
          termGroups: ["rain"],
          fieldFilters: {},
          tags: [],
          excludeTerms: [],
          sortBy: "relevance",
          sortOrder: "desc",
        },
        createdAt: NOW.toISOString(),
        useCount: 0,
      });
    });

    it("should refuse a duplicate name without overwrite", async () => {
      await store.create("rainy", {});
      await expect(store.create("rainy", {})).rejects.toBeInstanceOf(TemplateConflictError);
      await expect(store.create("rainy", { tags: ["x"] }, { overwrite: true })).resolves.toMatchObject({
        criteria: { tags: ["x"] },
      });
    });

    it("should update criteria and description", async () => {
      await store.create("rainy", { termGroups: ["rain"] });
      const updated = await store.update("rainy", { criteria: { termGroups: ["storm"] }, description: "Storms" });

      expect(updated.criteria.termGroups).toEqual(["storm"]);
      expect(updated.description).toBe("Storms");
    });

    it("should raise for a missing template", async () => {
      await expect(store.get("nope")).rejects.toBeInstanceOf(TemplateNotFoundError);
      await expect(store.update("nope", {})).rejects.toBeInstanceOf(TemplateNotFoundError);
      await expect(store.delete("nope")).rejects.toBeInstanceOf(TemplateNotFoundError);
    });

    it("should delete a template", async () => {
      await store.create("rainy", {});
      await store.delete("rainy");
      expect(await store.list()).toEqual([]);
    });

    it("should reject invalid criteria and empty names", async () => {
      await expect(store.create("bad", { limit: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(store.create("  ", {})).rejects.toBeInstanceOf(ValidationError);
    });

    it("should count uses", async () => {
      await store.create("rainy", { termGroups: ["rain"] });
      await store.markUsed("rainy");
      await store.markUsed("rainy");

      const template = await store.get("rainy");
      expect(template.useCount).toBe(2);
      expect(template.lastUsedAt).toBe(NOW.toISOString());
    });

    it("should hand out copies", async () => {
      await store.create("rainy", { termGroups: ["rain"] });
      const copy = await store.get("rainy");
      copy.criteria.termGroups.push("storm");

      expect((await store.get("rainy")).criteria.termGroups).toEqual(["rain"]);
    });

    it("should serialize concurrent writes", async () => {
      await Promise.all(["c", "a", "b"].map((name) => store.create(name, {})));
      expect(await store.list()).toEqual(["a", "b", "c"]);
    });
  });

  describe("persistence", () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "reel-templates-"));
      file = path.join(dir, "templates.json");
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("should write through and reload", async () => {
      const first = await TemplateStore.open(file, { clock: () => NOW });
      await first.create("rainy", { termGroups: ["rain"] });

      const second = await TemplateStore.open(file);
      expect(await second.get("rainy")).toEqual(await first.get("rainy"));
      expect(second.toJSON().schemaVersion).toBe(1);
    });

    it("should keep a template named like an object member", async () => {
      const first = await TemplateStore.open(file, { clock: () => NOW });
      await first.create("__proto__", { termGroups: ["rain"] });
      await first.create("constructor", {});

      const second = await TemplateStore.open(file);
      expect(await second.list()).toEqual(["__proto__", "constructor"]);
      expect((await second.get("__proto__")).criteria.termGroups).toEqual(["rain"]);
    });

    it("should leave templates unchanged when a write fails", async () => {
      const blocker = path.join(dir, "blocker");
      await fs.writeFile(blocker, "");
      const existing = await store.create("rainy", { termGroups: ["rain"] });
      const unwritable = new TemplateStore(
        { filePath: path.join(blocker, "templates.json"), clock: () => NOW },
        [existing]
      );

      await expect(unwritable.create("sunny", {})).rejects.toThrow();
      await expect(unwritable.update("rainy", { description: "Storms" })).rejects.toThrow();
      await expect(unwritable.markUsed("rainy")).rejects.toThrow();
      await expect(unwritable.delete("rainy")).rejects.toThrow();

      expect(await unwritable.list()).toEqual(["rainy"]);
      expect(await unwritable.get("rainy")).toEqual(existing);
    });

    it("should reject a template entry that does not validate", async () => {
      await fs.writeFile(file, JSON.stringify({ schemaVersion: 1, templates: { rainy: { name: "rainy" } } }));
      await expect(TemplateStore.open(file)).rejects.toBeInstanceOf(ValidationError);
    });

    it("should require migration for another schema version", async () => {
      await fs.writeFile(file, JSON.stringify({ schemaVersion: 7, templates: {} }));
      await expect(TemplateStore.open(file)).rejects.toBeInstanceOf(SchemaVersionError);
    });
  });
});
