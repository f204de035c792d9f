/**
 * Media Index Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { MediaIndex } from "../media-index.js";
import { makeRecord, taipeiRecords } from "../../__tests__/fixtures.js";
import { SchemaVersionError } from "../../errors.js";

describe("MediaIndex", () => {
  let index: MediaIndex;

  beforeEach(() => {
    index = new MediaIndex();
  });

  describe("mutations", () => {
    it("should make an upserted record searchable by its title terms", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei sunset interview" }));

      expect([...index.lookup("taipei", "title")]).toEqual(["R1"]);
      expect([...index.lookup("sunset")]).toEqual(["R1"]);
      expect(index.getRecord("R1")?.title).toBe("Taipei sunset interview");
    });

    it("should apply mutations queued together in one snapshot swap", async () => {
      const before = index.snapshot().version;
      await Promise.all(taipeiRecords().map((record) => index.upsert(record)));

      expect(index.snapshot().version).toBe(before + 1);
      expect(index.snapshot().size).toBe(2);
    });

    it("should give identical postings when the same record is upserted twice", async () => {
      const record = makeRecord({ id: "R1", title: "Taipei sunset", tags: ["city", "dusk"] });
      await index.upsert(record);
      const once = JSON.stringify(index.toJSON());

      await index.upsert(record);
      expect(JSON.stringify(index.toJSON())).toBe(once);
    });

    it("should purge old postings when a record is replaced", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei sunset" }));
      await index.upsert(makeRecord({ id: "R1", title: "Kyoto morning" }));

      expect(index.lookup("taipei").size).toBe(0);
      expect(index.snapshot().segment("title").has("taipei")).toBe(false);
      expect([...index.lookup("kyoto", "title")]).toEqual(["R1"]);
    });

    it("should remove a record and every posting that referenced it", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei sunset", tags: ["city"] }));

      await expect(index.remove("R1")).resolves.toBe(true);
      await expect(index.remove("R1")).resolves.toBe(false);
      expect(index.getRecord("R1")).toBeUndefined();
      expect(index.toJSON().postings).toEqual({
        title: {},
        description: {},
        tags: {},
        keywords: {},
        category: {},
        mood: {},
      });
    });

    it("should keep values of a multi-valued field apart", async () => {
      await index.upsert(makeRecord({ id: "R1", tags: ["taipei", "rain"] }));
      const snapshot = index.snapshot();

      expect(snapshot.postings("tags", "taipei").get("R1")).toEqual([0]);
      expect(snapshot.postings("tags", "rain").get("R1")).toEqual([2]);
    });

    it("should freeze stored records", async () => {
      await index.upsert(makeRecord({ id: "R1", tags: ["city"] }));
      const stored = index.getRecord("R1");

      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored?.tags)).toBe(true);
    });

    it("should resolve flush once queued mutations are applied", async () => {
      const pending = index.upsert(makeRecord({ id: "R1", title: "queued" }));
      expect(index.pendingMutations).toBe(1);

      await index.flush();
      expect(index.lookup("queued").size).toBe(1);
      await pending;
    });
  });

  describe("snapshots", () => {
    it("should leave earlier snapshots untouched by later writes", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei sunset" }));
      const before = index.snapshot();

      await index.upsert(makeRecord({ id: "R2", title: "Taipei rain" }));
      await index.remove("R1");

      expect([...before.lookup("taipei")]).toEqual(["R1"]);
      expect(before.size).toBe(1);
      expect([...index.lookup("taipei")]).toEqual(["R2"]);
    });

    it("should share field segments a batch did not touch", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei", description: "harbour at night" }));
      const before = index.snapshot();

      await index.upsert(makeRecord({ id: "R2", title: "Kyoto" }));
      const after = index.snapshot();

      expect(after.segment("description")).toBe(before.segment("description"));
      expect(after.segment("title")).not.toBe(before.segment("title"));
    });

    it("should report statistics for the current snapshot", async () => {
      await Promise.all(taipeiRecords().map((record) => index.upsert(record)));

      expect(index.statistics()).toEqual({
        version: 1,
        recordCount: 2,
        vocabulary: { title: 5, description: 0, tags: 0, keywords: 0, category: 0, mood: 2 },
        degraded: false,
      });
    });
  });

  describe("persistence", () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "reel-index-"));
      file = path.join(dir, "index.json");
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("should round-trip a saved snapshot", async () => {
      await Promise.all(taipeiRecords().map((record) => index.upsert(record)));
      await index.save(file);

      const loaded = await MediaIndex.load(file);
      expect(loaded.toJSON()).toEqual(index.toJSON());
      expect(loaded.degraded).toBe(false);
    });

    it("should start empty when there is no snapshot file", async () => {
      const loaded = await MediaIndex.load(file);
      expect(loaded.snapshot().size).toBe(0);
      expect(loaded.degraded).toBe(false);
    });

    it("should fall back to an empty degraded index when postings disagree with records", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "Taipei" }));
      const data = index.toJSON();
      await fs.writeFile(file, JSON.stringify({ ...data, postings: { ...data.postings, title: { taipei: ["R9"] } } }));

      const loaded = await MediaIndex.load(file);
      expect(loaded.degraded).toBe(true);
      expect(loaded.snapshot().size).toBe(0);
      expect(loaded.lastLoadError?.kind).toBe("INDEX_CORRUPTION");
    });

    it("should report a missing posting for a token named like an object member", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "constructor" }));
      const data = index.toJSON();
      await fs.writeFile(file, JSON.stringify({ ...data, postings: { ...data.postings, title: {} } }));

      const loaded = await MediaIndex.load(file);
      expect(loaded.degraded).toBe(true);
      expect(loaded.lastLoadError?.context).toEqual({ field: "title", token: "constructor" });
    });

    it("should round-trip tokens named like object members", async () => {
      await index.upsert(makeRecord({ id: "R1", title: "constructor toString valueOf" }));
      await index.save(file);

      const loaded = await MediaIndex.load(file);
      expect(loaded.degraded).toBe(false);
      expect([...loaded.lookup("constructor")]).toEqual(["R1"]);
    });

    it("should treat unparseable JSON as corruption", async () => {
      await fs.writeFile(file, "{ not json");

      const loaded = await MediaIndex.load(file);
      expect(loaded.degraded).toBe(true);
    });

    it("should require migration when the schema version differs", async () => {
      await fs.writeFile(file, JSON.stringify({ schemaVersion: 2, records: [], postings: {} }));

      await expect(MediaIndex.load(file)).rejects.toBeInstanceOf(SchemaVersionError);
    });
  });
});
