/**
 * LRU Cache Tests
 *
 * @module
 */

import { describe, it, expect, vi } from "vitest";
import { LRUCache } from "../lru-cache.js";

describe("LRUCache", () => {
  it("should evict the least recently used entry", () => {
    const onEvict = vi.fn();
    const cache = new LRUCache<string, number>({ maxSize: 2, onEvict });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(onEvict).toHaveBeenCalledWith("b", 2);
  });

  it("should track hits and misses", () => {
    const cache = new LRUCache<string, number>({ maxSize: 2 });
    cache.set("a", 1);
    cache.get("a");
    cache.get("missing");

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1, maxSize: 2, hitRate: 0.5 });
  });

  it("should replace the value of an existing key", () => {
    const cache = new LRUCache<string, number>({ maxSize: 2 });
    cache.set("a", 1);
    cache.set("a", 2);

    expect(cache.get("a")).toBe(2);
    expect(cache.size()).toBe(1);
  });

  it("should store nothing when the size is zero", () => {
    const cache = new LRUCache<string, number>({ maxSize: 0 });
    cache.set("a", 1);
    expect(cache.get("a")).toBeUndefined();
  });
});
