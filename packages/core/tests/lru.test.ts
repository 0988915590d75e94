import { describe, expect, it, vi } from "vitest";
import { LRUCache } from "../src/lru/index.js";

describe("LRUCache", () => {
	it("rejects a capacity that is not a positive integer", () => {
		expect(() => new LRUCache(0)).toThrow(RangeError);
		expect(() => new LRUCache(1.5)).toThrow(RangeError);
	});

	it("stores and touches values", () => {
		const cache = new LRUCache<string, number>(3);
		cache.set("a", 1);

		expect(cache.touch("a")).toBe(1);
		expect(cache.touch("b")).toBeUndefined();
		expect(cache.size).toBe(1);
	});

	it("evicts the least recently used entry", () => {
		const cache = new LRUCache<string, number>(3);
		cache.set("a", 1);
		cache.set("b", 2);
		cache.set("c", 3);
		cache.set("d", 4);

		expect(cache.has("a")).toBe(false);
		expect([...cache.keys()]).toEqual(["d", "c", "b"]);
	});

	it("protects touched entries from eviction", () => {
		const cache = new LRUCache<string, number>(3);
		cache.set("a", 1);
		cache.set("b", 2);
		cache.set("c", 3);

		cache.touch("a");
		cache.set("d", 4);

		expect(cache.has("a")).toBe(true);
		expect(cache.has("b")).toBe(false);
		expect([...cache]).toEqual([4, 1, 3]);
	});

	it("updates an existing key without evicting", () => {
		const cache = new LRUCache<string, number>(2);
		cache.set("a", 1);
		cache.set("b", 2);
		cache.set("a", 10);

		expect(cache.size).toBe(2);
		expect([...cache.keys()]).toEqual(["a", "b"]);
		expect(cache.touch("a")).toBe(10);
	});

	it("does not change recency on has()", () => {
		const cache = new LRUCache<string, number>(2);
		cache.set("a", 1);
		cache.set("b", 2);

		cache.has("a");
		cache.set("c", 3);

		expect(cache.has("a")).toBe(false);
	});

	it("removes and clears", () => {
		const cache = new LRUCache<string, number>(3);
		cache.set("a", 1);
		cache.set("b", 2);
		cache.set("c", 3);

		cache.remove("b");
		expect([...cache.keys()]).toEqual(["c", "a"]);

		cache.remove("missing");
		expect(cache.size).toBe(2);

		cache.clear();
		expect(cache.size).toBe(0);
		expect([...cache]).toEqual([]);
	});

	it("reports evicted entries", () => {
		const onEvict = vi.fn();
		const cache = new LRUCache<string, number>(1, onEvict);
		cache.set("a", 1);
		cache.set("a", 2);
		cache.set("b", 3);

		expect(onEvict).toHaveBeenCalledTimes(1);
		expect(onEvict).toHaveBeenCalledWith("a", 2);
	});

	it("keeps working after the only entry is removed", () => {
		const cache = new LRUCache<number, string>(1);
		cache.set(1, "one");
		cache.remove(1);
		cache.set(2, "two");

		expect([...cache.keys()]).toEqual([2]);
	});
});
