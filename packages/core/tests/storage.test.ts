import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidKeyError, StorageError } from "../src/errors.js";
import {
	JsonFileStore,
	MemoryStore,
	NoopStore,
	assertNonEmpty,
	encodeName,
	hashName,
} from "../src/storage/index.js";

describe("encodeName", () => {
	it("keeps plain names", () => {
		expect(encodeName("user-42_profile.v1")).toBe("user-42_profile.v1");
	});

	it("percent-encodes separators and reserved characters", () => {
		expect(encodeName("a/b")).toBe("a%2Fb");
		expect(encodeName("a\\b")).toBe("a%5Cb");
		expect(encodeName("x*(y)")).toBe("x%2A%28y%29");
		expect(encodeName("a b")).toBe("a%20b");
	});

	it("encodes a leading dot", () => {
		expect(encodeName("..")).toBe("%2E.");
		expect(encodeName(".hidden")).toBe("%2Ehidden");
	});

	it("hashes names that are too long", () => {
		const name = "k".repeat(300);

		expect(encodeName(name)).toBe(hashName(name));
		expect(encodeName(name)).toHaveLength(64);
	});

	it("hashes malformed unicode", () => {
		const name = "bad\uD800";

		expect(encodeName(name)).toBe(hashName(name));
	});
});

describe("assertNonEmpty", () => {
	it("throws InvalidKeyError on empty strings", () => {
		expect(() => assertNonEmpty("", "Store key")).toThrow(InvalidKeyError);
		expect(() => assertNonEmpty("", "Store key")).toThrow("Store key must be a non-empty string");
		expect(() => assertNonEmpty("k", "Store key")).not.toThrow();
	});
});

describe("MemoryStore", () => {
	it("round-trips values through JSON", async () => {
		const store = new MemoryStore();
		const value = { name: "Ada", tags: ["a", "b"], when: new Date(0) };

		await store.save(value, "u1", "users");

		expect(await store.load("u1", "users")).toEqual({ name: "Ada", tags: ["a", "b"], when: "1970-01-01T00:00:00.000Z" });
		expect(await store.load("u2", "users")).toBeUndefined();
		expect(await store.load("u1", "other")).toBeUndefined();
	});

	it("deletes one entity or a whole domain", async () => {
		const store = new MemoryStore();
		await store.save(1, "a", "numbers");
		await store.save(2, "b", "numbers");
		await store.save(3, "profile", "");

		await store.deleteOne("a", "numbers");
		expect(store.has("a", "numbers")).toBe(false);
		expect(store.size).toBe(2);

		await store.deleteDomain("numbers");
		expect(store.size).toBe(1);
		expect(store.has("profile", "")).toBe(true);
	});

	it("rejects empty keys and domains", async () => {
		const store = new MemoryStore();

		expect(() => store.save(1, "", "numbers")).toThrow(InvalidKeyError);
		expect(() => store.deleteDomain("")).toThrow(InvalidKeyError);
	});
});

describe("NoopStore", () => {
	it("never returns anything", async () => {
		const store = new NoopStore();
		await store.save({ a: 1 }, "k", "d");

		expect(await store.load("k", "d")).toBeUndefined();
	});
});

describe("JsonFileStore", () => {
	let rootDir: string;
	let store: JsonFileStore;

	beforeEach(async () => {
		rootDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "muxcache-store-"));
		store = new JsonFileStore({ rootDir });
	});

	afterEach(async () => {
		await fs.promises.rm(rootDir, { recursive: true, force: true });
	});

	it("lays out files by domain and key", () => {
		expect(store.filePath("u/1", "users")).toBe(path.join(rootDir, "users", "u%2F1.json"));
		expect(store.filePath("profile", "")).toBe(path.join(rootDir, "profile.json"));
	});

	it("round-trips values", async () => {
		await store.save({ id: "u1", score: 3 }, "u1", "users");

		expect(await store.load("u1", "users")).toEqual({ id: "u1", score: 3 });
	});

	it("writes an envelope and leaves no temporary files", async () => {
		await store.save([1, 2], "list", "");

		const entries = await fs.promises.readdir(rootDir);
		expect(entries).toEqual(["list.json"]);

		const raw = JSON.parse(await fs.promises.readFile(path.join(rootDir, "list.json"), "utf-8"));
		expect(raw.key).toBe("list");
		expect(raw.domain).toBe("");
		expect(raw.value).toEqual([1, 2]);
		expect(typeof raw.storedAt).toBe("string");
	});

	it("overwrites previous values", async () => {
		await store.save("first", "k", "d");
		await store.save("second", "k", "d");

		expect(await store.load("k", "d")).toBe("second");
	});

	it("returns undefined for missing and corrupted files", async () => {
		expect(await store.load("missing", "d")).toBeUndefined();

		const filePath = store.filePath("broken", "d");
		await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
		await fs.promises.writeFile(filePath, "{ not json", "utf-8");

		expect(await store.load("broken", "d")).toBeUndefined();
	});

	it("ignores an envelope written for another key", async () => {
		await store.save("value", "a", "d");
		await fs.promises.copyFile(store.filePath("a", "d"), store.filePath("b", "d"));

		expect(await store.load("b", "d")).toBeUndefined();
	});

	it("deletes one entity and whole domains", async () => {
		await store.save(1, "a", "d");
		await store.save(2, "b", "d");
		await store.save(3, "c", "other");

		await store.deleteOne("a", "d");
		expect(await store.load("a", "d")).toBeUndefined();
		expect(await store.load("b", "d")).toBe(2);

		await store.deleteDomain("d");
		expect(fs.existsSync(path.join(rootDir, "d"))).toBe(false);
		expect(await store.load("c", "other")).toBe(3);
	});

	it("treats deleting a missing entity as success", async () => {
		await expect(store.deleteOne("missing", "d")).resolves.toBeUndefined();
	});

	it("rejects empty keys and the root domain for deleteDomain", async () => {
		await expect(store.save(1, "", "d")).rejects.toBeInstanceOf(InvalidKeyError);
		await expect(store.deleteDomain("")).rejects.toBeInstanceOf(InvalidKeyError);
	});

	it("wraps write failures in StorageError", async () => {
		const blocked = new JsonFileStore({ rootDir: path.join(rootDir, "file") });
		await fs.promises.writeFile(path.join(rootDir, "file"), "not a directory", "utf-8");

		await expect(blocked.save(1, "k", "d")).rejects.toBeInstanceOf(StorageError);
	});
});
