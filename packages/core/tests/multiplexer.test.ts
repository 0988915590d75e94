import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidKeyError, NetworkError } from "../src/errors.js";
import { setLogLevel, setLogSink, type LogLevel } from "../src/log.js";
import { Multiplexer, ROOT_DOMAIN } from "../src/mux/index.js";
import { MemoryStore } from "../src/storage/index.js";
import type { Result } from "../src/types/result.js";
import { manualClock, manualProducer, offline, type ManualProducer } from "./helpers/producer.js";

interface Profile {
	name: string;
}

describe("Multiplexer", () => {
	let producer: ManualProducer<Profile>;
	let store: MemoryStore;
	let clock: ReturnType<typeof manualClock>;
	let mux: Multiplexer<Profile>;

	beforeEach(() => {
		producer = manualProducer<Profile>();
		store = new MemoryStore();
		clock = manualClock();
		mux = new Multiplexer<Profile>({
			id: "profile",
			onFetch: producer.onFetch,
			store,
			ttl: 1000,
			now: clock.now,
		});
	});

	it("rejects an empty id and a negative ttl", () => {
		expect(() => new Multiplexer({ id: "", onFetch: producer.onFetch, store })).toThrow(InvalidKeyError);
		expect(() => new Multiplexer({ id: "p", onFetch: producer.onFetch, store, ttl: -1 })).toThrow(RangeError);
	});

	it("calls the producer once for concurrent requests", () => {
		const results: Result<Profile>[] = [];
		mux.request((result) => results.push(result));
		mux.request((result) => results.push(result));
		mux.request(true, (result) => results.push(result));

		expect(producer.onFetch).toHaveBeenCalledTimes(1);
		expect(mux.state).toBe("fetching");

		producer.resolve({ name: "Ada" });

		expect(results).toEqual([
			{ ok: true, value: { name: "Ada" } },
			{ ok: true, value: { name: "Ada" } },
			{ ok: true, value: { name: "Ada" } },
		]);
		expect(mux.state).toBe("fresh");
	});

	it("delivers to waiters in arrival order", () => {
		const order: string[] = [];
		mux.request(() => order.push("first"));
		mux.request(() => order.push("second"));
		mux.request(() => order.push("third"));

		producer.resolve({ name: "Ada" });

		expect(order).toEqual(["first", "second", "third"]);
	});

	it("answers from memory synchronously while fresh", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });

		let answered: Result<Profile> | undefined;
		mux.request((result) => {
			answered = result;
		});

		expect(answered).toEqual({ ok: true, value: { name: "Ada" } });
		expect(producer.onFetch).toHaveBeenCalledTimes(1);
	});

	it("keeps values fresh up to and including the ttl", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });

		clock.advance(1000);
		expect(mux.state).toBe("fresh");
		mux.request(() => undefined);
		expect(producer.onFetch).toHaveBeenCalledTimes(1);

		clock.advance(1);
		expect(mux.state).toBe("stale");
		expect(mux.storedValue()).toBeUndefined();
		mux.request(() => undefined);
		expect(producer.onFetch).toHaveBeenCalledTimes(2);
	});

	it("fetches on forceRefresh even when fresh", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });

		const results: Result<Profile>[] = [];
		mux.request(true, (result) => results.push(result));
		producer.resolve({ name: "Grace" });

		expect(producer.onFetch).toHaveBeenCalledTimes(2);
		expect(results).toEqual([{ ok: true, value: { name: "Grace" } }]);
	});

	it("fetches once after refresh() and keeps the old value as fallback", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });

		expect(mux.refresh()).toBe(mux);
		expect(mux.state).toBe("stale");

		const results: Result<Profile>[] = [];
		mux.request((result) => results.push(result));
		producer.reject(offline());

		expect(producer.onFetch).toHaveBeenCalledTimes(2);
		expect(results).toEqual([{ ok: true, value: { name: "Ada" } }]);
		expect(mux.state).toBe("stale");
	});

	it("does not start a second fetch when refresh() is called during one", () => {
		const results: Result<Profile>[] = [];
		mux.request((result) => results.push(result));
		mux.refresh();
		mux.request((result) => results.push(result));

		expect(producer.onFetch).toHaveBeenCalledTimes(1);

		producer.resolve({ name: "Ada" });

		expect(producer.onFetch).toHaveBeenCalledTimes(1);
		expect(results).toEqual([
			{ ok: true, value: { name: "Ada" } },
			{ ok: true, value: { name: "Ada" } },
		]);
	});

	it("lets a completion request the same value again", () => {
		const names: string[] = [];
		const nameOf = (result: Result<Profile>): string => (result.ok ? result.value.name : "error");
		mux.request((first) => {
			names.push(nameOf(first));
			mux.request(true, (second) => names.push(nameOf(second)));
		});
		mux.request((result) => names.push(`other ${nameOf(result)}`));

		producer.resolve({ name: "Ada" });

		expect(producer.onFetch).toHaveBeenCalledTimes(2);
		expect(names).toEqual(["Ada", "other Ada"]);
		expect(mux.state).toBe("fetching");

		producer.resolve({ name: "Grace" });

		expect(names).toEqual(["Ada", "other Ada", "Grace"]);
		expect(mux.storedValue()).toEqual({ name: "Grace" });
	});

	it("serves the memoized value on a connectivity failure", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });
		clock.advance(5000);

		const results: Result<Profile>[] = [];
		mux.request((result) => results.push(result));
		producer.reject(offline());

		expect(results).toEqual([{ ok: true, value: { name: "Ada" } }]);

		mux.request(() => undefined);
		expect(producer.onFetch).toHaveBeenCalledTimes(3);
	});

	it("reports terminal failures and forgets the value", () => {
		mux.request(() => undefined);
		producer.resolve({ name: "Ada" });
		clock.advance(5000);

		const error = new NetworkError("HTTP 500", { statusCode: 500 });
		const results: Result<Profile>[] = [];
		mux.request((result) => results.push(result));
		producer.reject(error);

		expect(results).toEqual([{ ok: false, error }]);
		expect(mux.state).toBe("empty");
	});

	it("serves the persisted value on a connectivity failure with empty memory", async () => {
		await store.save({ name: "Persisted" }, "profile", ROOT_DOMAIN);

		const pending = mux.get();
		producer.reject(offline());

		await expect(pending).resolves.toEqual({ name: "Persisted" });
		expect(mux.state).toBe("stale");
		expect(mux.storedValue()).toBeUndefined();
	});

	it("fails when nothing is cached or persisted", async () => {
		const error = offline();
		const pending = mux.get();
		producer.reject(error);

		await expect(pending).rejects.toBe(error);
		expect(mux.state).toBe("empty");
	});

	it("ignores persisted values rejected by validate", async () => {
		const validated = new Multiplexer<Profile>({
			id: "profile",
			onFetch: producer.onFetch,
			store,
			validate: (value) => typeof value === "object" && value !== null && "name" in value,
		});
		await store.save({ nickname: "old format" }, "profile", ROOT_DOMAIN);

		const pending = validated.get();
		producer.reject(offline());

		await expect(pending).rejects.toBeInstanceOf(NetworkError);
	});

	it("turns a synchronous producer throw into a failure", async () => {
		const error = new Error("producer bug");
		const throwing = new Multiplexer<Profile>({
			id: "throwing",
			store,
			onFetch: () => {
				throw error;
			},
		});

		await expect(throwing.get()).rejects.toBe(error);
	});

	describe("callbacks", () => {
		const messages: [string, LogLevel][] = [];

		beforeEach(() => {
			messages.length = 0;
			setLogLevel("warn");
			setLogSink((message, level) => messages.push([message, level]));
		});

		afterEach(() => {
			setLogSink(undefined);
			setLogLevel(undefined);
		});

		it("ignores a second result from the producer", () => {
			const results: Result<Profile>[] = [];
			mux.request((result) => results.push(result));

			const onResult = producer.pending[0];
			producer.resolve({ name: "Ada" });
			onResult?.({ ok: true, value: { name: "Twice" } });

			expect(results).toEqual([{ ok: true, value: { name: "Ada" } }]);
			expect(mux.storedValue()).toEqual({ name: "Ada" });
			expect(messages).toEqual([["(root)/profile: producer reported a result more than once, ignoring", "warn"]]);
		});

		it("keeps delivering when a callback throws", () => {
			const after = vi.fn();
			mux.request(() => {
				throw new Error("boom");
			});
			mux.request(after);

			producer.resolve({ name: "Ada" });

			expect(after).toHaveBeenCalledWith({ ok: true, value: { name: "Ada" } });
			expect(messages).toEqual([["Completion callback threw: boom", "error"]]);
		});
	});

	describe("clearMemory", () => {
		it("forgets the value", () => {
			mux.request(() => undefined);
			producer.resolve({ name: "Ada" });

			expect(mux.clearMemory()).toBe(mux);
			expect(mux.state).toBe("empty");
			expect(mux.storedValue()).toBeUndefined();
		});

		it("detaches a fetch in flight", () => {
			const first: Result<Profile>[] = [];
			const second: Result<Profile>[] = [];
			mux.request((result) => first.push(result));

			mux.clearMemory();
			expect(mux.state).toBe("empty");

			mux.request((result) => second.push(result));
			expect(producer.onFetch).toHaveBeenCalledTimes(2);

			producer.resolve({ name: "Old" });
			expect(first).toEqual([{ ok: true, value: { name: "Old" } }]);
			expect(second).toEqual([]);
			expect(mux.state).toBe("fetching");

			producer.resolve({ name: "New" });
			expect(second).toEqual([{ ok: true, value: { name: "New" } }]);
			expect(mux.storedValue()).toEqual({ name: "New" });
		});

		it("does not keep the result of a detached fetch", () => {
			const results: Result<Profile>[] = [];
			mux.request((result) => results.push(result));
			mux.clearMemory();

			producer.resolve({ name: "Old" });

			expect(results).toEqual([{ ok: true, value: { name: "Old" } }]);
			expect(mux.state).toBe("empty");
		});
	});

	describe("persistence", () => {
		it("writes the value on flush and only when it changed", async () => {
			const save = vi.spyOn(store, "save");
			mux.request(() => undefined);
			producer.resolve({ name: "Ada" });

			await mux.flush();
			await mux.flush();

			expect(save).toHaveBeenCalledTimes(1);
			expect(await store.load("profile", ROOT_DOMAIN)).toEqual({ name: "Ada" });
		});

		it("does not write anything before a value is fetched", async () => {
			await mux.flush();

			expect(store.size).toBe(0);
		});

		it("writes immediately with autoFlush", () => {
			const auto = new Multiplexer<Profile>({ id: "auto", onFetch: producer.onFetch, store, autoFlush: true });
			auto.request(() => undefined);
			producer.resolve({ name: "Ada" });

			expect(store.has("auto", ROOT_DOMAIN)).toBe(true);
		});

		it("serves a value persisted by a previous instance", async () => {
			mux.request(() => undefined);
			producer.resolve({ name: "Ada" });
			await mux.flush();

			const restarted = new Multiplexer<Profile>({ id: "profile", onFetch: producer.onFetch, store });
			const pending = restarted.get();
			producer.reject(offline());

			await expect(pending).resolves.toEqual({ name: "Ada" });
		});

		it("keeps the value dirty when the write fails", async () => {
			const save = vi.spyOn(store, "save").mockRejectedValueOnce(new Error("disk full"));
			mux.request(() => undefined);
			producer.resolve({ name: "Ada" });

			await mux.flush();
			await mux.flush();

			expect(save).toHaveBeenCalledTimes(2);
			expect(store.has("profile", ROOT_DOMAIN)).toBe(true);
		});

		it("clear() removes memory and the persisted copy", async () => {
			mux.request(() => undefined);
			producer.resolve({ name: "Ada" });
			await mux.flush();

			await mux.clear();

			expect(mux.state).toBe("empty");
			expect(store.has("profile", ROOT_DOMAIN)).toBe(false);
		});
	});
});
