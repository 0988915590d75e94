/**
 * @title Fetch Coordinator Module
 * @description Per-key single-flight state machine.
 *
 * A coordinator owns the memoized value of one entity, its completion time,
 * the in-flight fetch with its queue of waiting callbacks, the soft-refresh
 * flag and the dirty flag. At most one producer call is outstanding per
 * coordinator; every caller arriving meanwhile is answered by it.
 *
 * Clearing memory while a fetch is in flight detaches that fetch: its waiters
 * still receive its result, but the result no longer populates the
 * coordinator, and the next request starts a new fetch.
 *
 * @module mux
 */

import { getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";
import type { PersistentStore } from "../storage/types.js";
import { deliver, failure, success, type OnFetch, type OnResult, type Result } from "../types/result.js";

/**
 * Observable state of a coordinator.
 */
export type CoordinatorState = "empty" | "fresh" | "stale" | "fetching";

/**
 * Settings a cache hands to each of its coordinators.
 */
export interface CoordinatorPolicy {
	/** Time-to-live of a fetched value in milliseconds. */
	ttl: number;
	/** Decides whether a failed fetch may be answered with a cached value. */
	useCachedResultOn: (error: unknown) => boolean;
	store: PersistentStore;
	/** Rejects values loaded from the store; rejected values count as missing. */
	validate?: (value: unknown) => boolean;
	/** Persist every successful fetch immediately instead of waiting for flush(). */
	autoFlush: boolean;
	now: () => number;
}

interface Flight<T> {
	waiters: OnResult<T>[];
	settled: boolean;
}

interface Memo<T> {
	value: T;
}

export class FetchCoordinator<T> {
	private memo: Memo<T> | undefined;
	private completionTime: number | undefined;
	private flight: Flight<T> | undefined;
	private refreshRequested = false;
	private dirty = false;

	/**
	 * @param key - Store key of the entity
	 * @param domain - Store domain of the entity ("" for the root collection)
	 * @param policy - Cache-wide settings
	 */
	constructor(
		readonly key: string,
		readonly domain: string,
		private readonly policy: CoordinatorPolicy,
	) {}

	get state(): CoordinatorState {
		if (this.flight) {
			return "fetching";
		}
		if (!this.memo) {
			return "empty";
		}
		return this.isFresh() ? "fresh" : "stale";
	}

	/** True when the memoized value has not been written to the store yet. */
	get isDirty(): boolean {
		return this.dirty;
	}

	/**
	 * Answer from memory when the value is fresh, otherwise join or start a fetch.
	 *
	 * @param forceRefresh - Skip the freshness check
	 * @param onResult - Completion callback
	 * @param onFetch - Producer, invoked only when no fetch is in flight
	 */
	request(forceRefresh: boolean, onResult: OnResult<T>, onFetch: OnFetch<T>): void {
		const memo = this.memo;
		if (!forceRefresh && memo && this.isFresh()) {
			onResult(success(memo.value));
			return;
		}

		this.refreshRequested = false;

		if (this.flight) {
			this.flight.waiters.push(onResult);
			return;
		}

		const flight: Flight<T> = { waiters: [onResult], settled: false };
		this.flight = flight;
		logMessage(`${this.label}: fetching`, "debug");

		const onFetchResult: OnResult<T> = (result) => {
			if (flight.settled) {
				logMessage(`${this.label}: producer reported a result more than once, ignoring`, "warn");
				return;
			}
			flight.settled = true;
			this.settle(flight, result);
		};

		try {
			onFetch(onFetchResult);
		} catch (error) {
			onFetchResult(failure(error));
		}
	}

	/**
	 * Make the next request fetch even if the value is still fresh.
	 * Does not affect a fetch already in flight.
	 */
	refresh(): void {
		this.refreshRequested = true;
	}

	/**
	 * Forget the memoized value and detach any in-flight fetch.
	 */
	clearMemory(): void {
		if (this.flight) {
			logMessage(`${this.label}: memory cleared during fetch, its result will not be kept`, "debug");
			this.flight = undefined;
		}
		this.memo = undefined;
		this.completionTime = undefined;
		this.refreshRequested = false;
		this.dirty = false;
	}

	/**
	 * Forget the memoized value and delete the persisted copy.
	 */
	async clear(): Promise<void> {
		this.clearMemory();
		try {
			await this.policy.store.deleteOne(this.key, this.domain);
		} catch (error) {
			logMessage(`${this.label}: failed to delete persisted value: ${getErrorMessage(error)}`, "warn");
		}
	}

	/**
	 * Persist the memoized value if it changed since the last write.
	 * Storage failures are logged; the value stays dirty for the next flush.
	 */
	async flush(): Promise<void> {
		const memo = this.memo;
		if (!this.dirty || !memo) {
			return;
		}

		this.dirty = false;
		try {
			await this.policy.store.save(memo.value, this.key, this.domain);
			logMessage(`${this.label}: flushed`, "debug");
		} catch (error) {
			if (this.memo === memo) {
				this.dirty = true;
			}
			logMessage(`${this.label}: failed to persist value: ${getErrorMessage(error)}`, "warn");
		}
	}

	/**
	 * The memoized value if it is fresh.
	 */
	storedValue(): T | undefined {
		return this.memo && this.isFresh() ? this.memo.value : undefined;
	}

	/**
	 * Record a value obtained outside of request(), as if a fetch had returned it.
	 */
	storeSuccess(value: T): void {
		this.memo = { value };
		this.completionTime = this.policy.now();
		this.dirty = true;
		this.scheduleAutoFlush();
	}

	/**
	 * Record a failure obtained outside of request().
	 *
	 * @returns The value the failure policy would serve instead, if any
	 */
	async storeFailure(error: unknown): Promise<T | undefined> {
		if (!this.policy.useCachedResultOn(error)) {
			this.forget();
			return undefined;
		}

		const memo = this.memo ?? (await this.loadFromStore());
		if (!memo) {
			this.forget();
			return undefined;
		}
		this.adoptFallback(memo);
		return memo.value;
	}

	private get label(): string {
		return `${this.domain || "(root)"}/${this.key}`;
	}

	private isFresh(): boolean {
		if (this.refreshRequested || this.completionTime === undefined) {
			return false;
		}
		return this.policy.now() <= this.completionTime + this.policy.ttl;
	}

	private settle(flight: Flight<T>, result: Result<T>): void {
		if (!result.ok) {
			this.settleFailure(flight, result.error);
			return;
		}

		if (this.flight === flight) {
			this.memo = { value: result.value };
			this.completionTime = this.policy.now();
			this.dirty = true;
			this.scheduleAutoFlush();
		}
		logMessage(`${this.label}: fetched`, "debug");
		this.complete(flight, result);
	}

	private settleFailure(flight: Flight<T>, error: unknown): void {
		if (!this.policy.useCachedResultOn(error)) {
			this.fail(flight, error);
			return;
		}

		const memo = this.flight === flight ? this.memo : undefined;
		if (memo) {
			this.adoptFallback(memo);
			logMessage(`${this.label}: fetch failed (${getErrorMessage(error)}), serving cached value`, "info");
			this.complete(flight, success(memo.value));
			return;
		}

		this.loadFromStore()
			.then((loaded) => {
				if (!loaded) {
					this.fail(flight, error);
					return;
				}
				if (this.flight === flight) {
					this.adoptFallback(loaded);
					this.dirty = false;
				}
				logMessage(`${this.label}: fetch failed (${getErrorMessage(error)}), serving persisted value`, "info");
				this.complete(flight, success(loaded.value));
			})
			.catch((loadError: unknown) => {
				this.fail(flight, loadError);
			});
	}

	private fail(flight: Flight<T>, error: unknown): void {
		if (this.flight === flight) {
			this.forget();
		}
		logMessage(`${this.label}: fetch failed: ${getErrorMessage(error)}`, "debug");
		this.complete(flight, failure(error));
	}

	/**
	 * Keep a fallback value but leave it stale so the next request fetches again.
	 */
	private adoptFallback(memo: Memo<T>): void {
		this.memo = memo;
		this.completionTime = undefined;
	}

	private forget(): void {
		this.memo = undefined;
		this.completionTime = undefined;
		this.dirty = false;
	}

	/**
	 * Detach the flight and answer its waiters, oldest first.
	 * The waiter list is snapshotted so a callback may issue a new request.
	 */
	private complete(flight: Flight<T>, result: Result<T>): void {
		if (this.flight === flight) {
			this.flight = undefined;
		}
		const waiters = flight.waiters.splice(0);
		deliver(waiters, result);
	}

	private async loadFromStore(): Promise<Memo<T> | undefined> {
		try {
			const value = await this.policy.store.load<T>(this.key, this.domain);
			if (value === undefined) {
				return undefined;
			}
			if (this.policy.validate && !this.policy.validate(value)) {
				logMessage(`${this.label}: persisted value failed validation, ignoring`, "debug");
				return undefined;
			}
			return { value };
		} catch (error) {
			logMessage(`${this.label}: cannot load persisted value: ${getErrorMessage(error)}`, "debug");
			return undefined;
		}
	}

	private scheduleAutoFlush(): void {
		if (!this.policy.autoFlush) {
			return;
		}
		this.flush().catch((error: unknown) => {
			logMessage(`${this.label}: automatic flush failed: ${getErrorMessage(error)}`, "warn");
		});
	}
}
