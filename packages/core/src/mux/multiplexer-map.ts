/**
 * @title Multiplexer Map Module
 * @description Keyed single-flight cache.
 *
 * Maintains one fetch coordinator per key, created on first use. Each key
 * has at most one producer call in flight. Values are persisted in the
 * store domain named after the map's id, one entity per key.
 *
 * @module mux
 */

import { getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";
import { RegistrableCache } from "../repository/registrable.js";
import { assertNonEmpty } from "../storage/names.js";
import type { PersistentStore } from "../storage/types.js";
import { toPromise, type OnKeyFetch, type OnResult } from "../types/result.js";
import { FetchCoordinator, type CoordinatorPolicy, type CoordinatorState } from "./fetch-coordinator.js";
import { resolvePolicy, type MultiplexerBaseOptions } from "./options.js";

/**
 * Keys with a stable, lossless string form.
 */
export type MuxKey = string | number;

export interface MultiplexerMapOptions<K extends MuxKey, T> extends MultiplexerBaseOptions {
	/** Producer of the value for one key. */
	onKeyFetch: OnKeyFetch<K, T>;
	/** String form of a key (default: String). Must not be empty. */
	keyToString?: (key: K) => string;
}

interface Slot<K, T> {
	key: K;
	coordinator: FetchCoordinator<T>;
}

/**
 * @example
 * ```typescript
 * const users = new MultiplexerMap<string, User>({
 *   id: "users",
 *   onKeyFetch: fromAsyncKey((id) => api.getUser(id)),
 * }).register();
 *
 * const user = await users.get("u1");
 * ```
 */
export class MultiplexerMap<K extends MuxKey, T> extends RegistrableCache {
	readonly id: string;
	private readonly onKeyFetch: OnKeyFetch<K, T>;
	private readonly keyToString: (key: K) => string;
	private readonly policy: CoordinatorPolicy;
	private readonly slots = new Map<string, Slot<K, T>>();

	constructor(options: MultiplexerMapOptions<K, T>) {
		super();
		assertNonEmpty(options.id, "MultiplexerMap id");
		this.id = options.id;
		this.onKeyFetch = options.onKeyFetch;
		this.keyToString = options.keyToString ?? String;
		this.policy = resolvePolicy(options);
	}

	/**
	 * Get the value for a key from memory if fresh, otherwise through the producer.
	 *
	 * @throws InvalidKeyError if the key's string form is empty
	 */
	request(key: K, onResult: OnResult<T>): void;
	request(key: K, forceRefresh: boolean, onResult: OnResult<T>): void;
	request(key: K, refreshOrCallback: boolean | OnResult<T>, maybeCallback?: OnResult<T>): void {
		const coordinator = this.coordinatorFor(key);
		const onFetch = (onResult: OnResult<T>): void => this.onKeyFetch(key, onResult);

		if (typeof refreshOrCallback === "function") {
			coordinator.request(false, refreshOrCallback, onFetch);
			return;
		}
		if (!maybeCallback) {
			throw new TypeError("MultiplexerMap.request: missing completion callback");
		}
		coordinator.request(refreshOrCallback, maybeCallback, onFetch);
	}

	/**
	 * Promise form of request().
	 */
	get(key: K, forceRefresh = false): Promise<T> {
		return toPromise((onResult) => this.request(key, forceRefresh, onResult));
	}

	/**
	 * Soft refresh of one key.
	 */
	refresh(key: K): this {
		this.slots.get(this.storeKey(key))?.coordinator.refresh();
		return this;
	}

	/**
	 * Free the memory of one key, or of the whole map.
	 */
	clearMemory(key?: K): this {
		if (key === undefined) {
			for (const slot of this.slots.values()) {
				slot.coordinator.clearMemory();
			}
			this.slots.clear();
			return this;
		}

		const storeKey = this.storeKey(key);
		this.slots.get(storeKey)?.coordinator.clearMemory();
		this.slots.delete(storeKey);
		return this;
	}

	/**
	 * Clear memory and persisted copies of one key, or of the whole map.
	 */
	async clear(key?: K): Promise<void> {
		if (key === undefined) {
			this.clearMemory();
			await this.bestEffort(this.policy.store.deleteDomain(this.id), "delete persisted values");
			return;
		}

		const storeKey = this.storeKey(key);
		this.clearMemory(key);
		await this.bestEffort(this.policy.store.deleteOne(storeKey, this.id), `delete persisted value ${storeKey}`);
	}

	/**
	 * Persist every value changed since the last flush.
	 */
	async flush(): Promise<void> {
		await Promise.all([...this.slots.values()].map((slot) => slot.coordinator.flush()));
	}

	state(key: K): CoordinatorState {
		return this.slots.get(this.storeKey(key))?.coordinator.state ?? "empty";
	}

	/** Keys that have a coordinator, in order of first use. */
	keys(): K[] {
		return [...this.slots.values()].map((slot) => slot.key);
	}

	get size(): number {
		return this.slots.size;
	}

	get store(): PersistentStore {
		return this.policy.store;
	}

	/**
	 * The memoized value of a key if it is fresh.
	 */
	storedValue(key: K): T | undefined {
		return this.slots.get(this.storeKey(key))?.coordinator.storedValue();
	}

	/**
	 * Record a value for a key obtained outside of request().
	 */
	storeSuccess(value: T, key: K): void {
		this.coordinatorFor(key).storeSuccess(value);
	}

	/**
	 * Record a failure for a key obtained outside of request().
	 *
	 * @returns The cached or persisted value the failure policy would serve, if any
	 */
	storeFailure(error: unknown, key: K): Promise<T | undefined> {
		return this.coordinatorFor(key).storeFailure(error);
	}

	private storeKey(key: K): string {
		const storeKey = this.keyToString(key);
		assertNonEmpty(storeKey, "MultiplexerMap key");
		return storeKey;
	}

	private coordinatorFor(key: K): FetchCoordinator<T> {
		const storeKey = this.storeKey(key);
		let slot = this.slots.get(storeKey);
		if (!slot) {
			slot = { key, coordinator: new FetchCoordinator<T>(storeKey, this.id, this.policy) };
			this.slots.set(storeKey, slot);
		}
		return slot.coordinator;
	}

	private async bestEffort(operation: Promise<void>, description: string): Promise<void> {
		try {
			await operation;
		} catch (error) {
			logMessage(`${this.id}: failed to ${description}: ${getErrorMessage(error)}`, "warn");
		}
	}
}
