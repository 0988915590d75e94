/**
 * @title Multiplexer Module
 * @description Single-value single-flight cache.
 *
 * Wraps one fetch coordinator for one named entity, e.g. the signed-in
 * user's profile. Concurrent requests share a single producer call; the
 * result is kept for the TTL and can be persisted under the cache's id.
 *
 * @module mux
 */

import { RegistrableCache } from "../repository/registrable.js";
import { assertNonEmpty } from "../storage/names.js";
import { toPromise, type OnFetch, type OnResult } from "../types/result.js";
import { FetchCoordinator, type CoordinatorState } from "./fetch-coordinator.js";
import { resolvePolicy, type MultiplexerBaseOptions } from "./options.js";

/** Store domain of single-value caches. */
export const ROOT_DOMAIN = "";

export interface MultiplexerOptions<T> extends MultiplexerBaseOptions {
	/** Producer of the value. */
	onFetch: OnFetch<T>;
}

/**
 * @example
 * ```typescript
 * const profile = new Multiplexer<Profile>({
 *   id: "profile",
 *   onFetch: fromAsync(() => api.getProfile()),
 * }).register();
 *
 * profile.request((result) => {
 *   if (result.ok) render(result.value);
 * });
 * ```
 */
export class Multiplexer<T> extends RegistrableCache {
	readonly id: string;
	private readonly onFetch: OnFetch<T>;
	private readonly coordinator: FetchCoordinator<T>;

	constructor(options: MultiplexerOptions<T>) {
		super();
		assertNonEmpty(options.id, "Multiplexer id");
		this.id = options.id;
		this.onFetch = options.onFetch;
		this.coordinator = new FetchCoordinator<T>(options.id, ROOT_DOMAIN, resolvePolicy(options));
	}

	/**
	 * Get the value from memory if fresh, otherwise through the producer.
	 *
	 * @param forceRefresh - Fetch even if the memoized value is fresh
	 */
	request(onResult: OnResult<T>): void;
	request(forceRefresh: boolean, onResult: OnResult<T>): void;
	request(refreshOrCallback: boolean | OnResult<T>, maybeCallback?: OnResult<T>): void {
		if (typeof refreshOrCallback === "function") {
			this.coordinator.request(false, refreshOrCallback, this.onFetch);
			return;
		}
		if (!maybeCallback) {
			throw new TypeError("Multiplexer.request: missing completion callback");
		}
		this.coordinator.request(refreshOrCallback, maybeCallback, this.onFetch);
	}

	/**
	 * Promise form of request().
	 */
	get(forceRefresh = false): Promise<T> {
		return toPromise((onResult) => this.request(forceRefresh, onResult));
	}

	/**
	 * Soft refresh: the next request fetches, keeping the current value as fallback.
	 */
	refresh(): this {
		this.coordinator.refresh();
		return this;
	}

	clearMemory(): this {
		this.coordinator.clearMemory();
		return this;
	}

	clear(): Promise<void> {
		return this.coordinator.clear();
	}

	flush(): Promise<void> {
		return this.coordinator.flush();
	}

	get state(): CoordinatorState {
		return this.coordinator.state;
	}

	/** The memoized value if it is fresh. */
	storedValue(): T | undefined {
		return this.coordinator.storedValue();
	}
}
