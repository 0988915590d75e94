/**
 * @title Multi Requester Module
 * @description Multi-ID requests sharing a MultiplexerMap's cache.
 *
 * For backends that can return several objects in one call (e.g.
 * `/profiles/[id1,id2]`). Fresh values already held by the map are reused
 * and only the missing keys are requested; returned objects are stored
 * back into the map so later single-key requests hit the cache.
 *
 * @module mux
 */

import type { OnResult } from "../types/result.js";
import type { MultiplexerMap, MuxKey } from "./multiplexer-map.js";

/**
 * Multi-ID producer: fetches the objects for a list of keys.
 */
export type OnMultiFetch<K, T> = (keys: K[], onResult: OnResult<T[]>) => void;

/**
 * Receives the values found (cached or fetched) and the fetch error, if any.
 * The values may be fewer than the keys requested and are not ordered.
 */
export type OnMultiResult<K, T> = (values: Map<K, T>, error?: unknown) => void;

export class MultiRequester<K extends MuxKey, T extends { id: K }> {
	constructor(
		private readonly map: MultiplexerMap<K, T>,
		private readonly onMultiFetch: OnMultiFetch<K, T>,
	) {}

	/**
	 * Retrieve the objects for a set of keys.
	 *
	 * On a fetch failure the completion receives whatever fallback values the
	 * map's failure policy allows, together with the error.
	 */
	request(keys: K[], completion?: OnMultiResult<K, T>): void {
		const values = new Map<K, T>();
		const remainingKeys: K[] = [];

		for (const key of keys) {
			const value = this.map.storedValue(key);
			if (value === undefined) {
				remainingKeys.push(key);
			} else {
				values.set(key, value);
			}
		}

		if (remainingKeys.length === 0) {
			completion?.(values);
			return;
		}

		this.onMultiFetch(remainingKeys, (result) => {
			if (result.ok) {
				for (const value of result.value) {
					this.map.storeSuccess(value, value.id);
					values.set(value.id, value);
				}
				completion?.(values);
				return;
			}

			Promise.all(
				remainingKeys.map(async (key) => {
					const fallback = await this.map.storeFailure(result.error, key);
					if (fallback !== undefined) {
						values.set(key, fallback);
					}
				}),
			).then(
				() => completion?.(values, result.error),
				(fallbackError: unknown) => completion?.(values, fallbackError),
			);
		});
	}

	/**
	 * Promise form of request().
	 */
	get(keys: K[]): Promise<{ values: Map<K, T>; error?: unknown }> {
		return new Promise((resolve) => {
			this.request(keys, (values, error) => resolve(error === undefined ? { values } : { values, error }));
		});
	}

	/**
	 * Store objects obtained elsewhere into the map.
	 */
	storeSuccess(values: T[]): void {
		for (const value of values) {
			this.map.storeSuccess(value, value.id);
		}
	}
}
