/**
 * @title Producers Module
 * @description HTTP-backed producers for Multiplexer and MultiplexerMap.
 *
 * @module http
 */

import { fromAsync, fromAsyncKey, type OnFetch, type OnKeyFetch } from "@muxcache/core";
import { fetchJson, type HttpOptions } from "./http.js";

export interface JsonProducerOptions<T> extends HttpOptions {
	/** Converts the parsed body into the cached value. */
	map?: (data: unknown) => T;
}

async function loadJson<T>(url: string, options: JsonProducerOptions<T>): Promise<T> {
	const { map, ...httpOptions } = options;
	if (map) {
		return map(await fetchJson<unknown>(url, httpOptions));
	}
	return fetchJson<T>(url, httpOptions);
}

/**
 * Producer fetching a JSON document.
 *
 * @example
 * ```typescript
 * const profile = new Multiplexer<Profile>({
 *   id: "profile",
 *   onFetch: jsonProducer("https://api.example.com/profile"),
 * });
 * ```
 */
export function jsonProducer<T>(url: string, options: JsonProducerOptions<T> = {}): OnFetch<T> {
	return fromAsync(() => loadJson(url, options));
}

/**
 * Keyed producer fetching one JSON document per key.
 */
export function jsonKeyProducer<K, T>(urlForKey: (key: K) => string, options: JsonProducerOptions<T> = {}): OnKeyFetch<K, T> {
	return fromAsyncKey((key: K) => loadJson(urlForKey(key), options));
}
