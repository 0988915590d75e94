/**
 * Options shared by Multiplexer and MultiplexerMap.
 */

import { DEFAULT_TTL } from "../config.js";
import { isConnectivityError } from "../errors.js";
import { JsonFileStore } from "../storage/json-file-store.js";
import type { PersistentStore } from "../storage/types.js";
import type { CoordinatorPolicy } from "./fetch-coordinator.js";

export interface MultiplexerBaseOptions {
	/** Stable identifier: registry key and persistent-store name. */
	id: string;
	/** Time-to-live in milliseconds (default: 30 minutes). */
	ttl?: number;
	/**
	 * Whether a failed fetch may be answered with the cached or persisted
	 * value (default: connectivity errors only).
	 */
	useCachedResultOn?: (error: unknown) => boolean;
	/** Persistent store (default: JSON files under the platform cache directory). */
	store?: PersistentStore;
	/** Checks values loaded from the store before they are served. */
	validate?: (value: unknown) => boolean;
	/** Persist each successful fetch immediately (default: false, wait for flush()). */
	autoFlush?: boolean;
	/** Clock in milliseconds (default: Date.now). */
	now?: () => number;
}

/**
 * Turn user options into the policy handed to coordinators.
 */
export function resolvePolicy(options: MultiplexerBaseOptions): CoordinatorPolicy {
	const ttl = options.ttl ?? DEFAULT_TTL;
	if (!Number.isFinite(ttl) || ttl < 0) {
		throw new RangeError(`ttl must be a non-negative number of milliseconds, got ${ttl}`);
	}

	return {
		ttl,
		useCachedResultOn: options.useCachedResultOn ?? isConnectivityError,
		store: options.store ?? new JsonFileStore(),
		validate: options.validate,
		autoFlush: options.autoFlush ?? false,
		now: options.now ?? (() => Date.now()),
	};
}
