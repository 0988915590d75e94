import type { PersistentStore } from "./types.js";

/**
 * Store that never persists anything, for memory-only caching.
 */
export class NoopStore implements PersistentStore {
	load<T>(_key: string, _domain: string): Promise<T | undefined> {
		return Promise.resolve(undefined);
	}

	save<T>(_value: T, _key: string, _domain: string): Promise<void> {
		return Promise.resolve();
	}

	deleteOne(_key: string, _domain: string): Promise<void> {
		return Promise.resolve();
	}

	deleteDomain(_domain: string): Promise<void> {
		return Promise.resolve();
	}
}
