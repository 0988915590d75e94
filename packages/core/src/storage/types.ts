/**
 * Persistent store contract.
 */

/**
 * Byte-oriented storage addressed by (domain, key).
 *
 * The domain is the logical collection (a keyed cache's id); the key is the
 * entity identifier inside it. The empty domain is the root collection used
 * by single-value caches.
 */
export interface PersistentStore {
	/** Read a value, or undefined when it is missing or unreadable. */
	load<T>(key: string, domain: string): Promise<T | undefined>;
	save<T>(value: T, key: string, domain: string): Promise<void>;
	deleteOne(key: string, domain: string): Promise<void>;
	/** Delete every entity of a collection. */
	deleteDomain(domain: string): Promise<void>;
}

/**
 * On-disk envelope of a persisted value.
 */
export interface StoredEntry<T> {
	key: string;
	domain: string;
	/** Time the value was written (ISO-8601). */
	storedAt: string;
	value: T;
}
