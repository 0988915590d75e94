import type { PersistentStore } from "./types.js";
import { assertNonEmpty } from "./names.js";

/**
 * In-process store keeping values as serialized JSON.
 *
 * Values go through JSON exactly as they would on disk, so a new cache built
 * over the same store sees what a restarted process would.
 */
export class MemoryStore implements PersistentStore {
	private readonly domains = new Map<string, Map<string, string>>();

	load<T>(key: string, domain: string): Promise<T | undefined> {
		assertNonEmpty(key, "Store key");
		const raw = this.domains.get(domain)?.get(key);
		if (raw === undefined) {
			return Promise.resolve(undefined);
		}
		return Promise.resolve(JSON.parse(raw) as T);
	}

	save<T>(value: T, key: string, domain: string): Promise<void> {
		assertNonEmpty(key, "Store key");
		let entries = this.domains.get(domain);
		if (!entries) {
			entries = new Map();
			this.domains.set(domain, entries);
		}
		entries.set(key, JSON.stringify(value));
		return Promise.resolve();
	}

	deleteOne(key: string, domain: string): Promise<void> {
		this.domains.get(domain)?.delete(key);
		return Promise.resolve();
	}

	deleteDomain(domain: string): Promise<void> {
		assertNonEmpty(domain, "Store domain");
		this.domains.delete(domain);
		return Promise.resolve();
	}

	has(key: string, domain: string): boolean {
		return this.domains.get(domain)?.has(key) ?? false;
	}

	/** Number of stored entities across all domains. */
	get size(): number {
		let total = 0;
		for (const entries of this.domains.values()) {
			total += entries.size;
		}
		return total;
	}
}
