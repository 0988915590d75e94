/**
 * @title Mux Repository Module
 * @description Table of cache instances for bulk flush and clear operations.
 *
 * Entries are keyed by their `id` and held by strong reference: instances
 * that are not meant to live for the whole process must be unregistered
 * before they are dropped.
 *
 * @module repository
 */

import { RegistryError, getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";

/**
 * What a cache exposes to the repository.
 */
export interface RepositoryEntry {
	/** Stable identifier, unique within a repository. */
	readonly id: string;
	/** Write memory-cached values to persistent storage. */
	flush(): Promise<void>;
	/** Free memory; the next request fetches again. */
	clearMemory(): unknown;
	/** Clear memory and persistent storage. */
	clear(): Promise<void>;
}

export class MuxRepository {
	private readonly entries = new Map<string, RepositoryEntry>();
	private exitHandler: (() => void) | undefined;

	/**
	 * Add an entry.
	 *
	 * @throws RegistryError if another entry has the same id
	 */
	register(entry: RepositoryEntry): void {
		if (this.entries.has(entry.id)) {
			throw new RegistryError(`MuxRepository: duplicate registration (ID: ${entry.id})`, { id: entry.id });
		}
		this.entries.set(entry.id, entry);
		logMessage(`MuxRepository: registered ${entry.id}`, "debug");
	}

	/**
	 * Remove an entry by instance or id.
	 *
	 * @returns True if an entry was removed
	 */
	unregister(entry: RepositoryEntry | string): boolean {
		const id = typeof entry === "string" ? entry : entry.id;
		const current = this.entries.get(id);
		if (!current || (typeof entry !== "string" && current !== entry)) {
			return false;
		}
		this.entries.delete(id);
		logMessage(`MuxRepository: unregistered ${id}`, "debug");
		return true;
	}

	has(id: string): boolean {
		return this.entries.has(id);
	}

	get(id: string): RepositoryEntry | undefined {
		return this.entries.get(id);
	}

	get size(): number {
		return this.entries.size;
	}

	ids(): string[] {
		return [...this.entries.keys()];
	}

	/**
	 * Write every entry's memory-cached values to persistent storage.
	 */
	async flushAll(): Promise<void> {
		logMessage(`MuxRepository: flushing ${this.entries.size} entries`, "debug");
		await Promise.all([...this.entries.values()].map((entry) => entry.flush()));
	}

	/**
	 * Clear memory and persistent storage of every entry, e.g. on sign-out.
	 */
	async clearAll(): Promise<void> {
		await Promise.all([...this.entries.values()].map((entry) => entry.clear()));
	}

	/**
	 * Free the memory of every entry, e.g. under memory pressure.
	 */
	clearMemoryAll(): void {
		for (const entry of this.entries.values()) {
			entry.clearMemory();
		}
	}

	get automaticFlush(): boolean {
		return this.exitHandler !== undefined;
	}

	/**
	 * Flush all entries when the process is about to exit.
	 */
	setAutomaticFlush(enabled: boolean): void {
		if (enabled && !this.exitHandler) {
			const handler = (): void => {
				this.flushAll().catch((error: unknown) => {
					logMessage(`MuxRepository: flush on exit failed: ${getErrorMessage(error)}`, "error");
				});
			};
			process.on("beforeExit", handler);
			this.exitHandler = handler;
		} else if (!enabled && this.exitHandler) {
			process.off("beforeExit", this.exitHandler);
			this.exitHandler = undefined;
		}
	}

	/**
	 * Drop every entry and detach the exit hook.
	 */
	dispose(): void {
		this.setAutomaticFlush(false);
		this.entries.clear();
	}
}

let defaultRepository: MuxRepository | undefined;

/**
 * The process-wide repository used when none is passed to register().
 */
export function getDefaultRepository(): MuxRepository {
	defaultRepository ??= new MuxRepository();
	return defaultRepository;
}

/**
 * Dispose of the process-wide repository and start a new one.
 */
export function resetDefaultRepository(): MuxRepository {
	defaultRepository?.dispose();
	defaultRepository = new MuxRepository();
	return defaultRepository;
}
