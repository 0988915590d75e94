/**
 * @title JSON File Store Module
 * @description Default persistent store writing one JSON file per entity.
 *
 * Layout: `<rootDir>/<domain>/<key>.json`, both names percent-encoded.
 * Writes go to a temporary file next to the target and are renamed into
 * place, so readers never see a partially written file.
 *
 * @module storage
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { getDefaultCacheDir } from "../config.js";
import { StorageError, getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";
import { assertNonEmpty, encodeName } from "./names.js";
import type { PersistentStore, StoredEntry } from "./types.js";

/** Subdirectory of the cache directory used by default. */
const STORE_DIRNAME = "mux";

/** Extension of entity files. */
const FILE_EXTENSION = ".json";

export interface JsonFileStoreOptions {
	/** Root directory (default: `<cache dir>/mux`). */
	rootDir?: string;
	/**
	 * Produce human-readable JSON (2-space indent) when true.
	 */
	pretty?: boolean;
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class JsonFileStore implements PersistentStore {
	readonly rootDir: string;
	private readonly pretty: boolean;

	constructor(options: JsonFileStoreOptions = {}) {
		this.rootDir = options.rootDir ?? path.join(getDefaultCacheDir(), STORE_DIRNAME);
		this.pretty = options.pretty ?? false;
	}

	async load<T>(key: string, domain: string): Promise<T | undefined> {
		const filePath = this.filePath(key, domain);

		let content: string;
		try {
			content = await fs.promises.readFile(filePath, "utf-8");
		} catch (error) {
			if (!isNotFound(error)) {
				logMessage(`JsonFileStore: cannot read ${filePath}: ${getErrorMessage(error)}`, "debug");
			}
			return undefined;
		}

		try {
			const entry = JSON.parse(content) as StoredEntry<T>;
			if (!isValidStoredEntry(entry, key, domain)) {
				logMessage(`JsonFileStore: ignoring foreign or malformed entry ${filePath}`, "debug");
				return undefined;
			}
			return entry.value;
		} catch (error) {
			// Corrupted or partially copied file: treat as not cached, the next
			// successful flush overwrites it.
			logMessage(`JsonFileStore: cannot parse ${filePath}: ${getErrorMessage(error)}`, "debug");
			return undefined;
		}
	}

	async save<T>(value: T, key: string, domain: string): Promise<void> {
		const filePath = this.filePath(key, domain);
		const tempPath = `${filePath}.${randomUUID()}.tmp`;
		const entry: StoredEntry<T> = {
			key,
			domain,
			storedAt: new Date().toISOString(),
			value,
		};

		try {
			await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
			await fs.promises.writeFile(tempPath, JSON.stringify(entry, null, this.pretty ? 2 : undefined), "utf-8");
			await fs.promises.rename(tempPath, filePath);
		} catch (error) {
			await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				logMessage(`JsonFileStore: cannot remove ${tempPath}: ${getErrorMessage(cleanupError)}`, "debug");
			});
			throw new StorageError(`Failed to write ${filePath}`, { domain, key, cause: error });
		}
	}

	async deleteOne(key: string, domain: string): Promise<void> {
		const filePath = this.filePath(key, domain);
		try {
			await fs.promises.rm(filePath, { force: true });
		} catch (error) {
			throw new StorageError(`Failed to delete ${filePath}`, { domain, key, cause: error });
		}
	}

	async deleteDomain(domain: string): Promise<void> {
		assertNonEmpty(domain, "Store domain");
		const dir = this.domainDir(domain);
		try {
			await fs.promises.rm(dir, { recursive: true, force: true });
		} catch (error) {
			throw new StorageError(`Failed to delete ${dir}`, { domain, cause: error });
		}
	}

	/**
	 * Path of the file holding an entity.
	 *
	 * @param key - Entity key (non-empty)
	 * @param domain - Collection name, "" for the root collection
	 */
	filePath(key: string, domain: string): string {
		assertNonEmpty(key, "Store key");
		return path.join(this.domainDir(domain), `${encodeName(key)}${FILE_EXTENSION}`);
	}

	private domainDir(domain: string): string {
		return domain ? path.join(this.rootDir, encodeName(domain)) : this.rootDir;
	}
}

/**
 * Validate a parsed envelope against the entity it was read for.
 */
function isValidStoredEntry<T>(entry: StoredEntry<T>, key: string, domain: string): boolean {
	if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
		return false;
	}
	return entry.key === key && entry.domain === domain && "value" in entry;
}
