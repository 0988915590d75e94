/**
 * @title Caching Loader Module
 * @description Download-deduplicating blob cache with an LRU of decoded objects.
 *
 * Blobs are assumed immutable at their URL: once downloaded, a file is kept
 * on disk until clear() is called, and there is no TTL. Decoded objects are
 * kept in a capacity-bounded LRU in front of the disk cache.
 *
 * @module loader
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_MEM_CACHE_CAPACITY, getDefaultCacheDir } from "../config.js";
import { DownloadError, InvalidKeyError, TransformError, getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";
import { LRUCache } from "../lru/lru-cache.js";
import { RegistrableCache } from "../repository/registrable.js";
import { assertNonEmpty, encodeName } from "../storage/names.js";
import { deliver, failure, success, toPromise, type OnResult, type Result } from "../types/result.js";
import { FileBlobStore } from "./file-blob-store.js";
import type { BlobStore, DownloadProgress, Downloader, PrepareObject } from "./types.js";
import { toUrlSafeHash } from "./url-hash.js";

/** Length of the hashed part of cache file names. */
const HASH_LENGTH = 32;

export interface CachingLoaderOptions<T> {
	/** Stable identifier: registry key and cache subdirectory name, e.g. "Images". */
	id: string;
	/** Root cache directory (default: platform cache directory). */
	cacheDir?: string;
	/** Downloads a remote blob to a temporary file. */
	download: Downloader;
	/** Converts a cached file to its in-memory form; undefined marks it corrupt. */
	prepare: PrepareObject<T>;
	/** Number of decoded objects kept in memory (default: 50). */
	memoryCacheCapacity?: number;
	/** File operations (default: local file system). */
	blobStore?: BlobStore;
}

/** Scheme prefix of a URL; single letters are drive names, not schemes. */
const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]+):/i;

/**
 * Check whether a locator needs downloading.
 */
export function isRemoteLocator(locator: string): boolean {
	return /^https?:\/\//i.test(locator);
}

/**
 * Scheme of a locator that is neither a download URL, a file: URL nor a path.
 */
function unsupportedScheme(locator: string): string | undefined {
	const scheme = SCHEME_PATTERN.exec(locator)?.[1]?.toLowerCase();
	if (scheme === undefined || scheme === "http" || scheme === "https" || scheme === "file") {
		return undefined;
	}
	return scheme;
}

function localPath(locator: string): string {
	return locator.toLowerCase().startsWith("file:") ? fileURLToPath(locator) : locator;
}

/**
 * One download of a URL and the callbacks waiting for it.
 *
 * A flight is detached when its URL is cleared: its waiters are still
 * answered, but nothing it downloads or prepares is kept.
 */
interface Flight<T> {
	waiters: (OnResult<T> | undefined)[];
	generation: number;
	detached: boolean;
}

/**
 * @example
 * ```typescript
 * const media = new CachingLoader<string>({
 *   id: "Media",
 *   download: (url, { onProgress }) => downloadFile(url, { onProgress }),
 *   prepare: async (filePath) => filePath,
 * }).register();
 *
 * const filePath = await media.get("https://example.com/intro.mp4");
 * ```
 */
export class CachingLoader<T> extends RegistrableCache {
	readonly id: string;
	readonly directory: string;
	private readonly downloader: Downloader;
	private readonly prepare: PrepareObject<T>;
	private readonly blobStore: BlobStore;
	private readonly memCache: LRUCache<string, T>;
	private readonly flights = new Map<string, Flight<T>>();
	private generation = 0;

	constructor(options: CachingLoaderOptions<T>) {
		super();
		assertNonEmpty(options.id, "CachingLoader id");
		this.id = options.id;
		this.directory = path.join(options.cacheDir ?? getDefaultCacheDir(), encodeName(options.id));
		this.downloader = options.download;
		this.prepare = options.prepare;
		this.blobStore = options.blobStore ?? new FileBlobStore();
		this.memCache = new LRUCache(options.memoryCacheCapacity ?? DEFAULT_MEM_CACHE_CAPACITY);
	}

	/**
	 * Retrieve the object for a URL.
	 *
	 * The first call downloads the blob; concurrent calls wait for that
	 * download. Local paths and file: URLs are prepared directly. Without a
	 * completion the blob is downloaded but not prepared (prefetch).
	 *
	 * @param url - Remote URL, file: URL or local path
	 * @param onResult - Completion callback
	 * @param onProgress - Download progress, reported by the first caller only
	 * @throws InvalidKeyError for URL schemes other than http, https and file
	 */
	request(url: string | URL, onResult?: OnResult<T>, onProgress?: DownloadProgress): void {
		const locator = typeof url === "string" ? url : url.href;

		const cached = this.memCache.touch(locator);
		if (cached !== undefined) {
			onResult?.(success(cached));
			return;
		}

		const scheme = unsupportedScheme(locator);
		if (scheme !== undefined) {
			throw new InvalidKeyError(`Unsupported URL scheme "${scheme}" in ${locator}: use http(s), file: or a local path`);
		}

		if (!isRemoteLocator(locator)) {
			if (onResult) {
				this.prepareLocal(locator, onResult);
			}
			return;
		}

		const current = this.flights.get(locator);
		if (current) {
			current.waiters.push(onResult);
			return;
		}

		const flight: Flight<T> = { waiters: [onResult], generation: this.generation, detached: false };
		this.flights.set(locator, flight);
		this.fetch(locator, flight, onProgress).catch((error: unknown) => {
			this.complete(locator, flight, failure(error));
		});
	}

	/**
	 * Promise form of request().
	 */
	get(url: string | URL, onProgress?: DownloadProgress): Promise<T> {
		return toPromise((onResult) => this.request(url, onResult, onProgress));
	}

	/**
	 * Download a blob without preparing it.
	 */
	prefetch(url: string | URL): void {
		this.request(url);
	}

	/**
	 * Whether the next request for this URL would download.
	 */
	async willRefresh(url: string | URL): Promise<boolean> {
		const locator = typeof url === "string" ? url : url.href;
		if (this.memCache.has(locator) || !isRemoteLocator(locator)) {
			return false;
		}
		return !(await this.blobStore.exists(this.cacheFileFor(locator)));
	}

	/**
	 * Path of the cached file for a remote URL.
	 */
	cacheFileFor(url: string): string {
		const extension = path.posix.extname(new URL(url).pathname);
		return path.join(this.directory, `${toUrlSafeHash(url, HASH_LENGTH)}${extension}`);
	}

	/**
	 * Discard the decoded objects held in memory.
	 */
	clearMemory(): this {
		this.memCache.clear();
		this.generation++;
		return this;
	}

	/**
	 * Discard one blob, or every blob and the memory cache.
	 *
	 * Downloads in flight for the cleared URLs are detached: their waiters
	 * are answered, but neither the file nor the object is kept.
	 */
	async clear(url?: string | URL): Promise<void> {
		if (url === undefined) {
			for (const flight of this.flights.values()) {
				flight.detached = true;
			}
			this.flights.clear();
			this.clearMemory();
			await this.blobStore.removeDirectory(this.directory);
			return;
		}

		const locator = typeof url === "string" ? url : url.href;
		const flight = this.flights.get(locator);
		if (flight) {
			flight.detached = true;
			this.flights.delete(locator);
		}
		this.memCache.remove(locator);
		if (isRemoteLocator(locator)) {
			await this.blobStore.remove(this.cacheFileFor(locator));
		}
	}

	/**
	 * Nothing to write: blobs are stored as soon as they are downloaded.
	 */
	flush(): Promise<void> {
		return Promise.resolve();
	}

	/** Number of decoded objects in memory. */
	get memoryCount(): number {
		return this.memCache.size;
	}

	private prepareLocal(locator: string, onResult: OnResult<T>): void {
		const generation = this.generation;
		const filePath = localPath(locator);

		this.transform(filePath).then((result) => {
			if (result.ok && generation === this.generation) {
				this.memCache.set(locator, result.value);
			}
			deliver([onResult], result);
		}, (error: unknown) => deliver([onResult], failure<T>(error)));
	}

	private async fetch(locator: string, flight: Flight<T>, onProgress?: DownloadProgress): Promise<void> {
		const fileResult = await this.obtainFile(locator, flight, onProgress);
		if (!fileResult.ok) {
			this.complete(locator, flight, failure(fileResult.error));
			return;
		}
		const filePath = fileResult.value;

		// Prefetch only: leave the file on disk without preparing it.
		if (!flight.waiters.some((waiter) => waiter !== undefined)) {
			if (flight.detached) {
				await this.discard(filePath);
			} else {
				this.flights.delete(locator);
			}
			return;
		}

		const prepared = await this.transform(filePath);
		if (!prepared.ok) {
			this.memCache.remove(locator);
			await this.discard(filePath);
		} else if (flight.detached) {
			await this.discard(filePath);
		} else if (flight.generation === this.generation) {
			this.memCache.set(locator, prepared.value);
		}
		this.complete(locator, flight, prepared);
	}

	/**
	 * Path of a readable copy of the blob: the cache file, or the downloaded
	 * temporary file when the flight was detached while downloading.
	 */
	private async obtainFile(locator: string, flight: Flight<T>, onProgress?: DownloadProgress): Promise<Result<string>> {
		const cacheFile = this.cacheFileFor(locator);
		if (await this.blobStore.exists(cacheFile)) {
			logMessage(`CachingLoader ${this.id}: memory miss, found on disk: ${path.basename(cacheFile)}`, "debug");
			return success(cacheFile);
		}

		logMessage(`CachingLoader ${this.id}: downloading ${locator}`, "debug");
		let tempPath: string;
		try {
			tempPath = await this.downloader(locator, { onProgress });
		} catch (error) {
			return failure(error);
		}

		if (flight.detached) {
			return success(tempPath);
		}

		try {
			await this.blobStore.move(tempPath, cacheFile);
			return success(cacheFile);
		} catch (error) {
			return failure(new DownloadError(`File download failed: ${locator}`, { cause: error }));
		}
	}

	private async discard(filePath: string): Promise<void> {
		try {
			await this.blobStore.remove(filePath);
		} catch (error) {
			logMessage(`CachingLoader ${this.id}: cannot delete ${filePath}: ${getErrorMessage(error)}`, "warn");
		}
	}

	private async transform(filePath: string): Promise<Result<T>> {
		try {
			const object = await this.prepare(filePath);
			if (object !== undefined) {
				return success(object);
			}
			return failure(new TransformError(`Failed to load file from disk: ${filePath}`, { filePath }));
		} catch (error) {
			return failure(new TransformError(`Failed to load file from disk: ${filePath}`, { filePath, cause: error }));
		}
	}

	/**
	 * Answer every waiter of a flight from a snapshot of its queue.
	 */
	private complete(locator: string, flight: Flight<T>, result: Result<T>): void {
		if (this.flights.get(locator) === flight) {
			this.flights.delete(locator);
		}
		deliver([...flight.waiters], result);
	}
}
