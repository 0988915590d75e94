/**
 * @muxcache/core - Single-flight caching engine.
 *
 * This library provides:
 * - Single-value and keyed caches that share one in-flight fetch per key
 * - TTL freshness with transient-failure fallback to cached values
 * - Persistence through pluggable stores
 * - A blob cache with download deduplication and an in-memory LRU
 * - A registry for bulk flush and clear, and a fan-in combinator
 */

// Result and callback types
export * from "./types/result.js";

// Error exports
export {
	MuxError,
	NetworkError,
	TransformError,
	DownloadError,
	StorageError,
	RegistryError,
	InvalidKeyError,
	CancellationError,
	isCancellationError,
	isConnectivityError,
	isMuxError,
	getErrorMessage,
	wrapError,
	type MuxErrorOptions,
} from "./errors.js";

// Logging and configuration
export * from "./log.js";
export * from "./config.js";

// LRU container
export * from "./lru/index.js";

// Persistent stores
export * from "./storage/index.js";

// Single-flight caches
export * from "./mux/index.js";

// Blob cache
export * from "./loader/index.js";

// Registry
export * from "./repository/index.js";

// Fan-in combinator
export * from "./zipper/index.js";

// Debouncing
export { Debouncer, DebouncerVar } from "./debouncer.js";
