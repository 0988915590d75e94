/**
 * Persistent store exports.
 */

export type { PersistentStore, StoredEntry } from "./types.js";
export { assertNonEmpty, encodeName, hashName } from "./names.js";
export { NoopStore } from "./noop-store.js";
export { MemoryStore } from "./memory-store.js";
export { JsonFileStore, type JsonFileStoreOptions } from "./json-file-store.js";
