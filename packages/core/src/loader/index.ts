/**
 * Blob cache exports.
 */

export { CachingLoader, isRemoteLocator, type CachingLoaderOptions } from "./caching-loader.js";
export { FileBlobStore } from "./file-blob-store.js";
export { toUrlSafeHash } from "./url-hash.js";
export type { BlobStore, DownloadProgress, Downloader, PrepareObject } from "./types.js";
