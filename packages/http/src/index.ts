/**
 * @muxcache/http - Network collaborators for @muxcache/core.
 *
 * Proxy-aware fetching, JSON producers for the single-flight caches, a
 * streaming downloader and ready-made blob loaders.
 */

export * from "./proxy/index.js";
export { fetchJson, fetchText, fetchWithTimeout, USER_AGENT, type HttpOptions } from "./http.js";
export { downloadFile, type DownloadOptions } from "./download.js";
export { jsonProducer, jsonKeyProducer, type JsonProducerOptions } from "./producers.js";
export { createMediaLoader, createBufferLoader, type HttpLoaderOptions } from "./loaders.js";
