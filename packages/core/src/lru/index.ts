/**
 * LRU container exports.
 */

export { LRUCache } from "./lru-cache.js";
