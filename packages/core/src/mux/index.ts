/**
 * Single-flight cache exports.
 */

export { FetchCoordinator, type CoordinatorPolicy, type CoordinatorState } from "./fetch-coordinator.js";
export { resolvePolicy, type MultiplexerBaseOptions } from "./options.js";
export { Multiplexer, ROOT_DOMAIN, type MultiplexerOptions } from "./multiplexer.js";
export { MultiplexerMap, type MultiplexerMapOptions, type MuxKey } from "./multiplexer-map.js";
export { MultiRequester, type OnMultiFetch, type OnMultiResult } from "./multi-requester.js";
