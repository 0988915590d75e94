/**
 * Proxy exports.
 */

export { hostRule, proxyFor, routingFromEnv, type HostRule, type ProxyRouting } from "./routing.js";
export { ProxyAgentPool, type ProxyAgentPoolOptions } from "./agent-pool.js";
export { proxyFetch, closeProxyAgents, type ProxyFetchOptions } from "./fetch.js";
