/**
 * @title Proxy-Aware Fetch Module
 * @description undici fetch routed through the proxy chosen for each URL.
 *
 * @module proxy
 */

import { fetch as undiciFetch, type RequestInit, type Response } from "undici";
import { ProxyAgentPool } from "./agent-pool.js";
import { proxyFor, routingFromEnv, type ProxyRouting } from "./routing.js";

const sharedPool = new ProxyAgentPool();

export interface ProxyFetchOptions extends Omit<RequestInit, "dispatcher"> {
	/** Proxy routing (default: read from the environment on every call). */
	routing?: ProxyRouting;
}

/**
 * Fetch through the proxy routed for the URL, or directly.
 */
export async function proxyFetch(url: string | URL, options: ProxyFetchOptions = {}): Promise<Response> {
	const { routing = routingFromEnv(), ...init } = options;
	const proxyUrl = proxyFor(typeof url === "string" ? new URL(url) : url, routing);

	if (proxyUrl) {
		return undiciFetch(url, { ...init, dispatcher: sharedPool.agentFor(proxyUrl) });
	}
	return undiciFetch(url, init);
}

/**
 * Close the proxy agents opened by proxyFetch.
 */
export function closeProxyAgents(): void {
	sharedPool.clear();
}
