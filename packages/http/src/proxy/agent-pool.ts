/**
 * @title Proxy Agent Pool Module
 * @description Reusable undici proxy agents, one per proxy URL.
 *
 * Agents live in an LRU so a process talking to many proxies keeps a bounded
 * number of connections open. An agent is replaced once it reaches its
 * maximum age, which picks up rotated proxy credentials.
 *
 * @module proxy
 */

import { LRUCache, getErrorMessage, logMessage } from "@muxcache/core";
import { ProxyAgent } from "undici";

/** Default number of agents kept open. */
const DEFAULT_CAPACITY = 10;

/** Default agent lifetime (30 minutes). */
const DEFAULT_MAX_AGE_MS = 30 * 60 * 1000;

interface PooledAgent {
	proxyUrl: string;
	agent: ProxyAgent;
	createdAt: number;
}

export interface ProxyAgentPoolOptions {
	capacity?: number;
	maxAgeMs?: number;
	/** Clock in milliseconds (default: Date.now). */
	now?: () => number;
}

export class ProxyAgentPool {
	private readonly agents: LRUCache<string, PooledAgent>;
	private readonly maxAgeMs: number;
	private readonly now: () => number;

	constructor(options: ProxyAgentPoolOptions = {}) {
		this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
		this.now = options.now ?? (() => Date.now());
		this.agents = new LRUCache(options.capacity ?? DEFAULT_CAPACITY, (_proxyUrl, pooled) => {
			this.close(pooled);
		});
	}

	/**
	 * The open agent for a proxy, created on first use or after expiry.
	 */
	agentFor(proxyUrl: string): ProxyAgent {
		const pooled = this.agents.touch(proxyUrl);
		if (pooled && this.now() - pooled.createdAt <= this.maxAgeMs) {
			return pooled.agent;
		}
		if (pooled) {
			this.close(pooled);
		}

		const agent = new ProxyAgent(proxyUrl);
		this.agents.set(proxyUrl, { proxyUrl, agent, createdAt: this.now() });
		return agent;
	}

	/** Close every agent. */
	clear(): void {
		for (const pooled of this.agents) {
			this.close(pooled);
		}
		this.agents.clear();
	}

	get size(): number {
		return this.agents.size;
	}

	private close(pooled: PooledAgent): void {
		pooled.agent.close().catch((error: unknown) => {
			logMessage(`Failed to close proxy agent for ${pooled.proxyUrl}: ${getErrorMessage(error)}`, "debug");
		});
	}
}
