/**
 * @title Proxy Routing Module
 * @description Decide, per request URL, whether producers and downloaders go through a proxy.
 *
 * Routing follows the conventional variables: HTTP_PROXY, HTTPS_PROXY and
 * NO_PROXY, each also read in lowercase when the uppercase one is unset.
 * NO_PROXY entries are separated by commas or whitespace; `*` sends every
 * request direct, and `example.com` or `.example.com` match the domain and
 * its subdomains.
 *
 * @module proxy
 */

/**
 * Predicate on a host name: true when requests to it skip the proxy.
 */
export type HostRule = (hostname: string) => boolean;

export interface ProxyRouting {
	/** Proxy for http: URLs. */
	http?: string;
	/** Proxy for https: URLs; the http proxy is used when unset. */
	https?: string;
	/** Hosts reached without a proxy. */
	direct: HostRule[];
}

type Environment = Readonly<Record<string, string | undefined>>;

function envValue(env: Environment, name: string): string | undefined {
	const value = env[name] ?? env[name.toLowerCase()];
	return value?.trim() || undefined;
}

/**
 * Compile one NO_PROXY entry; blank entries give undefined.
 */
export function hostRule(pattern: string): HostRule | undefined {
	const normalized = pattern.trim().toLowerCase();
	if (!normalized) {
		return undefined;
	}
	if (normalized === "*") {
		return () => true;
	}

	const domain = normalized.startsWith(".") ? normalized.slice(1) : normalized;
	return (hostname) => {
		const host = hostname.toLowerCase();
		return host === domain || host.endsWith(`.${domain}`);
	};
}

export function routingFromEnv(env: Environment = process.env): ProxyRouting {
	const direct: HostRule[] = [];
	for (const pattern of (envValue(env, "NO_PROXY") ?? "").split(/[,\s]+/)) {
		const rule = hostRule(pattern);
		if (rule) {
			direct.push(rule);
		}
	}

	return {
		http: envValue(env, "HTTP_PROXY"),
		https: envValue(env, "HTTPS_PROXY"),
		direct,
	};
}

/**
 * Proxy URL for a request, or undefined to connect directly.
 */
export function proxyFor(url: URL, routing: ProxyRouting): string | undefined {
	if (routing.direct.some((rule) => rule(url.hostname))) {
		return undefined;
	}
	if (url.protocol === "https:") {
		return routing.https ?? routing.http;
	}
	return url.protocol === "http:" ? routing.http : undefined;
}
