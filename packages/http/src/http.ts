/**
 * @title HTTP Utilities Module
 * @description JSON and text fetching with timeout and optional retries.
 *
 * Failures are mapped onto the engine's error types: a non-2xx status gives
 * a NetworkError with its statusCode, and a request that never reached the
 * server gives a NetworkError marked as a connectivity failure, which the
 * default transient-error policy answers from the cache. Other transport
 * failures (certificates, malformed URLs) are NetworkErrors without the mark.
 *
 * @module http
 */

import { CancellationError, NetworkError, isConnectivityError, isMuxError } from "@muxcache/core";
import type { Response } from "undici";
import { proxyFetch } from "./proxy/index.js";

export interface HttpOptions {
	/** Request timeout in milliseconds (default: 30000). */
	timeout?: number;
	/**
	 * Number of retry attempts (default: 0). Caches never retry on their
	 * own, so retrying is opt-in per producer.
	 */
	retries?: number;
	/** Base delay for exponential backoff in ms (default: 1000). */
	retryDelay?: number;
	/** Custom headers to include. */
	headers?: Record<string, string>;
	/** AbortSignal for cancellation. */
	signal?: AbortSignal;
}

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 0;
const DEFAULT_RETRY_DELAY = 1000;

export const USER_AGENT = "muxcache";

function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError";
}

/**
 * Fetch with a timeout, linking the caller's signal for cancellation.
 */
export async function fetchWithTimeout(
	url: string,
	headers: Record<string, string>,
	timeout: number,
	externalSignal?: AbortSignal,
): Promise<Response> {
	if (externalSignal?.aborted) {
		throw new CancellationError();
	}

	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeout);

	const onExternalAbort = (): void => controller.abort();
	externalSignal?.addEventListener("abort", onExternalAbort, { once: true });

	try {
		return await proxyFetch(url, {
			method: "GET",
			headers,
			redirect: "follow",
			signal: controller.signal,
		});
	} catch (error) {
		if (isAbortError(error)) {
			if (externalSignal?.aborted) {
				throw new CancellationError();
			}
			throw new NetworkError(`Request timed out after ${timeout}ms`, { cause: error });
		}
		throw new NetworkError(`Request to ${url} failed`, { connectivity: isConnectivityError(error), cause: error });
	} finally {
		clearTimeout(timeoutId);
		externalSignal?.removeEventListener("abort", onExternalAbort);
	}
}

/**
 * Server errors, rate limiting and connectivity failures are worth retrying.
 */
function isRetryableError(error: unknown): boolean {
	if (error instanceof NetworkError) {
		const statusCode = error.statusCode;
		if (statusCode !== undefined) {
			return statusCode >= 500 || statusCode === 429;
		}
		return error.connectivity;
	}
	return false;
}

/**
 * Wait between attempts; cancelling the signal ends the wait early.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancellationError());
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timeoutId);
			reject(new CancellationError());
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Fetch with retry support and a response processor.
 *
 * @param url - URL to fetch
 * @param requestHeaders - Headers to send
 * @param processResponse - Extracts the desired value from the response
 * @param options - HTTP options
 */
async function fetchWithRetry<T>(
	url: string,
	requestHeaders: Record<string, string>,
	processResponse: (response: Response) => Promise<T>,
	options: HttpOptions = {},
): Promise<T> {
	const {
		timeout = DEFAULT_TIMEOUT,
		retries = DEFAULT_RETRIES,
		retryDelay = DEFAULT_RETRY_DELAY,
		headers = {},
		signal,
	} = options;

	for (let attempt = 0; ; attempt++) {
		try {
			const response = await fetchWithTimeout(url, { ...requestHeaders, ...headers }, timeout, signal);

			if (!response.ok) {
				throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, { statusCode: response.status });
			}

			return await processResponse(response);
		} catch (error) {
			if (attempt < retries && isRetryableError(error)) {
				await sleep(retryDelay * Math.pow(2, attempt), signal);
				continue;
			}
			throw error;
		}
	}
}

/**
 * Fetch JSON with timeout and optional retries.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 * @returns Parsed JSON response
 */
export async function fetchJson<T>(url: string, options: HttpOptions = {}): Promise<T> {
	return fetchWithRetry<T>(
		url,
		{ Accept: "application/json", "User-Agent": USER_AGENT },
		async (response) => {
			try {
				return (await response.json()) as T;
			} catch (error) {
				if (isMuxError(error) || isAbortError(error)) {
					throw error;
				}
				throw new NetworkError(`Invalid JSON from ${url}`, { statusCode: response.status, cause: error });
			}
		},
		options,
	);
}

/**
 * Fetch text with timeout and optional retries.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 */
export async function fetchText(url: string, options: HttpOptions = {}): Promise<string> {
	return fetchWithRetry<string>(url, { "User-Agent": USER_AGENT }, (response) => response.text(), options);
}
