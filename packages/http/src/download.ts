/**
 * @title Download Module
 * @description Stream a remote file into a temporary file.
 *
 * @module http
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { randomUUID } from "node:crypto";
import {
	CancellationError,
	DownloadError,
	NetworkError,
	getErrorMessage,
	isConnectivityError,
	isMuxError,
	logMessage,
	type DownloadProgress,
} from "@muxcache/core";
import { fetchWithTimeout, USER_AGENT } from "./http.js";

const DEFAULT_DOWNLOAD_TIMEOUT = 60000;

export interface DownloadOptions {
	/** Time to wait for the response headers in milliseconds (default: 60000). */
	timeout?: number;
	/** Directory receiving the temporary file (default: OS temp directory). */
	downloadDir?: string;
	/** Custom headers to include. */
	headers?: Record<string, string>;
	/** Byte progress. */
	onProgress?: DownloadProgress;
	/** AbortSignal for cancellation. */
	signal?: AbortSignal;
}

/**
 * Download a URL to a temporary file.
 *
 * The file keeps the extension of the URL path. A failed download leaves
 * no partial file behind: write failures reject with DownloadError, body
 * failures with NetworkError, and aborting the signal with CancellationError.
 *
 * @param url - URL to download
 * @param options - Download options
 * @returns Path to the downloaded file
 */
export async function downloadFile(url: string, options: DownloadOptions = {}): Promise<string> {
	const { timeout = DEFAULT_DOWNLOAD_TIMEOUT, downloadDir, headers = {}, onProgress, signal } = options;

	const response = await fetchWithTimeout(url, { "User-Agent": USER_AGENT, ...headers }, timeout, signal);
	if (!response.ok) {
		throw new NetworkError(`Failed to download: HTTP ${response.status}`, { statusCode: response.status });
	}
	if (!response.body) {
		throw new NetworkError("No response body received", { statusCode: response.status });
	}

	const contentLength = response.headers.get("content-length");
	const parsedLength = contentLength ? parseInt(contentLength, 10) : NaN;
	const totalBytes = Number.isNaN(parsedLength) ? undefined : parsedLength;

	const dir = downloadDir ?? os.tmpdir();
	await fs.promises.mkdir(dir, { recursive: true });
	const filePath = path.join(dir, `muxcache-${randomUUID()}${path.posix.extname(new URL(url).pathname)}`);

	let bytesReceived = 0;
	const reportProgress = async function* (chunks: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
		for await (const chunk of chunks) {
			bytesReceived += chunk.length;
			onProgress?.(bytesReceived, totalBytes);
			yield chunk;
		}
	};

	try {
		await pipeline(response.body, reportProgress, fs.createWriteStream(filePath), { signal });
		return filePath;
	} catch (error) {
		try {
			await fs.promises.rm(filePath, { force: true });
		} catch (cleanupError) {
			logMessage(`Cannot remove partial download ${filePath}: ${getErrorMessage(cleanupError)}`, "debug");
		}
		if (signal?.aborted) {
			throw new CancellationError();
		}
		if (isMuxError(error)) {
			throw error;
		}
		if (isConnectivityError(error)) {
			throw new NetworkError(`Download of ${url} failed: ${getErrorMessage(error)}`, { connectivity: true, cause: error });
		}
		// File system errors carry the path they failed on.
		if (error instanceof Error && "path" in error) {
			throw new DownloadError(`Cannot write ${filePath}: ${getErrorMessage(error)}`, { cause: error });
		}
		throw new NetworkError(`Download of ${url} failed: ${getErrorMessage(error)}`, { cause: error });
	}
}
