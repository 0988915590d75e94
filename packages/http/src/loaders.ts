/**
 * @title Loaders Module
 * @description Ready-made caching loaders downloading over HTTP.
 *
 * @module http
 */

import * as fs from "node:fs";
import { CachingLoader, type CachingLoaderOptions, type Downloader } from "@muxcache/core";
import { downloadFile, type DownloadOptions } from "./download.js";

export interface HttpLoaderOptions extends Omit<CachingLoaderOptions<never>, "download" | "prepare"> {
	/** Options passed to every download. */
	download?: Omit<DownloadOptions, "onProgress">;
}

function httpDownloader(options: HttpLoaderOptions["download"] = {}): Downloader {
	return (url, { onProgress }) => downloadFile(url, { ...options, onProgress });
}

/**
 * Loader resolving to the path of the cached file, for media that is
 * played or displayed from disk. Empty files count as corrupt.
 */
export function createMediaLoader(options: HttpLoaderOptions): CachingLoader<string> {
	const { download, ...loaderOptions } = options;
	return new CachingLoader<string>({
		...loaderOptions,
		download: httpDownloader(download),
		prepare: async (filePath) => {
			const stats = await fs.promises.stat(filePath);
			return stats.isFile() && stats.size > 0 ? filePath : undefined;
		},
	});
}

/**
 * Loader resolving to the file contents. Empty files count as corrupt.
 */
export function createBufferLoader(options: HttpLoaderOptions): CachingLoader<Buffer> {
	const { download, ...loaderOptions } = options;
	return new CachingLoader<Buffer>({
		...loaderOptions,
		download: httpDownloader(download),
		prepare: async (filePath) => {
			const contents = await fs.promises.readFile(filePath);
			return contents.length > 0 ? contents : undefined;
		},
	});
}
