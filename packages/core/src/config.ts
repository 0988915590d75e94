/**
 * @title Configuration
 * @description Engine defaults and the platform cache directory.
 *
 * @module config
 *
 * @envvar MUXCACHE_CACHE_DIR - Overrides the root cache directory.
 * @envvar XDG_CACHE_HOME - Used on Linux when MUXCACHE_CACHE_DIR is unset.
 * @envvar LOCALAPPDATA - Used on Windows when MUXCACHE_CACHE_DIR is unset.
 */

import * as os from "node:os";
import * as path from "node:path";

/** Default time-to-live of a fetched value: 30 minutes in milliseconds. */
export const DEFAULT_TTL = 30 * 60 * 1000;

/** Default number of decoded objects a blob cache keeps in memory. */
export const DEFAULT_MEM_CACHE_CAPACITY = 50;

/** Application directory name inside the platform cache directory. */
const APP_DIR = "muxcache";

/**
 * Get the default cache directory.
 *
 * @returns Path to cache directory
 */
export function getDefaultCacheDir(): string {
	const override = process.env["MUXCACHE_CACHE_DIR"];
	if (override) {
		return override;
	}

	const platform = process.platform;

	if (platform === "darwin") {
		return path.join(os.homedir(), "Library", "Caches", APP_DIR);
	} else if (platform === "win32") {
		return path.join(process.env["LOCALAPPDATA"] ?? path.join(os.homedir(), "AppData", "Local"), APP_DIR, "cache");
	} else {
		return path.join(process.env["XDG_CACHE_HOME"] ?? path.join(os.homedir(), ".cache"), APP_DIR);
	}
}
