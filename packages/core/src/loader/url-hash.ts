import { createHash } from "node:crypto";

/**
 * URL-safe digest of a string, used as a cache file name.
 *
 * SHA-256, base64 with "/" and "+" replaced by "_" and padding removed,
 * truncated to its last `max` characters.
 *
 * @param value - String to hash (typically a URL)
 * @param max - Maximum length of the result
 */
export function toUrlSafeHash(value: string, max: number): string {
	return createHash("sha256").update(value, "utf8").digest("base64").replace(/[/+]/g, "_").replace(/=/g, "").slice(-max);
}
