/**
 * Key validation and file-name encoding for stores.
 */

import { createHash } from "node:crypto";
import { InvalidKeyError } from "../errors.js";

/** Longest encoded name kept readable before falling back to a digest. */
const MAX_NAME_LENGTH = 200;

/**
 * Throw InvalidKeyError when a required identifier is empty.
 *
 * @param value - Key, identifier or domain
 * @param label - What the value is, for the error message
 */
export function assertNonEmpty(value: string, label: string): void {
	if (value.length === 0) {
		throw new InvalidKeyError(`${label} must be a non-empty string`);
	}
}

/**
 * SHA-256 hex digest of a name.
 */
export function hashName(name: string): string {
	return createHash("sha256").update(name).digest("hex");
}

/**
 * Encode a key or domain into a single safe path segment.
 *
 * Characters outside [A-Za-z0-9_.-] and a leading dot are percent-encoded.
 * Names that would be too long, or that are not well-formed Unicode, become
 * a SHA-256 hex digest.
 *
 * @param name - Key or domain
 * @returns Path segment
 */
export function encodeName(name: string): string {
	let encoded: string;
	try {
		encoded = encodeURIComponent(name).replace(
			/[!'()*~]/g,
			(char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
		);
	} catch (error) {
		if (error instanceof URIError) {
			return hashName(name);
		}
		throw error;
	}

	if (encoded.startsWith(".")) {
		encoded = `%2E${encoded.slice(1)}`;
	}

	return encoded.length > MAX_NAME_LENGTH ? hashName(name) : encoded;
}
