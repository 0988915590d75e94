/**
 * @title Errors
 * @description Error types for @muxcache/core.
 *
 * Provides typed error classes for the failure modes of the cache engine
 * and the predicate that decides which producer errors are transient.
 *
 * @module errors
 */

/**
 * Options for constructing a MuxError.
 */
export interface MuxErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all muxcache errors.
 */
export class MuxError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: MuxErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "MuxError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error related to network operations.
 */
export class NetworkError extends MuxError {
	/** HTTP status code if available. */
	readonly statusCode?: number;
	/** True when the request never reached the server (offline, refused, reset). */
	readonly connectivity: boolean;

	constructor(message: string, options?: { statusCode?: number; connectivity?: boolean; cause?: unknown }) {
		super(message, "NETWORK_ERROR", {
			suggestion: "Check your internet connection and try again",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
		this.connectivity = options?.connectivity ?? false;
	}
}

/**
 * Error when a downloaded blob cannot be turned into its in-memory form.
 * The cached artifact has already been deleted when this is raised.
 */
export class TransformError extends MuxError {
	/** Path of the artifact that failed to load. */
	readonly filePath?: string;

	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "TRANSFORM_ERROR", { cause: options?.cause });
		this.name = "TransformError";
		this.filePath = options?.filePath;
	}
}

/**
 * Error when a downloaded file cannot be moved into the cache directory.
 */
export class DownloadError extends MuxError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "DOWNLOAD_ERROR", {
			suggestion: "Check that the cache directory is writable",
			cause: options?.cause,
		});
		this.name = "DownloadError";
	}
}

/**
 * Error raised by a persistent store write or delete.
 */
export class StorageError extends MuxError {
	readonly domain: string;
	readonly key?: string;

	constructor(message: string, options: { domain: string; key?: string; cause?: unknown }) {
		super(message, "STORAGE_ERROR", { cause: options.cause });
		this.name = "StorageError";
		this.domain = options.domain;
		this.key = options.key;
	}
}

/**
 * Error when two cache instances are registered under the same identifier.
 */
export class RegistryError extends MuxError {
	/** The conflicting identifier. */
	readonly id: string;

	constructor(message: string, options: { id: string }) {
		super(message, "REGISTRY_ERROR", {
			suggestion: "Give every registered cache a unique id, or unregister the previous instance first",
		});
		this.name = "RegistryError";
		this.id = options.id;
	}
}

/**
 * Error when a key, identifier or domain is empty where one is required.
 */
export class InvalidKeyError extends MuxError {
	constructor(message: string) {
		super(message, "INVALID_KEY");
		this.name = "InvalidKeyError";
	}
}

/**
 * Error thrown when an operation is cancelled by the caller.
 */
export class CancellationError extends MuxError {
	constructor(message = "Operation cancelled by the caller.") {
		super(message, "CANCELLED");
		this.name = "CancellationError";
	}
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
	return error instanceof CancellationError;
}

/**
 * Check if an error is a MuxError.
 */
export function isMuxError(error: unknown): error is MuxError {
	return error instanceof MuxError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a MuxError.
 */
export function wrapError(error: unknown, context?: string): MuxError {
	if (isMuxError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new MuxError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}

/**
 * System and undici error codes meaning the host could not be reached at all.
 */
const CONNECTIVITY_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EAI_AGAIN",
	"ENETUNREACH",
	"ENETDOWN",
	"EHOSTUNREACH",
	"EPIPE",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
]);

/** Guards against self-referencing cause chains. */
const MAX_CAUSE_DEPTH = 8;

function errorCode(error: object): string | undefined {
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Default transient-error predicate.
 *
 * Returns true for connectivity failures (not connected, connection lost,
 * cannot connect to host), looking through the `cause` chain. HTTP status
 * errors and timeouts are not connectivity failures.
 *
 * @param error - Error produced by a fetch
 * @returns True if a cached value may be served instead
 */
export function isConnectivityError(error: unknown): boolean {
	let current: unknown = error;

	for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
		if (typeof current !== "object" || current === null) {
			return false;
		}
		if (current instanceof NetworkError) {
			if (current.connectivity) {
				return true;
			}
			if (current.statusCode !== undefined) {
				return false;
			}
		}
		const code = errorCode(current);
		if (code !== undefined && CONNECTIVITY_CODES.has(code)) {
			return true;
		}
		current = "cause" in current ? current.cause : undefined;
	}

	return false;
}
