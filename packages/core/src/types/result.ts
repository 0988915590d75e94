/**
 * Result and callback types shared by every cache.
 */

import { getErrorMessage } from "../errors.js";
import { logMessage } from "../log.js";

/**
 * Outcome of an asynchronous operation.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Completion callback receiving a result.
 */
export type OnResult<T> = (result: Result<T>) => void;

/**
 * Producer contract: performs one fetch and calls `onResult` exactly once.
 */
export type OnFetch<T> = (onResult: OnResult<T>) => void;

/**
 * Keyed producer contract.
 */
export type OnKeyFetch<K, T> = (key: K, onResult: OnResult<T>) => void;

export function success<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function failure<T = never>(error: unknown): Result<T> {
	return { ok: false, error };
}

export function isSuccess<T>(result: Result<T>): result is { ok: true; value: T } {
	return result.ok;
}

export function isFailure<T>(result: Result<T>): result is { ok: false; error: unknown } {
	return !result.ok;
}

/**
 * Return the value of a successful result or throw its error.
 */
export function unwrap<T>(result: Result<T>): T {
	if (result.ok) {
		return result.value;
	}
	throw result.error;
}

/**
 * Adapt a promise-returning function to the producer contract.
 */
export function fromAsync<T>(fn: () => Promise<T>): OnFetch<T> {
	return (onResult) => {
		fn().then(
			(value) => onResult(success(value)),
			(error: unknown) => onResult(failure(error)),
		);
	};
}

/**
 * Adapt a promise-returning keyed function to the keyed producer contract.
 */
export function fromAsyncKey<K, T>(fn: (key: K) => Promise<T>): OnKeyFetch<K, T> {
	return (key, onResult) => {
		fromAsync(() => fn(key))(onResult);
	};
}

/**
 * Run a callback-style operation and resolve with its value.
 */
export function toPromise<T>(onFetch: OnFetch<T>): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		onFetch((result) => {
			if (result.ok) {
				resolve(result.value);
			} else {
				reject(result.error);
			}
		});
	});
}

/**
 * Invoke every callback with the same result, in order.
 *
 * A callback that throws is logged and does not prevent the remaining
 * callbacks from running. Undefined entries are skipped.
 */
export function deliver<T>(callbacks: readonly (OnResult<T> | undefined)[], result: Result<T>): void {
	for (const callback of callbacks) {
		try {
			callback?.(result);
		} catch (error) {
			logMessage(`Completion callback threw: ${getErrorMessage(error)}`, "error");
		}
	}
}
