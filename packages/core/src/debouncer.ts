/**
 * @title Debouncer
 * @description Coalesce bursts of changes into one deferred action.
 *
 * Typical use is persisting a cache after a series of updates instead of
 * after each of them.
 *
 * @module debouncer
 */

import lodash, { type DebouncedFunc } from "lodash";
import { getErrorMessage } from "./errors.js";
import { logMessage } from "./log.js";

const { debounce, isEqual } = lodash;

/**
 * Run an action once `delayMs` have passed without a new touch().
 */
export class Debouncer {
	private readonly debounced: DebouncedFunc<() => void>;

	constructor(
		readonly delayMs: number,
		execute: () => void | Promise<void>,
	) {
		if (!Number.isFinite(delayMs) || delayMs < 0) {
			throw new RangeError(`delayMs must be a non-negative number, got ${delayMs}`);
		}
		this.debounced = debounce(() => {
			runAction(execute);
		}, delayMs);
	}

	/**
	 * Schedule the action, restarting the delay if it is already scheduled.
	 */
	touch(): void {
		this.debounced();
	}

	/**
	 * Drop a scheduled action.
	 */
	cancel(): void {
		this.debounced.cancel();
	}

	/**
	 * Run a scheduled action now.
	 */
	flush(): void {
		this.debounced.flush();
	}
}

/**
 * A value whose changes trigger a debounced action.
 *
 * Assigning a value deep-equal to the current one does nothing.
 */
export class DebouncerVar<T> {
	private current: T;
	private readonly debouncer: Debouncer;

	constructor(initial: T, delayMs: number, execute: (value: T) => void | Promise<void>) {
		this.current = initial;
		this.debouncer = new Debouncer(delayMs, () => execute(this.current));
	}

	get value(): T {
		return this.current;
	}

	set value(next: T) {
		if (isEqual(next, this.current)) {
			return;
		}
		this.current = next;
		this.debouncer.touch();
	}

	cancel(): void {
		this.debouncer.cancel();
	}

	flush(): void {
		this.debouncer.flush();
	}
}

function runAction(execute: () => void | Promise<void>): void {
	try {
		const pending = execute();
		if (pending instanceof Promise) {
			pending.catch((error: unknown) => {
				logMessage(`Debounced action failed: ${getErrorMessage(error)}`, "warn");
			});
		}
	} catch (error) {
		logMessage(`Debounced action failed: ${getErrorMessage(error)}`, "warn");
	}
}
