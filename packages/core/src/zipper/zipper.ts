/**
 * @title Zipper Module
 * @description Fan-in of several independent requests into one completion.
 *
 * Every leg is started when sync() is called and the completion runs once,
 * after the last leg has answered, with the results in the order the legs
 * were added. A failing leg does not cut the others short.
 *
 * @module zipper
 */

import type { CachingLoader } from "../loader/caching-loader.js";
import type { MultiplexerMap, MuxKey } from "../mux/multiplexer-map.js";
import type { Multiplexer } from "../mux/multiplexer.js";
import { failure, type OnFetch, type OnResult, type Result } from "../types/result.js";
import { logMessage } from "../log.js";

/**
 * Leg reading a single-value cache.
 */
export function multiplexerLeg<T>(mux: Multiplexer<T>): OnFetch<T> {
	return (onResult) => mux.request(onResult);
}

/**
 * Leg reading one key of a keyed cache.
 */
export function mapLeg<K extends MuxKey, T>(key: K, map: MultiplexerMap<K, T>): OnFetch<T> {
	return (onResult) => map.request(key, onResult);
}

/**
 * Leg reading one blob of a caching loader.
 */
export function loaderLeg<T>(url: string | URL, loader: CachingLoader<T>): OnFetch<T> {
	return (onResult) => loader.request(url, onResult);
}

/**
 * Start a leg, accepting only its first result.
 * A synchronous throw counts as the leg's failure.
 */
function runLeg<T>(leg: OnFetch<T>, onResult: OnResult<T>): void {
	let answered = false;
	const once: OnResult<T> = (result) => {
		if (answered) {
			logMessage("Zipper: leg answered more than once, ignoring", "warn");
			return;
		}
		answered = true;
		onResult(result);
	};

	try {
		leg(once);
	} catch (error) {
		once(failure(error));
	}
}

function countdown(count: number, done: () => void): () => void {
	let remaining = count;
	return () => {
		remaining--;
		if (remaining === 0) {
			done();
		}
	};
}

/**
 * @example
 * ```typescript
 * const results = await new Zipper()
 *   .addMultiplexer(profile)
 *   .addMap("u1", users)
 *   .syncAsync();
 * ```
 */
export class Zipper {
	private readonly legs: OnFetch<unknown>[] = [];

	/** Number of legs added. */
	get size(): number {
		return this.legs.length;
	}

	add<T>(onFetch: OnFetch<T>): this {
		this.legs.push(onFetch);
		return this;
	}

	addMultiplexer<T>(mux: Multiplexer<T>): this {
		return this.add(multiplexerLeg(mux));
	}

	addMap<K extends MuxKey, T>(key: K, map: MultiplexerMap<K, T>): this {
		return this.add(mapLeg(key, map));
	}

	addLoader<T>(url: string | URL, loader: CachingLoader<T>): this {
		return this.add(loaderLeg(url, loader));
	}

	/**
	 * Start every leg and call the completion once all have answered.
	 * May be called again; each call starts the legs anew.
	 */
	sync(completion: (results: Result<unknown>[]) => void): void {
		const legs = [...this.legs];
		if (legs.length === 0) {
			completion([]);
			return;
		}

		const results = new Array<Result<unknown>>(legs.length);
		const done = countdown(legs.length, () => completion(results));

		legs.forEach((leg, index) => {
			runLeg(leg, (result) => {
				results[index] = result;
				done();
			});
		});
	}

	/**
	 * Promise form of sync(). Never rejects: failures are in the results.
	 */
	syncAsync(): Promise<Result<unknown>[]> {
		return new Promise((resolve) => this.sync(resolve));
	}

	/**
	 * Typed fan-in of two legs.
	 */
	static sync2<A, B>(a: OnFetch<A>, b: OnFetch<B>, completion: (a: Result<A>, b: Result<B>) => void): void {
		let resultA: Result<A> | undefined;
		let resultB: Result<B> | undefined;
		const done = countdown(2, () => {
			if (resultA && resultB) {
				completion(resultA, resultB);
			}
		});

		runLeg(a, (result) => {
			resultA = result;
			done();
		});
		runLeg(b, (result) => {
			resultB = result;
			done();
		});
	}

	static sync3<A, B, C>(
		a: OnFetch<A>,
		b: OnFetch<B>,
		c: OnFetch<C>,
		completion: (a: Result<A>, b: Result<B>, c: Result<C>) => void,
	): void {
		let resultC: Result<C> | undefined;
		let pair: [Result<A>, Result<B>] | undefined;
		const done = countdown(2, () => {
			if (pair && resultC) {
				completion(pair[0], pair[1], resultC);
			}
		});

		Zipper.sync2(a, b, (resultA, resultB) => {
			pair = [resultA, resultB];
			done();
		});
		runLeg(c, (result) => {
			resultC = result;
			done();
		});
	}

	static sync4<A, B, C, D>(
		a: OnFetch<A>,
		b: OnFetch<B>,
		c: OnFetch<C>,
		d: OnFetch<D>,
		completion: (a: Result<A>, b: Result<B>, c: Result<C>, d: Result<D>) => void,
	): void {
		let first: [Result<A>, Result<B>] | undefined;
		let second: [Result<C>, Result<D>] | undefined;
		const done = countdown(2, () => {
			if (first && second) {
				completion(first[0], first[1], second[0], second[1]);
			}
		});

		Zipper.sync2(a, b, (resultA, resultB) => {
			first = [resultA, resultB];
			done();
		});
		Zipper.sync2(c, d, (resultC, resultD) => {
			second = [resultC, resultD];
			done();
		});
	}
}
