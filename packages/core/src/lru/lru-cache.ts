/**
 * @title LRU Cache Module
 * @description Fixed-capacity key/value container evicting the least recently used entry.
 *
 * A map from key to list node plus a doubly-linked recency list, most
 * recently used at the top. Every operation is O(1). Entries never expire
 * by time, only by capacity pressure.
 *
 * @module lru
 */

interface Node<K, V> {
	key: K;
	value: V;
	/** Towards the top (more recently used). */
	up: Node<K, V> | null;
	/** Towards the bottom (less recently used). */
	down: Node<K, V> | null;
}

export class LRUCache<K, V> implements Iterable<V> {
	private readonly map = new Map<K, Node<K, V>>();
	private top: Node<K, V> | null = null;
	private bottom: Node<K, V> | null = null;

	/**
	 * @param capacity - Maximum number of entries; a positive integer
	 * @param onEvict - Called with each entry pushed out by capacity pressure
	 */
	constructor(
		readonly capacity: number,
		private readonly onEvict?: (key: K, value: V) => void,
	) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(`LRUCache capacity must be a positive integer, got ${capacity}`);
		}
	}

	get size(): number {
		return this.map.size;
	}

	/**
	 * Insert or update a value and mark it most recently used.
	 * Evicts the least recently used entry when inserting into a full cache.
	 */
	set(key: K, value: V): void {
		const existing = this.map.get(key);
		if (existing) {
			existing.value = value;
			this.moveToTop(existing);
			return;
		}

		if (this.map.size >= this.capacity && this.bottom) {
			const evicted = this.bottom;
			this.unlink(evicted);
			this.map.delete(evicted.key);
			this.onEvict?.(evicted.key, evicted.value);
		}

		const node: Node<K, V> = { key, value, up: null, down: null };
		this.linkTop(node);
		this.map.set(key, node);
	}

	/**
	 * Look up a value and mark it most recently used.
	 *
	 * @returns The value, or undefined on a miss
	 */
	touch(key: K): V | undefined {
		const node = this.map.get(key);
		if (!node) {
			return undefined;
		}
		this.moveToTop(node);
		return node.value;
	}

	/**
	 * Check for a key without affecting recency.
	 */
	has(key: K): boolean {
		return this.map.has(key);
	}

	remove(key: K): void {
		const node = this.map.get(key);
		if (node) {
			this.unlink(node);
			this.map.delete(key);
		}
	}

	clear(): void {
		this.map.clear();
		this.top = null;
		this.bottom = null;
	}

	/**
	 * Keys from most to least recently used.
	 */
	*keys(): IterableIterator<K> {
		for (let node = this.top; node; node = node.down) {
			yield node.key;
		}
	}

	/**
	 * Values from most to least recently used.
	 */
	*[Symbol.iterator](): Iterator<V> {
		for (let node = this.top; node; node = node.down) {
			yield node.value;
		}
	}

	private moveToTop(node: Node<K, V>): void {
		if (this.top !== node) {
			this.unlink(node);
			this.linkTop(node);
		}
	}

	private linkTop(node: Node<K, V>): void {
		node.up = null;
		node.down = this.top;
		if (this.top) {
			this.top.up = node;
		} else {
			this.bottom = node;
		}
		this.top = node;
	}

	private unlink(node: Node<K, V>): void {
		if (node.up) {
			node.up.down = node.down;
		} else {
			this.top = node.down;
		}
		if (node.down) {
			node.down.up = node.up;
		} else {
			this.bottom = node.up;
		}
		node.up = null;
		node.down = null;
	}
}
