/**
 * Unordered-removal collection with stable iteration order.
 */

let tokenCounter = 0;

/**
 * Identifies one inserted element. Compared by identity.
 */
export interface RemovalToken {
	readonly id: number;
}

/**
 * A collection that hands out a token per insertion and removes by token,
 * iterating in insertion order.
 */
export class Bag<T> implements Iterable<T> {
	private readonly elements = new Map<RemovalToken, T>();

	insert(value: T): RemovalToken {
		const token: RemovalToken = { id: ++tokenCounter };
		this.elements.set(token, value);
		return token;
	}

	/**
	 * Remove the element inserted under `token`. Returns false if it was
	 * already removed.
	 */
	removeForToken(token: RemovalToken): boolean {
		return this.elements.delete(token);
	}

	get size(): number {
		return this.elements.size;
	}

	/**
	 * Copy of the current elements, safe to iterate while the bag changes.
	 */
	snapshot(): T[] {
		return Array.from(this.elements.values());
	}

	[Symbol.iterator](): Iterator<T> {
		return this.elements.values();
	}
}
