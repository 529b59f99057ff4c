/**
 * A mutable cell whose updates are single, indivisible steps.
 *
 * Every callback runs to completion before another event is handled, so a
 * `modify` cannot interleave with another `modify`. Returning the previous
 * value lets callers decide "was this the transition that mattered" in the
 * same step as the mutation.
 */
export class Atomic<T> {
	private current: T;

	constructor(value: T) {
		this.current = value;
	}

	get value(): T {
		return this.current;
	}

	set value(value: T) {
		this.current = value;
	}

	/**
	 * Replace the value, returning the old one.
	 */
	swap(value: T): T {
		const previous = this.current;
		this.current = value;
		return previous;
	}

	/**
	 * Apply `transform` to the value, returning the old one.
	 */
	modify(transform: (value: T) => T): T {
		const previous = this.current;
		this.current = transform(previous);
		return previous;
	}

	withValue<R>(action: (value: T) => R): R {
		return action(this.current);
	}
}
