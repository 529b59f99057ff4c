/**
 * N-ary combinators for cold-signal
 */

import { Producer } from "./producer.js";
import type { TimerOptions } from "./types.js";

/**
 * Combine the latest values of every producer into a tuple, once each has
 * sent a value. Completes when all of them have completed.
 *
 * @example
 * ```typescript
 * combineLatest(width, height, depth).map(([w, h, d]) => w * h * d)
 * ```
 */
export function combineLatest<A, B, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
): Producer<[A, B], Err>;
export function combineLatest<A, B, C, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
): Producer<[A, B, C], Err>;
export function combineLatest<A, B, C, D, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
): Producer<[A, B, C, D], Err>;
export function combineLatest<A, B, C, D, E, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
): Producer<[A, B, C, D, E], Err>;
export function combineLatest<A, B, C, D, E, F, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
): Producer<[A, B, C, D, E, F], Err>;
export function combineLatest<A, B, C, D, E, F, G, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
): Producer<[A, B, C, D, E, F, G], Err>;
export function combineLatest<A, B, C, D, E, F, G, H, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
): Producer<[A, B, C, D, E, F, G, H], Err>;
export function combineLatest<A, B, C, D, E, F, G, H, I, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
	i: Producer<I, Err>,
): Producer<[A, B, C, D, E, F, G, H, I], Err>;
export function combineLatest<A, B, C, D, E, F, G, H, I, J, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
	i: Producer<I, Err>,
	j: Producer<J, Err>,
): Producer<[A, B, C, D, E, F, G, H, I, J], Err>;
export function combineLatest<Err>(
	...producers: Producer<unknown, Err>[]
): Producer<unknown[], Err> {
	return combineLatestAll(producers);
}

/**
 * Pair up the values of every producer by index into tuples. Completes
 * when any of them has completed and its values have all been paired.
 */
export function zip<A, B, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
): Producer<[A, B], Err>;
export function zip<A, B, C, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
): Producer<[A, B, C], Err>;
export function zip<A, B, C, D, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
): Producer<[A, B, C, D], Err>;
export function zip<A, B, C, D, E, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
): Producer<[A, B, C, D, E], Err>;
export function zip<A, B, C, D, E, F, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
): Producer<[A, B, C, D, E, F], Err>;
export function zip<A, B, C, D, E, F, G, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
): Producer<[A, B, C, D, E, F, G], Err>;
export function zip<A, B, C, D, E, F, G, H, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
): Producer<[A, B, C, D, E, F, G, H], Err>;
export function zip<A, B, C, D, E, F, G, H, I, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
	i: Producer<I, Err>,
): Producer<[A, B, C, D, E, F, G, H, I], Err>;
export function zip<A, B, C, D, E, F, G, H, I, J, Err>(
	a: Producer<A, Err>,
	b: Producer<B, Err>,
	c: Producer<C, Err>,
	d: Producer<D, Err>,
	e: Producer<E, Err>,
	f: Producer<F, Err>,
	g: Producer<G, Err>,
	h: Producer<H, Err>,
	i: Producer<I, Err>,
	j: Producer<J, Err>,
): Producer<[A, B, C, D, E, F, G, H, I, J], Err>;
export function zip<Err>(
	...producers: Producer<unknown, Err>[]
): Producer<unknown[], Err> {
	return zipAll(producers);
}

/**
 * {@link combineLatest} over any number of producers of one type.
 * An empty sequence gives a producer that completes at once.
 */
export function combineLatestAll<T, E>(
	producers: Iterable<Producer<T, E>>,
): Producer<T[], E> {
	const [first, ...rest] = Array.from(producers);
	if (first === undefined) {
		return Producer.empty();
	}

	return rest.reduce<Producer<T[], E>>(
		(combined, next) =>
			combined
				.combineLatestWith(next)
				.map(([values, value]) => [...values, value]),
		first.map((value) => [value]),
	);
}

/**
 * {@link zip} over any number of producers of one type.
 * An empty sequence gives a producer that completes at once.
 */
export function zipAll<T, E>(
	producers: Iterable<Producer<T, E>>,
): Producer<T[], E> {
	const [first, ...rest] = Array.from(producers);
	if (first === undefined) {
		return Producer.empty();
	}

	return rest.reduce<Producer<T[], E>>(
		(zipped, next) =>
			zipped.zipWith(next).map(([values, value]) => [...values, value]),
		first.map((value) => [value]),
	);
}

/**
 * A repeating timer. See {@link Producer.timer}.
 */
export function timer(options: TimerOptions): Producer<Date, never> {
	return Producer.timer(options);
}
