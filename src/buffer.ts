/**
 * Replay buffer for cold-signal
 */

import createDebug from "debug";
import { Atomic } from "./atomic.js";
import { Bag } from "./bag.js";
import { assertNonNegative } from "./errors.js";
import { type Event, isTerminating } from "./event.js";
import { Producer } from "./producer.js";
import type { Observer } from "./types.js";

const debugBuffer = createDebug("cold-signal:buffer");

/**
 * Create a producer that replays what was sent to the returned observer.
 *
 * Each start of the producer first receives the last `capacity` values
 * (all of them by default) and the terminal event, if one was sent, then
 * every later event live. After the terminal event the observer ignores
 * everything.
 *
 * @throws {InvalidArgumentError} if `capacity` is negative
 *
 * @example
 * ```typescript
 * const [producer, observer] = buffer<number, Error>(2)
 * sendNext(observer, 1)
 * sendNext(observer, 2)
 * sendNext(observer, 3)
 * producer.start({ next: console.log }) // 2, 3
 * ```
 */
export function buffer<T, E>(
	capacity = Number.POSITIVE_INFINITY,
): [Producer<T, E>, Observer<T, E>] {
	assertNonNegative("capacity", capacity);

	let events: Event<T, E>[] = [];
	let terminationEvent: Event<T, E> | undefined;
	const observers = new Atomic<Bag<Observer<T, E>> | undefined>(new Bag());

	const producer = new Producer<T, E>((observer, disposable) => {
		// Events sent while replaying reach the observer live, so replay a
		// copy taken before it is registered.
		const replay = events.slice();
		const terminal = terminationEvent;
		const token = observers.value?.insert(observer);

		for (const event of replay) {
			observer(event);
		}
		if (terminal !== undefined) {
			observer(terminal);
		}

		if (token !== undefined) {
			disposable.add(() => {
				observers.withValue((bag) => bag?.removeForToken(token));
			});
		}
	});

	const bufferingObserver: Observer<T, E> = (event) => {
		const originalObservers = observers.modify((bag) =>
			isTerminating(event) ? undefined : bag,
		);
		if (originalObservers === undefined) {
			return;
		}

		if (isTerminating(event)) {
			terminationEvent = event;
		} else {
			events.push(event);
			if (events.length > capacity) {
				events = events.slice(events.length - capacity);
			}
		}

		if (debugBuffer.enabled && isTerminating(event)) {
			debugBuffer(
				"terminated with %d event(s) retained, %d live observer(s)",
				events.length,
				originalObservers.size,
			);
		}

		for (const observer of originalObservers.snapshot()) {
			observer(event);
		}
	};

	return [producer, bufferingObserver];
}
