/**
 * Signal class for cold-signal - hot multicast event stream
 */

import createDebug from "debug";
import { Atomic } from "./atomic.js";
import { Bag } from "./bag.js";
import {
	ActionDisposable,
	CompositeDisposable,
	type Disposable,
	SerialDisposable,
} from "./disposable.js";
import { assertNonNegative } from "./errors.js";
import {
	type Event,
	describeEvent,
	isTerminating,
	mapEvent,
	mapEventError,
	sendCompleted,
	sendError,
	sendInterrupted,
	sendNext,
	toObserver,
} from "./event.js";
import type { DateScheduler, Scheduler } from "./scheduler.js";
import {
	isFailure,
	type Observer,
	type ObserverCallbacks,
	type Result,
	success,
} from "./types.js";

const debugSignal = createDebug("cold-signal:signal");

/**
 * Sets up a signal. Receives the signal's sink and returns what to dispose
 * once the signal terminates.
 */
export type SignalGenerator<T, E> = (
	observer: Observer<T, E>,
) => Disposable | undefined;

/**
 * A hot, push-based stream of events shared by all of its observers.
 *
 * The generator runs once, at construction. Every event the generator sends
 * goes to the observers attached at that moment. The first terminal event
 * ends the signal: it is delivered, the observer set is dropped, and the
 * generator's disposable is disposed. Later observers receive that terminal
 * event and nothing else.
 *
 * @example
 * ```typescript
 * const [signal, observer] = Signal.pipe<number, Error>()
 * signal.map((n) => n * 2).observe({ next: console.log })
 * sendNext(observer, 21) // logs 42
 * ```
 */
export class Signal<T, E> {
	private readonly observers = new Atomic<Bag<Observer<T, E>> | undefined>(
		new Bag(),
	);
	private terminalEvent: Event<T, E> | undefined;

	constructor(generator: SignalGenerator<T, E>) {
		const generatorDisposable = new SerialDisposable();

		const sink: Observer<T, E> = (event) => {
			if (isTerminating(event)) {
				const observers = this.observers.swap(undefined);
				if (observers === undefined) return;

				this.terminalEvent = event;
				if (debugSignal.enabled) {
					debugSignal(
						"terminated with %s (%d observers)",
						describeEvent(event),
						observers.size,
					);
				}
				for (const observer of observers.snapshot()) {
					observer(event);
				}
				generatorDisposable.dispose();
				return;
			}

			const observers = this.observers.value;
			if (observers === undefined) return;
			for (const observer of observers.snapshot()) {
				observer(event);
			}
		};

		generatorDisposable.inner = generator(sink);
	}

	/**
	 * A signal paired with the observer that feeds it.
	 */
	static pipe<T, E>(): [Signal<T, E>, Observer<T, E>] {
		let sink: Observer<T, E> = () => {};
		const signal = new Signal<T, E>((observer) => {
			sink = observer;
			return undefined;
		});
		return [signal, sink];
	}

	/**
	 * Whether the signal has delivered its terminal event.
	 */
	get terminated(): boolean {
		return this.observers.value === undefined;
	}

	/**
	 * Attach an observer. Returns a disposable that detaches it, or undefined
	 * if the signal had already terminated, in which case the observer has
	 * just received the terminal event.
	 */
	observe(
		observer: Observer<T, E> | ObserverCallbacks<T, E>,
	): Disposable | undefined {
		const sink = toObserver(observer);
		const observers = this.observers.value;

		if (observers === undefined) {
			if (this.terminalEvent !== undefined) {
				sink(this.terminalEvent);
			}
			return undefined;
		}

		const token = observers.insert(sink);
		return new ActionDisposable(() => {
			this.observers.withValue((bag) => bag?.removeForToken(token));
		});
	}

	map<U>(transform: (value: T) => U): Signal<U, E> {
		return new Signal((observer) =>
			this.observe((event) => observer(mapEvent(event, transform))),
		);
	}

	mapError<F>(transform: (error: E) => F): Signal<T, F> {
		return new Signal((observer) =>
			this.observe((event) => observer(mapEventError(event, transform))),
		);
	}

	filter(predicate: (value: T) => boolean): Signal<T, E> {
		return new Signal((observer) =>
			this.observe((event) => {
				if (event.type !== "next" || predicate(event.value)) {
					observer(event);
				}
			}),
		);
	}

	/**
	 * Drop `null` and `undefined` values.
	 */
	ignoreNil(): Signal<NonNullable<T>, E> {
		return new Signal((observer) =>
			this.observe((event) => {
				if (event.type !== "next") {
					observer(event);
					return;
				}
				const value = event.value;
				if (value !== null && value !== undefined) {
					sendNext(observer, value);
				}
			}),
		);
	}

	/**
	 * Widen the error type of a signal that cannot fail.
	 */
	promoteErrors<F>(this: Signal<T, never>): Signal<T, F> {
		return new Signal<T, F>((observer) =>
			this.observe((event) =>
				observer(mapEventError(event, (error: never): F => error)),
			),
		);
	}

	/**
	 * Forward the first `count` values, then complete.
	 */
	take(count: number): Signal<T, E> {
		assertNonNegative("count", count);
		return new Signal((observer) => {
			if (count === 0) {
				sendCompleted(observer);
				return undefined;
			}

			let taken = 0;
			return this.observe((event) => {
				if (event.type !== "next") {
					observer(event);
					return;
				}
				if (taken < count) {
					taken++;
					observer(event);
				}
				if (taken === count) {
					sendCompleted(observer);
				}
			});
		});
	}

	skip(count: number): Signal<T, E> {
		assertNonNegative("count", count);
		return new Signal((observer) => {
			let skipped = 0;
			return this.observe((event) => {
				if (event.type === "next" && skipped < count) {
					skipped++;
					return;
				}
				observer(event);
			});
		});
	}

	/**
	 * Forward values while `predicate` holds; complete on the first that fails.
	 */
	takeWhile(predicate: (value: T) => boolean): Signal<T, E> {
		return new Signal((observer) =>
			this.observe((event) => {
				if (event.type === "next" && !predicate(event.value)) {
					sendCompleted(observer);
					return;
				}
				observer(event);
			}),
		);
	}

	skipWhile(predicate: (value: T) => boolean): Signal<T, E> {
		return new Signal((observer) => {
			let skipping = true;
			return this.observe((event) => {
				if (event.type === "next" && skipping) {
					skipping = predicate(event.value);
					if (skipping) return;
				}
				observer(event);
			});
		});
	}

	/**
	 * On completion, send the last `count` values, then complete.
	 */
	takeLast(count: number): Signal<T, E> {
		assertNonNegative("count", count);
		return new Signal((observer) => {
			const buffer: T[] = [];
			return this.observe((event) => {
				switch (event.type) {
					case "next":
						buffer.push(event.value);
						if (buffer.length > count) {
							buffer.shift();
						}
						break;
					case "completed":
						for (const value of buffer) {
							sendNext(observer, value);
						}
						sendCompleted(observer);
						break;
					default:
						observer(event);
				}
			});
		});
	}

	/**
	 * On completion, send every value as one array, then complete.
	 */
	collect(): Signal<T[], E> {
		return new Signal((observer) => {
			const values: T[] = [];
			return this.observe((event) => {
				switch (event.type) {
					case "next":
						values.push(event.value);
						break;
					case "completed":
						sendNext(observer, values);
						sendCompleted(observer);
						break;
					default:
						observer(event);
				}
			});
		});
	}

	scan<U>(initial: U, combine: (accumulated: U, value: T) => U): Signal<U, E> {
		return new Signal((observer) => {
			let accumulated = initial;
			return this.observe((event) => {
				if (event.type === "next") {
					accumulated = combine(accumulated, event.value);
					sendNext(observer, accumulated);
					return;
				}
				observer(event);
			});
		});
	}

	/**
	 * On completion, send the final accumulation (`initial` when there were
	 * no values), then complete.
	 */
	reduce<U>(initial: U, combine: (accumulated: U, value: T) => U): Signal<U, E> {
		return new Signal((observer) => {
			let accumulated = initial;
			return this.observe((event) => {
				switch (event.type) {
					case "next":
						accumulated = combine(accumulated, event.value);
						break;
					case "completed":
						sendNext(observer, accumulated);
						sendCompleted(observer);
						break;
					default:
						observer(event);
				}
			});
		});
	}

	/**
	 * Pair each value with the one before it, starting from `initial`.
	 */
	combinePrevious(initial: T): Signal<[T, T], E> {
		return new Signal((observer) => {
			let previous = initial;
			return this.observe((event) => {
				if (event.type === "next") {
					const pair: [T, T] = [previous, event.value];
					previous = event.value;
					sendNext(observer, pair);
					return;
				}
				observer(event);
			});
		});
	}

	/**
	 * Drop values that repeat the one forwarded before them.
	 */
	skipRepeats(
		isRepeat: (previous: T, current: T) => boolean = (a, b) => a === b,
	): Signal<T, E> {
		return new Signal((observer) => {
			let last: { value: T } | undefined;
			return this.observe((event) => {
				if (event.type === "next") {
					if (last !== undefined && isRepeat(last.value, event.value)) {
						return;
					}
					last = { value: event.value };
				}
				observer(event);
			});
		});
	}

	/**
	 * Turn every event into a value. Completed and error events are followed
	 * by completion; interruption by interruption.
	 */
	materialize(): Signal<Event<T, E>, never> {
		return new Signal<Event<T, E>, never>((observer) =>
			this.observe((event) => {
				sendNext(observer, event);
				switch (event.type) {
					case "completed":
					case "error":
						sendCompleted(observer);
						break;
					case "interrupted":
						sendInterrupted(observer);
						break;
				}
			}),
		);
	}

	/**
	 * The inverse of {@link Signal.materialize}.
	 */
	dematerialize<U, F>(this: Signal<Event<U, F>, never>): Signal<U, F> {
		return new Signal<U, F>((observer) =>
			this.observe((event) => {
				switch (event.type) {
					case "next":
						observer(event.value);
						break;
					case "error":
						sendError(observer, event.error);
						break;
					case "completed":
						sendCompleted(observer);
						break;
					case "interrupted":
						sendInterrupted(observer);
						break;
				}
			}),
		);
	}

	/**
	 * Run a fallible side effect per value; a failure becomes the signal's error.
	 */
	attempt(operation: (value: T) => Result<E, unknown>): Signal<T, E> {
		return this.attemptMap((value) => {
			const result = operation(value);
			return isFailure(result) ? result : success(value);
		});
	}

	attemptMap<U>(operation: (value: T) => Result<E, U>): Signal<U, E> {
		return new Signal((observer) =>
			this.observe((event) => {
				if (event.type !== "next") {
					observer(event);
					return;
				}
				const result = operation(event.value);
				if (isFailure(result)) {
					sendError(observer, result[0]);
				} else {
					sendNext(observer, result[1]);
				}
			}),
		);
	}

	/**
	 * Re-send every event through `scheduler`.
	 */
	observeOn(scheduler: Scheduler): Signal<T, E> {
		return new Signal((observer) =>
			this.observe((event) => {
				scheduler.schedule(() => observer(event));
			}),
		);
	}

	/**
	 * Delay values and completion by `interval` ms. Errors and interruption
	 * are scheduled without delay.
	 */
	delay(interval: number, scheduler: DateScheduler): Signal<T, E> {
		assertNonNegative("interval", interval);
		return new Signal((observer) =>
			this.observe((event) => {
				if (event.type === "error" || event.type === "interrupted") {
					scheduler.schedule(() => observer(event));
					return;
				}
				const date = new Date(scheduler.currentDate.getTime() + interval);
				scheduler.scheduleAfter(date, () => observer(event));
			}),
		);
	}

	/**
	 * Forward at most one value per `interval` ms. When values arrive faster,
	 * the latest one waits for the window to pass and earlier ones are dropped.
	 */
	throttle(interval: number, scheduler: DateScheduler): Signal<T, E> {
		assertNonNegative("interval", interval);
		return new Signal((observer) => {
			const state = new Atomic<{
				previousDate: Date | undefined;
				pending: { value: T } | undefined;
			}>({ previousDate: undefined, pending: undefined });
			const schedulerDisposable = new SerialDisposable();
			const disposable = new CompositeDisposable();
			disposable.add(schedulerDisposable);

			disposable.add(
				this.observe((event) => {
					if (event.type !== "next") {
						schedulerDisposable.inner = scheduler.schedule(() =>
							observer(event),
						);
						return;
					}

					const value = event.value;
					const now = scheduler.currentDate;
					const previous = state.modify((current) => ({
						...current,
						pending: { value },
					}));
					const proposed =
						previous.previousDate === undefined
							? now
							: new Date(previous.previousDate.getTime() + interval);
					const scheduleDate =
						proposed.getTime() > now.getTime() ? proposed : now;

					schedulerDisposable.inner = scheduler.scheduleAfter(
						scheduleDate,
						() => {
							const before = state.modify((current) =>
								current.pending === undefined
									? current
									: { previousDate: scheduleDate, pending: undefined },
							);
							if (before.pending !== undefined) {
								sendNext(observer, before.pending.value);
							}
						},
					);
				}),
			);

			return disposable;
		});
	}

	/**
	 * Fail with `error` unless the signal terminates within `interval` ms.
	 */
	timeoutWithError(
		error: E,
		interval: number,
		scheduler: DateScheduler,
	): Signal<T, E> {
		assertNonNegative("interval", interval);
		return new Signal((observer) => {
			const disposable = new CompositeDisposable();
			const date = new Date(scheduler.currentDate.getTime() + interval);
			disposable.add(
				scheduler.scheduleAfter(date, () => sendError(observer, error)),
			);
			disposable.add(this.observe(observer));
			return disposable;
		});
	}

	/**
	 * Pair the latest values of both signals, once each has sent one.
	 * Completes when both have completed.
	 */
	combineLatestWith<U>(other: Signal<U, E>): Signal<[T, U], E> {
		return new Signal((observer) => {
			let latest: { left?: { value: T }; right?: { value: U } } = {};
			let leftCompleted = false;
			let rightCompleted = false;

			const sendPair = () => {
				if (latest.left !== undefined && latest.right !== undefined) {
					sendNext(observer, [latest.left.value, latest.right.value]);
				}
			};

			const disposable = new CompositeDisposable();
			disposable.add(
				this.observe((event) => {
					switch (event.type) {
						case "next":
							latest = { ...latest, left: { value: event.value } };
							sendPair();
							break;
						case "error":
							sendError(observer, event.error);
							break;
						case "completed":
							leftCompleted = true;
							if (rightCompleted) sendCompleted(observer);
							break;
						case "interrupted":
							sendInterrupted(observer);
							break;
					}
				}),
			);
			disposable.add(
				other.observe((event) => {
					switch (event.type) {
						case "next":
							latest = { ...latest, right: { value: event.value } };
							sendPair();
							break;
						case "error":
							sendError(observer, event.error);
							break;
						case "completed":
							rightCompleted = true;
							if (leftCompleted) sendCompleted(observer);
							break;
						case "interrupted":
							sendInterrupted(observer);
							break;
					}
				}),
			);
			return disposable;
		});
	}

	/**
	 * Pair values by index. Completes once either side has completed and
	 * every value it sent has been paired.
	 */
	zipWith<U>(other: Signal<U, E>): Signal<[T, U], E> {
		return new Signal((observer) => {
			const states = new Atomic<{
				left: readonly T[];
				right: readonly U[];
				leftCompleted: boolean;
				rightCompleted: boolean;
			}>({ left: [], right: [], leftCompleted: false, rightCompleted: false });

			const flush = () => {
				const pairs: [T, U][] = [];
				states.modify((current) => {
					const count = Math.min(current.left.length, current.right.length);
					const rights = current.right.slice(0, count)[Symbol.iterator]();
					for (const left of current.left.slice(0, count)) {
						const right = rights.next();
						if (!right.done) pairs.push([left, right.value]);
					}
					return {
						...current,
						left: current.left.slice(count),
						right: current.right.slice(count),
					};
				});

				for (const pair of pairs) {
					sendNext(observer, pair);
				}

				const current = states.value;
				if (
					(current.leftCompleted && current.left.length === 0) ||
					(current.rightCompleted && current.right.length === 0)
				) {
					sendCompleted(observer);
				}
			};

			const disposable = new CompositeDisposable();
			disposable.add(
				this.observe((event) => {
					switch (event.type) {
						case "next": {
							const value = event.value;
							states.modify((current) => ({
								...current,
								left: [...current.left, value],
							}));
							flush();
							break;
						}
						case "error":
							sendError(observer, event.error);
							break;
						case "completed":
							states.modify((current) => ({ ...current, leftCompleted: true }));
							flush();
							break;
						case "interrupted":
							sendInterrupted(observer);
							break;
					}
				}),
			);
			disposable.add(
				other.observe((event) => {
					switch (event.type) {
						case "next": {
							const value = event.value;
							states.modify((current) => ({
								...current,
								right: [...current.right, value],
							}));
							flush();
							break;
						}
						case "error":
							sendError(observer, event.error);
							break;
						case "completed":
							states.modify((current) => ({ ...current, rightCompleted: true }));
							flush();
							break;
						case "interrupted":
							sendInterrupted(observer);
							break;
					}
				}),
			);
			return disposable;
		});
	}

	/**
	 * Send the latest value each time `sampler` sends a value. Completes when
	 * both have completed.
	 */
	sampleOn<U>(sampler: Signal<U, never>): Signal<T, E> {
		return new Signal((observer) => {
			const state = new Atomic<{
				latest: { value: T } | undefined;
				signalCompleted: boolean;
				samplerCompleted: boolean;
			}>({ latest: undefined, signalCompleted: false, samplerCompleted: false });

			const disposable = new CompositeDisposable();
			disposable.add(
				this.observe((event) => {
					switch (event.type) {
						case "next": {
							const value = event.value;
							state.modify((current) => ({ ...current, latest: { value } }));
							break;
						}
						case "error":
							sendError(observer, event.error);
							break;
						case "completed": {
							const original = state.modify((current) => ({
								...current,
								signalCompleted: true,
							}));
							if (original.samplerCompleted) sendCompleted(observer);
							break;
						}
						case "interrupted":
							sendInterrupted(observer);
							break;
					}
				}),
			);
			disposable.add(
				sampler.observe((event) => {
					switch (event.type) {
						case "next": {
							const latest = state.value.latest;
							if (latest !== undefined) sendNext(observer, latest.value);
							break;
						}
						case "completed": {
							const original = state.modify((current) => ({
								...current,
								samplerCompleted: true,
							}));
							if (original.signalCompleted) sendCompleted(observer);
							break;
						}
						case "interrupted":
							sendInterrupted(observer);
							break;
						case "error":
							break;
					}
				}),
			);
			return disposable;
		});
	}

	/**
	 * Forward events until `trigger` sends a value or completes, then complete.
	 */
	takeUntil<U>(trigger: Signal<U, never>): Signal<T, E> {
		return new Signal((observer) => {
			const disposable = new CompositeDisposable();
			disposable.add(this.observe(observer));
			disposable.add(
				trigger.observe((event) => {
					if (event.type === "next" || event.type === "completed") {
						sendCompleted(observer);
					}
				}),
			);
			return disposable;
		});
	}

	/**
	 * Forward events until `replacement` sends anything, then forward only
	 * the replacement. Completion of this signal is ignored.
	 */
	takeUntilReplacement(replacement: Signal<T, E>): Signal<T, E> {
		return new Signal((observer) => {
			const disposable = new CompositeDisposable();
			const signalDisposable = this.observe((event) => {
				if (event.type === "completed") return;
				observer(event);
			});
			disposable.add(signalDisposable);
			disposable.add(
				replacement.observe((event) => {
					signalDisposable?.dispose();
					observer(event);
				}),
			);
			return disposable;
		});
	}
}
