/**
 * Flatten strategies for cold-signal - merge, concat and latest
 *
 * Each strategy turns a producer of producers into one producer. The state
 * each one keeps lives in the closure of a single run.
 */

import createDebug from "debug";
import { Atomic } from "./atomic.js";
import {
	type CompositeDisposable,
	SerialDisposable,
} from "./disposable.js";
import { sendCompleted, sendError, sendInterrupted } from "./event.js";
import { Producer } from "./producer.js";
import type { Observer } from "./types.js";

const debugFlatten = createDebug("cold-signal:flatten");

/**
 * How inner producers are joined.
 *
 * - `"merge"`: every inner producer starts on arrival; values are forwarded
 *   as they come. Completes once the outer and every inner producer completed.
 * - `"concat"`: inner producers run one after another, in arrival order.
 *   Completes once the outer and every inner producer completed.
 * - `"latest"`: a new inner producer replaces (and interrupts) the previous
 *   one. Completes once the outer and the latest inner producer completed.
 */
export type FlattenStrategy = "merge" | "concat" | "latest";

export function describeFlattenStrategy(strategy: FlattenStrategy): string {
	switch (strategy) {
		case "merge":
			return "merge";
		case "concat":
			return "concatenate";
		case "latest":
			return "latest";
	}
}

/**
 * Collapse `producer` per `strategy`. Errors from the outer producer or any
 * inner producer are forwarded at once.
 */
export function flatten<T, E>(
	producer: Producer<Producer<T, E>, E>,
	strategy: FlattenStrategy,
): Producer<T, E> {
	switch (strategy) {
		case "merge":
			return merge(producer);
		case "concat":
			return concat(producer);
		case "latest":
			return switchToLatest(producer);
	}
}

function merge<T, E>(producer: Producer<Producer<T, E>, E>): Producer<T, E> {
	return new Producer<T, E>((relayObserver, disposable) => {
		// The outer producer counts as one.
		const inFlight = new Atomic(1);
		const decrementInFlight = () => {
			const original = inFlight.modify((count) => count - 1);
			if (original === 1) {
				sendCompleted(relayObserver);
			}
		};

		producer.startWithSignal((signal, signalDisposable) => {
			disposable.add(signalDisposable);

			signal.observe({
				next: (inner) => {
					inner.startWithSignal((innerSignal, innerDisposable) => {
						const count = inFlight.modify((current) => current + 1) + 1;
						if (debugFlatten.enabled) {
							debugFlatten("merge: inner started, %d in flight", count);
						}

						const handle = disposable.add(innerDisposable);

						innerSignal.observe((event) => {
							switch (event.type) {
								case "completed":
								case "interrupted":
									handle.remove();
									decrementInFlight();
									break;
								default:
									relayObserver(event);
							}
						});
					});
				},
				error: (error) => sendError(relayObserver, error),
				completed: decrementInFlight,
				interrupted: () => sendInterrupted(relayObserver),
			});
		});
	});
}

/**
 * The queue of one concat run. The head of the queue is the producer that
 * is currently running; the rest wait.
 */
class ConcatState<T, E> {
	private readonly observer: Observer<T, E>;
	private readonly disposable: CompositeDisposable;
	private readonly queue = new Atomic<readonly Producer<T, E>[]>([]);

	constructor(observer: Observer<T, E>, disposable: CompositeDisposable) {
		this.observer = observer;
		this.disposable = disposable;
	}

	enqueue(producer: Producer<T, E>): void {
		if (this.disposable.disposed) {
			return;
		}

		const previous = this.queue.modify((queue) => [...queue, producer]);
		// An empty queue means nothing is running.
		if (previous.length === 0) {
			this.startNext(producer);
		} else if (debugFlatten.enabled) {
			debugFlatten("concat: queued behind %d producer(s)", previous.length);
		}
	}

	private dequeue(): Producer<T, E> | undefined {
		if (this.disposable.disposed) {
			return undefined;
		}

		const previous = this.queue.modify((queue) => queue.slice(1));
		return previous[1];
	}

	private startNext(producer: Producer<T, E>): void {
		producer.startWithSignal((signal, disposable) => {
			const handle = this.disposable.add(disposable);

			signal.observe((event) => {
				switch (event.type) {
					case "completed":
					case "interrupted": {
						handle.remove();
						const next = this.dequeue();
						if (next !== undefined) {
							this.startNext(next);
						}
						break;
					}
					default:
						this.observer(event);
				}
			});
		});
	}
}

function concat<T, E>(producer: Producer<Producer<T, E>, E>): Producer<T, E> {
	return new Producer<T, E>((observer, disposable) => {
		const state = new ConcatState(observer, disposable);

		producer.startWithSignal((signal, signalDisposable) => {
			disposable.add(signalDisposable);

			signal.observe({
				next: (inner) => state.enqueue(inner),
				error: (error) => sendError(observer, error),
				completed: () => {
					// Runs last; completes the whole concat.
					const completion = new Producer<T, E>((innerObserver) => {
						sendCompleted(innerObserver);
						sendCompleted(observer);
					});
					state.enqueue(completion);
				},
				interrupted: () => sendInterrupted(observer),
			});
		});
	});
}

interface LatestState {
	outerComplete: boolean;
	innerComplete: boolean;
	replacing: boolean;
}

function switchToLatest<T, E>(
	producer: Producer<Producer<T, E>, E>,
): Producer<T, E> {
	return new Producer<T, E>((sink, disposable) => {
		const latestInnerDisposable = new SerialDisposable();
		disposable.add(latestInnerDisposable);

		const state = new Atomic<LatestState>({
			outerComplete: false,
			innerComplete: true,
			replacing: false,
		});

		producer.startWithSignal((signal, signalDisposable) => {
			disposable.add(signalDisposable);

			signal.observe({
				next: (inner) => {
					inner.startWithSignal((innerSignal, innerDisposable) => {
						// Replacing interrupts the previous inner signal; that
						// interruption must not count as its completion.
						state.modify((current) => ({ ...current, replacing: true }));
						latestInnerDisposable.inner = innerDisposable;
						state.modify((current) => ({
							...current,
							replacing: false,
							innerComplete: false,
						}));

						innerSignal.observe((event) => {
							switch (event.type) {
								case "interrupted": {
									const original = state.modify((current) =>
										current.replacing
											? current
											: { ...current, innerComplete: true },
									);
									if (!original.replacing && original.outerComplete) {
										sendCompleted(sink);
									}
									break;
								}
								case "completed": {
									const original = state.modify((current) => ({
										...current,
										innerComplete: true,
									}));
									if (original.outerComplete) {
										sendCompleted(sink);
									}
									break;
								}
								default:
									sink(event);
							}
						});
					});
				},
				error: (error) => sendError(sink, error),
				completed: () => {
					const original = state.modify((current) => ({
						...current,
						outerComplete: true,
					}));
					if (original.innerComplete) {
						sendCompleted(sink);
					}
				},
				interrupted: () => sendInterrupted(sink),
			});
		});
	});
}
