/**
 * Producer class for cold-signal - cold, restartable event streams
 */

import { SpanStatusCode } from "@opentelemetry/api";
import createDebug from "debug";
import { disposableFromAbortSignal } from "./cancellation.js";
import {
	ActionDisposable,
	CompositeDisposable,
	type Disposable,
	SerialDisposable,
} from "./disposable.js";
import { assertNonNegative, UnknownError } from "./errors.js";
import {
	type Event,
	describeEvent,
	isTerminating,
	sendCompleted,
	sendError,
	sendInterrupted,
	sendNext,
} from "./event.js";
import { type FlattenStrategy, flatten } from "./flatten.js";
import { Gate } from "./gate.js";
import { createLogger } from "./logger.js";
import type { DateScheduler, Scheduler } from "./scheduler.js";
import { Signal } from "./signal.js";
import {
	type AwaitOptions,
	analysis,
	type EventKind,
	failure,
	type LogEventsOptions,
	type Observer,
	type ObserverCallbacks,
	type Result,
	type StartOptions,
	success,
	type TimerOptions,
	type TraceOptions,
	type Tracer,
} from "./types.js";

const debugProducer = createDebug("cold-signal:producer");

/**
 * The work of a producer: send events to `observer`, and register
 * everything that must be released into `disposable`.
 */
export type StartHandler<T, E> = (
	observer: Observer<T, E>,
	disposable: CompositeDisposable,
) => void;

/**
 * Side effects injected by {@link Producer.on}.
 */
export interface ProducerHooks<T, E> {
	/** Before the producer's work starts. */
	started?: () => void;
	/** For every event, before the variant callback. */
	event?: (event: Event<T, E>) => void;
	next?: (value: T) => void;
	error?: (error: E) => void;
	completed?: () => void;
	interrupted?: () => void;
	/** After the variant callback of any terminal event. */
	terminated?: () => void;
	/** When the run's disposal root is disposed. */
	disposed?: () => void;
}

const ALL_LOGGED_EVENTS: readonly (EventKind | "started" | "disposed")[] = [
	"started",
	"next",
	"error",
	"completed",
	"interrupted",
	"disposed",
];

function toError(reason: unknown): Error {
	return reason instanceof Error
		? reason
		: new UnknownError(String(reason), { cause: reason });
}

/**
 * A cold stream: a recipe that performs its work anew each time it is
 * started, giving each start its own signal and disposal root.
 *
 * Nothing happens at construction. `start` runs the start handler, and the
 * returned disposable cancels that run: the run's observers receive
 * `interrupted` and everything registered in its root is disposed.
 *
 * @example
 * ```typescript
 * const numbers = Producer.ofSequence<number, Error>([1, 2, 3])
 *   .map((n) => n * 10)
 *   .filter((n) => n > 10)
 *
 * numbers.start({ next: console.log }) // 20, 30
 * numbers.start({ next: console.log }) // 20, 30 again
 * ```
 */
export class Producer<T, E> {
	private readonly startHandler: StartHandler<T, E>;

	constructor(startHandler: StartHandler<T, E>) {
		this.startHandler = startHandler;
	}

	/**
	 * Sends one value, then completes.
	 */
	static ofValue<T, E = never>(value: T): Producer<T, E> {
		return new Producer((observer) => {
			sendNext(observer, value);
			sendCompleted(observer);
		});
	}

	/**
	 * Fails with `error` straight away.
	 */
	static ofError<E, T = never>(error: E): Producer<T, E> {
		return new Producer((observer) => {
			sendError(observer, error);
		});
	}

	static ofResult<E, T>(result: Result<E, T>): Producer<T, E> {
		return analysis(result, {
			ifSuccess: (value) => Producer.ofValue<T, E>(value),
			ifFailure: (error) => Producer.ofError<E, T>(error),
		});
	}

	/**
	 * Sends every element of `values`, then completes. Iteration stops early
	 * once the run is disposed.
	 */
	static ofSequence<T, E = never>(values: Iterable<T>): Producer<T, E> {
		return new Producer((observer, disposable) => {
			for (const value of values) {
				sendNext(observer, value);
				if (disposable.disposed) break;
			}
			sendCompleted(observer);
		});
	}

	/**
	 * Completes straight away.
	 */
	static empty<T = never, E = never>(): Producer<T, E> {
		return new Producer((observer) => {
			sendCompleted(observer);
		});
	}

	/**
	 * Sends nothing, ever.
	 */
	static never<T = never, E = never>(): Producer<T, E> {
		return new Producer(() => {});
	}

	/**
	 * Runs `operation` once per start; success sends the value and completes,
	 * failure sends the error.
	 */
	static attempt<T, E>(operation: () => Result<E, T>): Producer<T, E> {
		return new Producer((observer) => {
			analysis(operation(), {
				ifSuccess: (value) => {
					sendNext(observer, value);
					sendCompleted(observer);
				},
				ifFailure: (error) => sendError(observer, error),
			});
		});
	}

	/**
	 * Calls `factory` once per start and relays the promise's outcome.
	 * Rejections go through `mapError`; without one, reasons that are not
	 * `Error` instances are wrapped in an {@link UnknownError}. A settlement
	 * after the run was disposed is ignored.
	 *
	 * The events are sent from a promise callback, so an observer that
	 * throws while handling them rejects that callback's promise, which
	 * nothing awaits: the exception surfaces as an `unhandledRejection`.
	 *
	 * @example
	 * ```typescript
	 * const user = Producer.fromPromise(() => fetchUser(id))
	 * const [err, value] = (await user.single()) ?? []
	 * ```
	 */
	static fromPromise<T>(factory: () => PromiseLike<T>): Producer<T, Error>;
	static fromPromise<T, E>(
		factory: () => PromiseLike<T>,
		mapError: (reason: unknown) => E,
	): Producer<T, E>;
	static fromPromise<T, E>(
		factory: () => PromiseLike<T>,
		mapError?: (reason: unknown) => E,
	): Producer<T, E | Error> {
		const settleError = (reason: unknown): E | Error =>
			mapError ? mapError(reason) : toError(reason);

		return new Producer<T, E | Error>((observer, disposable) => {
			let promise: PromiseLike<T>;
			try {
				promise = factory();
			} catch (reason) {
				sendError(observer, settleError(reason));
				return;
			}

			void Promise.resolve(promise).then(
				(value) => {
					if (disposable.disposed) return;
					sendNext(observer, value);
					sendCompleted(observer);
				},
				(reason: unknown) => {
					if (disposable.disposed) return;
					sendError(observer, settleError(reason));
				},
			);
		});
	}

	/**
	 * Sends `scheduler.currentDate` every `interval` ms. Never completes.
	 */
	static timer(options: TimerOptions): Producer<Date, never> {
		const { interval, scheduler } = options;
		assertNonNegative("interval", interval);

		return new Producer((observer, disposable) => {
			const date = new Date(scheduler.currentDate.getTime() + interval);
			disposable.add(
				scheduler.scheduleAfter(
					date,
					() => sendNext(observer, scheduler.currentDate),
					{ repeatingEvery: interval },
				),
			);
		});
	}

	/**
	 * Create a signal for one run, let `setUp` attach to it, then start the
	 * work. `setUp` receives the run's signal and a disposable that cancels
	 * the run; if `setUp` already cancelled it, the work never starts.
	 *
	 * Returns whatever `setUp` returned.
	 */
	startWithSignal<R>(
		setUp: (signal: Signal<T, E>, disposable: Disposable) => R,
	): R {
		const [signal, sink] = Signal.pipe<T, E>();
		const producerDisposable = new CompositeDisposable();

		const cancel = new ActionDisposable(() => {
			if (debugProducer.enabled) {
				debugProducer("run cancelled");
			}
			sendInterrupted(sink);
			producerDisposable.dispose();
		});

		const result = setUp(signal, cancel);
		if (cancel.disposed) {
			return result;
		}

		const wrapperObserver: Observer<T, E> = (event) => {
			sink(event);
			if (isTerminating(event)) {
				producerDisposable.dispose();
			}
		};

		this.startHandler(wrapperObserver, producerDisposable);
		return result;
	}

	/**
	 * Start a run observed by `observer`. Returns the disposable that
	 * cancels it.
	 */
	start(
		observer: Observer<T, E> | ObserverCallbacks<T, E> = {},
		options: StartOptions = {},
	): Disposable {
		return this.startWithSignal((signal, disposable) => {
			signal.observe(observer);

			const abortSignal = options.signal;
			if (abortSignal !== undefined) {
				const link = disposableFromAbortSignal(abortSignal, disposable);
				signal.observe((event) => {
					if (isTerminating(event)) link.dispose();
				});
			}

			return disposable;
		});
	}

	/**
	 * Promote a signal operator to a producer operator. Each run of the
	 * result starts a run of this producer and observes `transform` of it.
	 */
	lift<U, F>(transform: (signal: Signal<T, E>) => Signal<U, F>): Producer<U, F> {
		return new Producer<U, F>((observer, outerDisposable) => {
			this.startWithSignal((signal, innerDisposable) => {
				outerDisposable.add(innerDisposable);
				transform(signal).observe(observer);
			});
		});
	}

	/**
	 * Promote a binary signal operator. Both producers start into the same
	 * disposal root; `transform` is applied to the other signal first.
	 */
	liftBinary<U, F, V, G>(
		transform: (other: Signal<U, F>) => (signal: Signal<T, E>) => Signal<V, G>,
	): (other: Producer<U, F>) => Producer<V, G> {
		return (otherProducer) =>
			new Producer<V, G>((observer, outerDisposable) => {
				this.startWithSignal((signal, disposable) => {
					outerDisposable.add(disposable);
					otherProducer.startWithSignal((otherSignal, otherDisposable) => {
						outerDisposable.add(otherDisposable);
						transform(otherSignal)(signal).observe(observer);
					});
				});
			});
	}

	map<U>(transform: (value: T) => U): Producer<U, E> {
		return this.lift((signal) => signal.map(transform));
	}

	mapError<F>(transform: (error: E) => F): Producer<T, F> {
		return this.lift((signal) => signal.mapError(transform));
	}

	filter(predicate: (value: T) => boolean): Producer<T, E> {
		return this.lift((signal) => signal.filter(predicate));
	}

	ignoreNil(): Producer<NonNullable<T>, E> {
		return this.lift((signal) => signal.ignoreNil());
	}

	promoteErrors<F>(this: Producer<T, never>): Producer<T, F> {
		return this.lift((signal) => signal.promoteErrors<F>());
	}

	take(count: number): Producer<T, E> {
		assertNonNegative("count", count);
		return this.lift((signal) => signal.take(count));
	}

	skip(count: number): Producer<T, E> {
		assertNonNegative("count", count);
		return this.lift((signal) => signal.skip(count));
	}

	takeWhile(predicate: (value: T) => boolean): Producer<T, E> {
		return this.lift((signal) => signal.takeWhile(predicate));
	}

	skipWhile(predicate: (value: T) => boolean): Producer<T, E> {
		return this.lift((signal) => signal.skipWhile(predicate));
	}

	takeLast(count: number): Producer<T, E> {
		assertNonNegative("count", count);
		return this.lift((signal) => signal.takeLast(count));
	}

	collect(): Producer<T[], E> {
		return this.lift((signal) => signal.collect());
	}

	scan<U>(initial: U, combine: (accumulated: U, value: T) => U): Producer<U, E> {
		return this.lift((signal) => signal.scan(initial, combine));
	}

	reduce<U>(
		initial: U,
		combine: (accumulated: U, value: T) => U,
	): Producer<U, E> {
		return this.lift((signal) => signal.reduce(initial, combine));
	}

	combinePrevious(initial: T): Producer<[T, T], E> {
		return this.lift((signal) => signal.combinePrevious(initial));
	}

	skipRepeats(isRepeat?: (previous: T, current: T) => boolean): Producer<T, E> {
		return this.lift((signal) => signal.skipRepeats(isRepeat));
	}

	materialize(): Producer<Event<T, E>, never> {
		return this.lift((signal) => signal.materialize());
	}

	dematerialize<U, F>(this: Producer<Event<U, F>, never>): Producer<U, F> {
		return this.lift((signal) => signal.dematerialize());
	}

	attempt(operation: (value: T) => Result<E, unknown>): Producer<T, E> {
		return this.lift((signal) => signal.attempt(operation));
	}

	attemptMap<U>(operation: (value: T) => Result<E, U>): Producer<U, E> {
		return this.lift((signal) => signal.attemptMap(operation));
	}

	observeOn(scheduler: Scheduler): Producer<T, E> {
		return this.lift((signal) => signal.observeOn(scheduler));
	}

	delay(interval: number, scheduler: DateScheduler): Producer<T, E> {
		assertNonNegative("interval", interval);
		return this.lift((signal) => signal.delay(interval, scheduler));
	}

	throttle(interval: number, scheduler: DateScheduler): Producer<T, E> {
		assertNonNegative("interval", interval);
		return this.lift((signal) => signal.throttle(interval, scheduler));
	}

	timeoutWithError(
		error: E,
		interval: number,
		scheduler: DateScheduler,
	): Producer<T, E> {
		assertNonNegative("interval", interval);
		return this.lift((signal) =>
			signal.timeoutWithError(error, interval, scheduler),
		);
	}

	combineLatestWith<U>(other: Producer<U, E>): Producer<[T, U], E> {
		return this.liftBinary(
			(otherSignal: Signal<U, E>) => (signal: Signal<T, E>) =>
				signal.combineLatestWith(otherSignal),
		)(other);
	}

	zipWith<U>(other: Producer<U, E>): Producer<[T, U], E> {
		return this.liftBinary(
			(otherSignal: Signal<U, E>) => (signal: Signal<T, E>) =>
				signal.zipWith(otherSignal),
		)(other);
	}

	sampleOn<U>(sampler: Producer<U, never>): Producer<T, E> {
		return this.liftBinary(
			(samplerSignal: Signal<U, never>) => (signal: Signal<T, E>) =>
				signal.sampleOn(samplerSignal),
		)(sampler);
	}

	takeUntil<U>(trigger: Producer<U, never>): Producer<T, E> {
		return this.liftBinary(
			(triggerSignal: Signal<U, never>) => (signal: Signal<T, E>) =>
				signal.takeUntil(triggerSignal),
		)(trigger);
	}

	takeUntilReplacement(replacement: Producer<T, E>): Producer<T, E> {
		return this.liftBinary(
			(replacementSignal: Signal<T, E>) => (signal: Signal<T, E>) =>
				signal.takeUntilReplacement(replacementSignal),
		)(replacement);
	}

	/**
	 * Inject side effects into each run without changing its events.
	 *
	 * @example
	 * ```typescript
	 * producer.on({
	 *   started: () => spinner.show(),
	 *   terminated: () => spinner.hide(),
	 * })
	 * ```
	 */
	on(hooks: ProducerHooks<T, E>): Producer<T, E> {
		return new Producer<T, E>((observer, compositeDisposable) => {
			hooks.started?.();
			compositeDisposable.add(hooks.disposed);

			this.startWithSignal((signal, disposable) => {
				compositeDisposable.add(disposable);
				signal.observe((event) => {
					hooks.event?.(event);
					switch (event.type) {
						case "next":
							hooks.next?.(event.value);
							break;
						case "error":
							hooks.error?.(event.error);
							break;
						case "completed":
							hooks.completed?.();
							break;
						case "interrupted":
							hooks.interrupted?.();
							break;
					}
					if (isTerminating(event)) {
						hooks.terminated?.();
					}
					observer(event);
				});
			});
		});
	}

	/**
	 * Start the work on `scheduler`. Events are delivered wherever the work
	 * sends them. Cancelling before the scheduled start prevents it.
	 */
	startOn(scheduler: Scheduler): Producer<T, E> {
		return new Producer<T, E>((observer, compositeDisposable) => {
			compositeDisposable.add(
				scheduler.schedule(() => {
					this.startWithSignal((signal, signalDisposable) => {
						compositeDisposable.add(signalDisposable);
						signal.observe(observer);
					});
				}),
			);
		});
	}

	/**
	 * Collapse a producer of producers into one, per `strategy`.
	 */
	flatten<U>(
		this: Producer<Producer<U, E>, E>,
		strategy: FlattenStrategy,
	): Producer<U, E> {
		return flatten(this, strategy);
	}

	flatMap<U>(
		strategy: FlattenStrategy,
		transform: (value: T) => Producer<U, E>,
	): Producer<U, E> {
		return this.map(transform).flatten(strategy);
	}

	/**
	 * On error, continue with the producer `handler` returns for it.
	 */
	flatMapError<F>(handler: (error: E) => Producer<T, F>): Producer<T, F> {
		return new Producer<T, F>((observer, disposable) => {
			const serialDisposable = new SerialDisposable();
			disposable.add(serialDisposable);

			this.startWithSignal((signal, signalDisposable) => {
				serialDisposable.inner = signalDisposable;

				signal.observe((event) => {
					if (event.type !== "error") {
						observer(event);
						return;
					}
					handler(event.error).startWithSignal(
						(replacement, replacementDisposable) => {
							serialDisposable.inner = replacementDisposable;
							replacement.observe(observer);
						},
					);
				});
			});
		});
	}

	/**
	 * Send this producer's events, then, once it completes, `next`'s.
	 */
	concat(next: Producer<T, E>): Producer<T, E> {
		return Producer.ofSequence<Producer<T, E>, E>([this, next]).flatten(
			"concat",
		);
	}

	/**
	 * Wait for this producer to complete, ignoring its values, then forward
	 * `replacement`. An error or interruption is forwarded and `replacement`
	 * never starts.
	 */
	then<U>(replacement: Producer<U, E>): Producer<U, E> {
		const relay = new Producer<U, E>((observer, observerDisposable) => {
			this.startWithSignal((signal, signalDisposable) => {
				observerDisposable.add(signalDisposable);
				signal.observe({
					error: (error) => sendError(observer, error),
					completed: () => sendCompleted(observer),
					interrupted: () => sendInterrupted(observer),
				});
			});
		});

		return relay.concat(replacement);
	}

	/**
	 * Run this producer `count` times in a row, restarting on completion.
	 */
	times(count: number): Producer<T, E> {
		assertNonNegative("count", count);

		if (count === 0) {
			return Producer.empty();
		}
		if (count === 1) {
			return this;
		}

		return new Producer<T, E>((observer, disposable) => {
			const serialDisposable = new SerialDisposable();
			disposable.add(serialDisposable);

			const iterate = (current: number): void => {
				this.startWithSignal((signal, signalDisposable) => {
					serialDisposable.inner = signalDisposable;

					signal.observe((event) => {
						if (event.type !== "completed") {
							observer(event);
							return;
						}
						const remaining = current - 1;
						if (remaining > 0) {
							iterate(remaining);
						} else {
							sendCompleted(observer);
						}
					});
				});
			};

			iterate(count);
		});
	}

	/**
	 * Restart on error, up to `count` times.
	 */
	retry(count: number): Producer<T, E> {
		assertNonNegative("count", count);

		if (count === 0) {
			return this;
		}
		return this.flatMapError(() => this.retry(count - 1));
	}

	/**
	 * Start the producer and wait for its terminal event. Resolves to the
	 * only value, the error, or `undefined` when there was no value, more
	 * than one, or the run was interrupted.
	 */
	async single(options: AwaitOptions = {}): Promise<Result<E, T> | undefined> {
		const gate = new Gate();
		let result: Result<E, T> | undefined;

		this.take(2).start(
			{
				next: (value) => {
					if (result !== undefined) {
						result = undefined;
						return;
					}
					result = success(value);
				},
				error: (error) => {
					result = failure(error);
					gate.open();
				},
				completed: () => gate.open(),
				interrupted: () => gate.open(),
			},
			{ signal: options.signal },
		);

		await gate.wait();
		return result;
	}

	/**
	 * Wait for the first value.
	 */
	first(options: AwaitOptions = {}): Promise<Result<E, T> | undefined> {
		return this.take(1).single(options);
	}

	/**
	 * Wait for the last value.
	 */
	last(options: AwaitOptions = {}): Promise<Result<E, T> | undefined> {
		return this.takeLast(1).single(options);
	}

	/**
	 * Wait for the producer to finish. Values are ignored. An interruption
	 * counts as success unless it came from aborting `options.signal`, in
	 * which case the promise resolves to `undefined`.
	 */
	async wait(
		options: AwaitOptions = {},
	): Promise<Result<E, undefined> | undefined> {
		const gate = new Gate();
		let result: Result<E, undefined> | undefined;

		this.start(
			{
				error: (error) => {
					result = failure(error);
					gate.open();
				},
				completed: () => {
					result = success(undefined);
					gate.open();
				},
				interrupted: () => {
					if (options.signal?.aborted !== true) {
						result = success(undefined);
					}
					gate.open();
				},
			},
			{ signal: options.signal },
		);

		await gate.wait();
		return result;
	}

	/**
	 * Wait for completion and resolve to every value sent.
	 */
	toArray(options: AwaitOptions = {}): Promise<Result<E, T[]> | undefined> {
		return this.collect().last(options);
	}

	/**
	 * Log every event of each run.
	 *
	 * @example
	 * ```typescript
	 * producer.logEvents({ identifier: "users", events: ["error", "interrupted"] })
	 * ```
	 */
	logEvents(options: LogEventsOptions = {}): Producer<T, E> {
		const identifier = options.identifier ?? "producer";
		const level = options.level ?? "debug";
		const logger = createLogger(identifier, options.logger, level);
		const kinds = new Set(options.events ?? ALL_LOGGED_EVENTS);

		const log = (kind: EventKind | "started" | "disposed", message: string) => {
			if (!kinds.has(kind)) return;
			if (kind === "error") {
				logger.error(message);
			} else {
				logger[level](message);
			}
		};

		return this.on({
			started: () => log("started", "started"),
			event: (event) => log(event.type, describeEvent(event)),
			disposed: () => log("disposed", "disposed"),
		});
	}

	/**
	 * Open one span per run. The span records the number of values and the
	 * outcome, and ends when the run is disposed.
	 */
	traced(tracer: Tracer, options: TraceOptions = {}): Producer<T, E> {
		const name = options.name ?? "producer";

		return new Producer<T, E>((observer, disposable) => {
			const span = tracer.startSpan(name, {
				attributes: options.attributes ?? {},
			});
			let values = 0;

			this.startWithSignal((signal, innerDisposable) => {
				disposable.add(innerDisposable);
				signal.observe((event) => {
					switch (event.type) {
						case "next":
							values++;
							break;
						case "error": {
							const error = toError(event.error);
							span.recordException(error);
							span.setStatus({
								code: SpanStatusCode.ERROR,
								message: error.message,
							});
							break;
						}
						case "completed":
							span.setStatus({ code: SpanStatusCode.OK });
							break;
						case "interrupted":
							span.setStatus({
								code: SpanStatusCode.ERROR,
								message: "interrupted",
							});
							break;
					}
					observer(event);
				});
			});

			disposable.add(() => {
				span.setAttributes?.({ "producer.values": values });
				span.end();
			});
		});
	}
}
