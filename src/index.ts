/**
 * cold-signal - Cold, restartable event streams for TypeScript
 *
 * A Producer is a recipe for a stream of events. Each start runs the recipe
 * anew, with its own Signal and its own disposal tree, so cancelling one run
 * releases exactly what that run acquired.
 */

export { Atomic } from "./atomic.js";
export { Bag, type RemovalToken } from "./bag.js";
export { buffer } from "./buffer.js";
export {
	abortReason,
	disposableFromAbortSignal,
	onAbort,
} from "./cancellation.js";
export {
	combineLatest,
	combineLatestAll,
	timer,
	zip,
	zipAll,
} from "./combinators.js";
export {
	ActionDisposable,
	CompositeDisposable,
	type Disposable,
	DisposableHandle,
	type DisposableLike,
	SerialDisposable,
	SimpleDisposable,
} from "./disposable.js";
export {
	AbortError,
	assertNonNegative,
	InvalidArgumentError,
	UnknownError,
} from "./errors.js";
export {
	COMPLETED,
	describeEvent,
	type Event,
	errorEvent,
	eventSink,
	eventsEqual,
	INTERRUPTED,
	isTerminating,
	mapEvent,
	mapEventError,
	nextEvent,
	sendCompleted,
	sendError,
	sendInterrupted,
	sendNext,
	toObserver,
} from "./event.js";
export {
	describeFlattenStrategy,
	type FlattenStrategy,
	flatten,
} from "./flatten.js";
export { Gate } from "./gate.js";
export { ConsoleLogger, createLogger, NoOpLogger } from "./logger.js";
export {
	Producer,
	type ProducerHooks,
	type StartHandler,
} from "./producer.js";
export {
	type DateScheduler,
	ImmediateScheduler,
	QueueScheduler,
	type ScheduleAfterOptions,
	type Scheduler,
	TimeoutScheduler,
} from "./scheduler.js";
export { Signal, type SignalGenerator } from "./signal.js";
export {
	analysis,
	type AwaitOptions,
	type EventKind,
	type Failure,
	failure,
	isFailure,
	isSuccess,
	type LogEventsOptions,
	type Logger,
	type LogLevel,
	type Observer,
	type ObserverCallbacks,
	type Result,
	type Span,
	type StartOptions,
	type Success,
	success,
	type TimerOptions,
	type TraceOptions,
	type Tracer,
} from "./types.js";
