/**
 * Type definitions and interfaces for cold-signal
 */

import type { Event } from "./event.js";
import type { DateScheduler } from "./scheduler.js";

export type Success<T> = readonly [undefined, T];
export type Failure<E> = readonly [E, undefined];
export type Result<E, T> = Success<T> | Failure<E>;

/**
 * Create a successful result.
 */
export function success<T>(value: T): Success<T> {
	return [undefined, value];
}

/**
 * Create a failed result. The error must not be `undefined`.
 */
export function failure<E>(error: E): Failure<E> {
	return [error, undefined];
}

export function isFailure<E, T>(result: Result<E, T>): result is Failure<E> {
	return result[0] !== undefined;
}

export function isSuccess<E, T>(result: Result<E, T>): result is Success<T> {
	return result[0] === undefined;
}

/**
 * Dispatch on a result, calling exactly one of the handlers.
 *
 * @example
 * ```typescript
 * const label = analysis(result, {
 *   ifSuccess: (value) => `got ${value}`,
 *   ifFailure: (error) => `failed: ${error}`,
 * })
 * ```
 */
export function analysis<E, T, R>(
	result: Result<E, T>,
	handlers: {
		ifSuccess: (value: T) => R;
		ifFailure: (error: E) => R;
	},
): R {
	if (isFailure(result)) {
		return handlers.ifFailure(result[0]);
	}
	return handlers.ifSuccess(result[1]);
}

/**
 * Receives every event of a signal, one call per event.
 */
export type Observer<T, E> = (event: Event<T, E>) => void;

/**
 * Per-variant callbacks. Accepted anywhere an {@link Observer} is.
 */
export interface ObserverCallbacks<T, E> {
	next?: (value: T) => void;
	error?: (error: E) => void;
	completed?: () => void;
	interrupted?: () => void;
}

/**
 * Logger interface for structured logging.
 * Compatible with console, pino, winston and similar loggers.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * OpenTelemetry Span interface (minimal subset).
 * A span from `@opentelemetry/api` satisfies it.
 */
export interface Span {
	end(): void;
	recordException(exception: Error | string): void;
	setStatus(status: { code: number; message?: string }): void;
	setAttributes?(attributes: Record<string, string | number | boolean>): void;
}

/**
 * OpenTelemetry Tracer interface (minimal subset).
 * A tracer from `@opentelemetry/api` satisfies it.
 */
export interface Tracer {
	startSpan(
		name: string,
		options?: { attributes?: Record<string, string | number | boolean> },
	): Span;
}

/**
 * Options for starting a producer.
 */
export interface StartOptions {
	/**
	 * Aborting this signal disposes the run, which sends `interrupted`.
	 */
	signal?: AbortSignal;
}

/**
 * Options for the awaiting reducers (`first`, `single`, `last`, `wait`, `toArray`).
 */
export interface AwaitOptions {
	/**
	 * Aborting this signal disposes the run and the promise resolves to
	 * `undefined`.
	 */
	signal?: AbortSignal;
}

/**
 * Which kinds of events `logEvents` writes.
 */
export type EventKind = Event<unknown, unknown>["type"];

/**
 * Options for `Producer.logEvents`.
 */
export interface LogEventsOptions {
	/**
	 * Prefix for every log line. Default: "producer"
	 */
	identifier?: string;
	/**
	 * Logger to write to. Default: console logger at `level`.
	 */
	logger?: Logger;
	/**
	 * Level used for the default console logger and for non-error events.
	 * Default: "debug"
	 */
	level?: LogLevel;
	/**
	 * Event kinds to log. Default: all of them, plus "started" and "disposed".
	 */
	events?: readonly (EventKind | "started" | "disposed")[];
}

/**
 * Options for `Producer.traced`.
 */
export interface TraceOptions {
	/**
	 * Span name. Default: "producer"
	 */
	name?: string;
	/**
	 * Extra attributes set when the span starts.
	 */
	attributes?: Record<string, string | number | boolean>;
}

/**
 * Options for `Producer.timer`.
 */
export interface TimerOptions {
	/**
	 * Milliseconds between ticks. Must be >= 0.
	 */
	interval: number;
	/**
	 * Scheduler that drives the ticks and supplies the dates sent.
	 */
	scheduler: DateScheduler;
}
