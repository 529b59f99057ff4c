/**
 * Events carried by signals.
 *
 * Exactly one of `error`, `completed` or `interrupted` ends a signal;
 * any number of `next` events may precede it.
 */

import type { Observer, ObserverCallbacks } from "./types.js";

export type Event<T, E> =
	| { readonly type: "next"; readonly value: T }
	| { readonly type: "error"; readonly error: E }
	| { readonly type: "completed" }
	| { readonly type: "interrupted" };

export const COMPLETED: { readonly type: "completed" } = { type: "completed" };
export const INTERRUPTED: { readonly type: "interrupted" } = {
	type: "interrupted",
};

export function nextEvent<T>(value: T): { readonly type: "next"; readonly value: T } {
	return { type: "next", value };
}

export function errorEvent<E>(error: E): {
	readonly type: "error";
	readonly error: E;
} {
	return { type: "error", error };
}

/**
 * True for `error`, `completed` and `interrupted`.
 */
export function isTerminating<T, E>(event: Event<T, E>): boolean {
	return event.type !== "next";
}

export function mapEvent<T, U, E>(
	event: Event<T, E>,
	transform: (value: T) => U,
): Event<U, E> {
	switch (event.type) {
		case "next":
			return nextEvent(transform(event.value));
		case "error":
			return event;
		case "completed":
			return COMPLETED;
		case "interrupted":
			return INTERRUPTED;
	}
}

export function mapEventError<T, E, F>(
	event: Event<T, E>,
	transform: (error: E) => F,
): Event<T, F> {
	switch (event.type) {
		case "next":
			return event;
		case "error":
			return errorEvent(transform(event.error));
		case "completed":
			return COMPLETED;
		case "interrupted":
			return INTERRUPTED;
	}
}

/**
 * Structural equality; values and errors are compared with `Object.is`.
 */
export function eventsEqual<T, E>(a: Event<T, E>, b: Event<T, E>): boolean {
	switch (a.type) {
		case "next":
			return b.type === "next" && Object.is(a.value, b.value);
		case "error":
			return b.type === "error" && Object.is(a.error, b.error);
		default:
			return a.type === b.type;
	}
}

/**
 * Human-readable form used by `logEvents`.
 */
export function describeEvent<T, E>(event: Event<T, E>): string {
	switch (event.type) {
		case "next":
			return `next ${String(event.value)}`;
		case "error":
			return `error ${event.error instanceof Error ? event.error.message : String(event.error)}`;
		default:
			return event.type;
	}
}

/**
 * Build an observer that dispatches each event to the matching callback.
 */
export function eventSink<T, E>(
	callbacks: ObserverCallbacks<T, E>,
): Observer<T, E> {
	return (event) => {
		switch (event.type) {
			case "next":
				callbacks.next?.(event.value);
				break;
			case "error":
				callbacks.error?.(event.error);
				break;
			case "completed":
				callbacks.completed?.();
				break;
			case "interrupted":
				callbacks.interrupted?.();
				break;
		}
	};
}

export function toObserver<T, E>(
	observer: Observer<T, E> | ObserverCallbacks<T, E>,
): Observer<T, E> {
	return typeof observer === "function" ? observer : eventSink(observer);
}

export function sendNext<T, E>(observer: Observer<T, E>, value: T): void {
	observer(nextEvent(value));
}

export function sendError<T, E>(observer: Observer<T, E>, error: E): void {
	observer(errorEvent(error));
}

export function sendCompleted<T, E>(observer: Observer<T, E>): void {
	observer(COMPLETED);
}

export function sendInterrupted<T, E>(observer: Observer<T, E>): void {
	observer(INTERRUPTED);
}
