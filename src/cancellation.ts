/**
 * Cancellation utilities for AbortSignal
 *
 * Bridges AbortSignal to the disposal tree: an aborted signal disposes a run.
 */

import createDebug from "debug";
import { ActionDisposable, type Disposable } from "./disposable.js";
import { AbortError } from "./errors.js";

const debugCancel = createDebug("cold-signal:cancellation");

/**
 * The abort reason of a signal as an Error. Reasons that are not `Error`
 * instances (`controller.abort("stop")`) are wrapped in an {@link AbortError}.
 */
export function abortReason(signal: AbortSignal): Error {
	const reason: unknown = signal.reason;
	return reason instanceof Error ? reason : new AbortError(reason);
}

/**
 * Registers a callback to be invoked when the signal is aborted.
 * Returns a disposable that unregisters the callback.
 *
 * The callback runs at most once, immediately if the signal is already aborted.
 *
 * @example
 * ```typescript
 * const registration = onAbort(controller.signal, (reason) => {
 *   console.log("cancelled:", reason.message)
 * })
 *
 * registration.dispose() // no longer interested
 * ```
 */
export function onAbort(
	signal: AbortSignal,
	callback: (reason: Error) => void,
): Disposable {
	if (signal.aborted) {
		if (debugCancel.enabled) {
			debugCancel("signal already aborted, calling callback immediately");
		}
		callback(abortReason(signal));
		const done = new ActionDisposable(() => {});
		done.dispose();
		return done;
	}

	const registration = new ActionDisposable(() => {
		signal.removeEventListener("abort", handler);
		if (debugCancel.enabled) {
			debugCancel("abort callback unregistered");
		}
	});

	function handler(): void {
		if (registration.disposed) return;
		registration.dispose();
		const reason = abortReason(signal);
		if (debugCancel.enabled) {
			debugCancel("abort callback invoked with reason: %s", reason.message);
		}
		callback(reason);
	}

	signal.addEventListener("abort", handler, { once: true });
	return registration;
}

/**
 * Dispose `disposable` when `signal` aborts.
 *
 * Returns a disposable that detaches the listener without disposing the
 * target.
 *
 * @example
 * ```typescript
 * const run = producer.start(observer)
 * const link = disposableFromAbortSignal(controller.signal, run)
 * ```
 */
export function disposableFromAbortSignal(
	signal: AbortSignal,
	disposable: Disposable,
): Disposable {
	return onAbort(signal, () => disposable.dispose());
}
