/**
 * Tests for the AbortSignal bridge
 */

import { describe, expect, test, vi } from "vitest";
import {
	AbortError,
	abortReason,
	disposableFromAbortSignal,
	onAbort,
	SimpleDisposable,
} from "../src/index.js";

describe("abortReason", () => {
	test("returns an Error reason as it is", () => {
		const reason = new Error("shutdown");
		expect(abortReason(AbortSignal.abort(reason))).toBe(reason);
	});

	test("wraps other reasons in an AbortError", () => {
		const error = abortReason(AbortSignal.abort("stop"));

		expect(error).toBeInstanceOf(AbortError);
		expect(error.message).toBe("stop");
	});

	test("wraps non-string reasons with a generic message", () => {
		const error = abortReason(AbortSignal.abort(42));

		expect(error).toBeInstanceOf(AbortError);
		expect(error.message).toBe("aborted");
		expect(error instanceof AbortError && error.reason).toBe(42);
	});
});

describe("onAbort", () => {
	test("calls back once when the signal aborts", () => {
		const controller = new AbortController();
		const callback = vi.fn();

		const registration = onAbort(controller.signal, callback);
		expect(registration.disposed).toBe(false);

		controller.abort("done");

		expect(callback).toHaveBeenCalledTimes(1);
		expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(AbortError);
		expect(registration.disposed).toBe(true);
	});

	test("calls back at once for an already aborted signal", () => {
		const callback = vi.fn();
		const reason = new Error("early");

		const registration = onAbort(AbortSignal.abort(reason), callback);

		expect(callback).toHaveBeenCalledWith(reason);
		expect(registration.disposed).toBe(true);
	});

	test("disposing the registration stops the callback", () => {
		const controller = new AbortController();
		const callback = vi.fn();

		onAbort(controller.signal, callback).dispose();
		controller.abort();

		expect(callback).not.toHaveBeenCalled();
	});
});

describe("disposableFromAbortSignal", () => {
	test("disposes the target on abort", () => {
		const controller = new AbortController();
		const target = new SimpleDisposable();

		disposableFromAbortSignal(controller.signal, target);
		controller.abort();

		expect(target.disposed).toBe(true);
	});

	test("detaching leaves the target alone", () => {
		const controller = new AbortController();
		const target = new SimpleDisposable();

		disposableFromAbortSignal(controller.signal, target).dispose();
		controller.abort();

		expect(target.disposed).toBe(false);
	});
});
