/**
 * Tests for Signal and its operators
 */

import { describe, expect, test, vi } from "vitest";
import {
	COMPLETED,
	type Event,
	errorEvent,
	failure,
	INTERRUPTED,
	InvalidArgumentError,
	ImmediateScheduler,
	nextEvent,
	type Observer,
	sendCompleted,
	sendError,
	sendInterrupted,
	sendNext,
	Signal,
	SimpleDisposable,
	success,
} from "../src/index.js";
import { createEventRecorder, TestScheduler } from "../src/testing/index.js";

function feed<T, E>(events: readonly Event<T, E>[]) {
	const [signal, observer] = Signal.pipe<T, E>();
	return {
		signal,
		send: () => {
			for (const event of events) observer(event);
		},
	};
}

describe("Signal", () => {
	test("runs the generator once, at construction", () => {
		const generator = vi.fn(() => undefined);
		new Signal<number, never>(generator);
		expect(generator).toHaveBeenCalledTimes(1);
	});

	test("delivers events to every observer", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const a = createEventRecorder<number, string>();
		const b = createEventRecorder<number, string>();
		signal.observe(a.observer);
		signal.observe(b.observer);

		sendNext(observer, 1);
		sendCompleted(observer);

		expect(a.events).toEqual([nextEvent(1), COMPLETED]);
		expect(b.events).toEqual([nextEvent(1), COMPLETED]);
	});

	test("nothing is delivered after the terminal event", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const recorder = createEventRecorder<number, string>();
		signal.observe(recorder.observer);

		sendError(observer, "boom");
		sendNext(observer, 1);
		sendCompleted(observer);

		expect(recorder.events).toEqual([errorEvent("boom")]);
		expect(signal.terminated).toBe(true);
	});

	test("a late observer receives the terminal event only", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		sendNext(observer, 1);
		sendInterrupted(observer);

		const recorder = createEventRecorder<number, string>();
		const disposable = signal.observe(recorder.observer);

		expect(disposable).toBeUndefined();
		expect(recorder.events).toEqual([INTERRUPTED]);
	});

	test("disposing an observation detaches the observer", () => {
		const [signal, observer] = Signal.pipe<number, never>();
		const recorder = createEventRecorder<number, never>();
		const disposable = signal.observe(recorder.observer);

		sendNext(observer, 1);
		disposable?.dispose();
		sendNext(observer, 2);

		expect(recorder.values).toEqual([1]);
	});

	test("the generator's disposable is disposed on termination", () => {
		const resource = new SimpleDisposable();
		const captured: { sink?: Observer<number, never> } = {};
		new Signal<number, never>((observer) => {
			captured.sink = observer;
			return resource;
		});

		expect(resource.disposed).toBe(false);
		captured.sink?.(COMPLETED);
		expect(resource.disposed).toBe(true);
	});

	test("accepts per-variant callbacks", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const next = vi.fn();
		const completed = vi.fn();
		signal.observe({ next, completed });

		sendNext(observer, 7);
		sendCompleted(observer);

		expect(next).toHaveBeenCalledWith(7);
		expect(completed).toHaveBeenCalledTimes(1);
	});
});

describe("Signal operators", () => {
	test("map, filter and mapError", () => {
		const { signal, send } = feed<number, string>([
			nextEvent(1),
			nextEvent(2),
			nextEvent(3),
			errorEvent("bad"),
		]);
		const recorder = createEventRecorder<number, number>();
		signal
			.map((n) => n * 10)
			.filter((n) => n !== 20)
			.mapError((e) => e.length)
			.observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(10), nextEvent(30), errorEvent(3)]);
	});

	test("ignoreNil drops null and undefined", () => {
		const { signal, send } = feed<number | null | undefined, never>([
			nextEvent(1),
			nextEvent(null),
			nextEvent(undefined),
			nextEvent(0),
			COMPLETED,
		]);
		const recorder = createEventRecorder<number, never>();
		signal.ignoreNil().observe(recorder.observer);

		send();

		expect(recorder.values).toEqual([1, 0]);
		expect(recorder.terminal).toEqual(COMPLETED);
	});

	test("take completes after the given number of values", () => {
		const { signal, send } = feed<number, never>([
			nextEvent(1),
			nextEvent(2),
			nextEvent(3),
		]);
		const recorder = createEventRecorder<number, never>();
		signal.take(2).observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(1), nextEvent(2), COMPLETED]);
	});

	test("take(0) completes as soon as it is observed", () => {
		const [signal] = Signal.pipe<number, never>();
		const recorder = createEventRecorder<number, never>();
		signal.take(0).observe(recorder.observer);

		expect(recorder.events).toEqual([COMPLETED]);
	});

	test("negative counts are rejected", () => {
		const [signal] = Signal.pipe<number, never>();
		expect(() => signal.take(-1)).toThrow(InvalidArgumentError);
		expect(() => signal.skip(-1)).toThrow("count: expected a non-negative number, got -1");
		expect(() => signal.takeLast(Number.NaN)).toThrow(InvalidArgumentError);
	});

	test("skip, skipWhile and takeWhile", () => {
		const events = [1, 2, 3, 4, 1].map((n) => nextEvent(n));
		const skipped = createEventRecorder<number, never>();
		const skippedWhile = createEventRecorder<number, never>();
		const takenWhile = createEventRecorder<number, never>();

		const { signal, send } = feed<number, never>([...events, COMPLETED]);
		signal.skip(3).observe(skipped.observer);
		signal.skipWhile((n) => n < 3).observe(skippedWhile.observer);
		signal.takeWhile((n) => n < 3).observe(takenWhile.observer);
		send();

		expect(skipped.values).toEqual([4, 1]);
		expect(skippedWhile.values).toEqual([3, 4, 1]);
		expect(takenWhile.events).toEqual([nextEvent(1), nextEvent(2), COMPLETED]);
	});

	test("takeLast sends the last values on completion", () => {
		const { signal, send } = feed<number, never>([
			nextEvent(1),
			nextEvent(2),
			nextEvent(3),
			COMPLETED,
		]);
		const recorder = createEventRecorder<number, never>();
		signal.takeLast(2).observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(2), nextEvent(3), COMPLETED]);
	});

	test("collect, scan and reduce", () => {
		const { signal, send } = feed<number, never>([
			nextEvent(1),
			nextEvent(2),
			nextEvent(3),
			COMPLETED,
		]);
		const collected = createEventRecorder<number[], never>();
		const scanned = createEventRecorder<number, never>();
		const reduced = createEventRecorder<number, never>();
		signal.collect().observe(collected.observer);
		signal.scan(0, (sum, n) => sum + n).observe(scanned.observer);
		signal.reduce(0, (sum, n) => sum + n).observe(reduced.observer);

		send();

		expect(collected.values).toEqual([[1, 2, 3]]);
		expect(scanned.values).toEqual([1, 3, 6]);
		expect(reduced.events).toEqual([nextEvent(6), COMPLETED]);
	});

	test("reduce sends the initial value when there were no values", () => {
		const { signal, send } = feed<number, never>([COMPLETED]);
		const recorder = createEventRecorder<number, never>();
		signal.reduce(42, (sum, n) => sum + n).observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(42), COMPLETED]);
	});

	test("combinePrevious pairs each value with the previous one", () => {
		const { signal, send } = feed<number, never>([nextEvent(1), nextEvent(2)]);
		const recorder = createEventRecorder<[number, number], never>();
		signal.combinePrevious(0).observe(recorder.observer);

		send();

		expect(recorder.values).toEqual([
			[0, 1],
			[1, 2],
		]);
	});

	test("skipRepeats drops consecutive repeats", () => {
		const { signal, send } = feed<string, never>(
			["a", "A", "a", "b", "B", "a"].map((s) => nextEvent(s)),
		);
		const strict = createEventRecorder<string, never>();
		const loose = createEventRecorder<string, never>();
		signal.skipRepeats().observe(strict.observer);
		signal
			.skipRepeats((a, b) => a.toLowerCase() === b.toLowerCase())
			.observe(loose.observer);

		send();

		expect(strict.values).toEqual(["a", "A", "a", "b", "B", "a"]);
		expect(loose.values).toEqual(["a", "b", "a"]);
	});

	test("materialize and dematerialize", () => {
		const { signal, send } = feed<number, string>([nextEvent(1), errorEvent("x")]);
		const materialized = createEventRecorder<Event<number, string>, never>();
		const roundTrip = createEventRecorder<number, string>();
		signal.materialize().observe(materialized.observer);
		signal.materialize().dematerialize().observe(roundTrip.observer);

		send();

		expect(materialized.events).toEqual([
			nextEvent(nextEvent(1)),
			nextEvent(errorEvent("x")),
			COMPLETED,
		]);
		expect(roundTrip.events).toEqual([nextEvent(1), errorEvent("x")]);
	});

	test("materialize follows interruption with interruption", () => {
		const { signal, send } = feed<number, string>([INTERRUPTED]);
		const recorder = createEventRecorder<Event<number, string>, never>();
		signal.materialize().observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(INTERRUPTED), INTERRUPTED]);
	});

	test("attemptMap turns a failure into the error", () => {
		const { signal, send } = feed<number, string>([
			nextEvent(4),
			nextEvent(-1),
			nextEvent(9),
		]);
		const recorder = createEventRecorder<number, string>();
		signal
			.attemptMap((n) => (n >= 0 ? success(Math.sqrt(n)) : failure("negative")))
			.observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(2), errorEvent("negative")]);
	});

	test("attempt keeps the value on success", () => {
		const { signal, send } = feed<number, string>([nextEvent(1), nextEvent(2)]);
		const recorder = createEventRecorder<number, string>();
		signal
			.attempt((n) => (n === 1 ? success(undefined) : failure("two")))
			.observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(1), errorEvent("two")]);
	});

	test("promoteErrors widens the error type", () => {
		const { signal, send } = feed<number, never>([nextEvent(1), COMPLETED]);
		const recorder = createEventRecorder<number, Error>();
		signal.promoteErrors<Error>().observe(recorder.observer);

		send();

		expect(recorder.events).toEqual([nextEvent(1), COMPLETED]);
	});

	test("observeOn re-sends through the scheduler", () => {
		const scheduler = new TestScheduler();
		const { signal, send } = feed<number, never>([nextEvent(1), COMPLETED]);
		const recorder = createEventRecorder<number, never>();
		signal.observeOn(scheduler).observe(recorder.observer);

		send();
		expect(recorder.events).toEqual([]);

		scheduler.advance();
		expect(recorder.events).toEqual([nextEvent(1), COMPLETED]);
	});

	test("observeOn an immediate scheduler forwards inline", () => {
		const { signal, send } = feed<number, never>([nextEvent(1)]);
		const recorder = createEventRecorder<number, never>();
		signal.observeOn(new ImmediateScheduler()).observe(recorder.observer);

		send();

		expect(recorder.values).toEqual([1]);
	});

	test("delay holds values and completion, not errors", () => {
		const scheduler = new TestScheduler();
		const [signal, observer] = Signal.pipe<number, string>();
		const recorder = createEventRecorder<number, string>();
		signal.delay(100, scheduler).observe(recorder.observer);

		sendNext(observer, 1);
		scheduler.advance(99);
		expect(recorder.values).toEqual([]);
		scheduler.advance(1);
		expect(recorder.values).toEqual([1]);

		sendNext(observer, 2);
		sendError(observer, "late");
		scheduler.advance(0);
		expect(recorder.events).toEqual([nextEvent(1), errorEvent("late")]);
	});

	test("throttle keeps the latest value per interval", () => {
		const scheduler = new TestScheduler();
		const [signal, observer] = Signal.pipe<number, never>();
		const recorder = createEventRecorder<number, never>();
		signal.throttle(100, scheduler).observe(recorder.observer);

		sendNext(observer, 1);
		scheduler.advance(0);
		expect(recorder.values).toEqual([1]);

		scheduler.advance(10);
		sendNext(observer, 2);
		sendNext(observer, 3);
		scheduler.advance(50);
		expect(recorder.values).toEqual([1]);

		scheduler.advance(40);
		expect(recorder.values).toEqual([1, 3]);

		sendCompleted(observer);
		scheduler.advance(0);
		expect(recorder.events).toEqual([nextEvent(1), nextEvent(3), COMPLETED]);
	});

	test("throttle: a terminal event cancels a pending value", () => {
		const scheduler = new TestScheduler();
		const [signal, observer] = Signal.pipe<number, never>();
		const recorder = createEventRecorder<number, never>();
		signal.throttle(100, scheduler).observe(recorder.observer);

		sendNext(observer, 1);
		scheduler.advance(0);
		sendNext(observer, 2);
		sendInterrupted(observer);
		scheduler.advance(200);

		expect(recorder.events).toEqual([nextEvent(1), INTERRUPTED]);
	});

	test("timeoutWithError fails unless terminated in time", () => {
		const scheduler = new TestScheduler();
		const [slow] = Signal.pipe<number, string>();
		const [fast, fastObserver] = Signal.pipe<number, string>();
		const slowRecorder = createEventRecorder<number, string>();
		const fastRecorder = createEventRecorder<number, string>();
		slow.timeoutWithError("timeout", 50, scheduler).observe(slowRecorder.observer);
		fast.timeoutWithError("timeout", 50, scheduler).observe(fastRecorder.observer);

		sendCompleted(fastObserver);
		scheduler.advance(50);

		expect(slowRecorder.events).toEqual([errorEvent("timeout")]);
		expect(fastRecorder.events).toEqual([COMPLETED]);
	});

	test("combineLatestWith pairs the latest values", () => {
		const [left, leftObserver] = Signal.pipe<number, string>();
		const [right, rightObserver] = Signal.pipe<string, string>();
		const recorder = createEventRecorder<[number, string], string>();
		left.combineLatestWith(right).observe(recorder.observer);

		sendNext(leftObserver, 1);
		sendNext(leftObserver, 2);
		sendNext(rightObserver, "a");
		sendNext(leftObserver, 3);
		sendCompleted(leftObserver);
		sendNext(rightObserver, "b");
		sendCompleted(rightObserver);

		expect(recorder.events).toEqual([
			nextEvent([2, "a"]),
			nextEvent([3, "a"]),
			nextEvent([3, "b"]),
			COMPLETED,
		]);
	});

	test("zipWith pairs by index and completes when a side runs out", () => {
		const [left, leftObserver] = Signal.pipe<number, string>();
		const [right, rightObserver] = Signal.pipe<string, string>();
		const recorder = createEventRecorder<[number, string], string>();
		left.zipWith(right).observe(recorder.observer);

		sendNext(leftObserver, 1);
		sendNext(leftObserver, 2);
		sendCompleted(leftObserver);
		sendNext(rightObserver, "a");
		expect(recorder.isTerminated).toBe(false);
		sendNext(rightObserver, "b");

		expect(recorder.events).toEqual([
			nextEvent([1, "a"]),
			nextEvent([2, "b"]),
			COMPLETED,
		]);
	});

	test("sampleOn sends the latest value per sample", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const [sampler, samplerObserver] = Signal.pipe<undefined, never>();
		const recorder = createEventRecorder<number, string>();
		signal.sampleOn(sampler).observe(recorder.observer);

		sendNext(samplerObserver, undefined);
		sendNext(observer, 1);
		sendNext(observer, 2);
		sendNext(samplerObserver, undefined);
		sendNext(samplerObserver, undefined);
		sendCompleted(observer);
		expect(recorder.isTerminated).toBe(false);
		sendCompleted(samplerObserver);

		expect(recorder.events).toEqual([nextEvent(2), nextEvent(2), COMPLETED]);
	});

	test("takeUntil completes when the trigger fires", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const [trigger, triggerObserver] = Signal.pipe<undefined, never>();
		const recorder = createEventRecorder<number, string>();
		signal.takeUntil(trigger).observe(recorder.observer);

		sendNext(observer, 1);
		sendNext(triggerObserver, undefined);
		sendNext(observer, 2);

		expect(recorder.events).toEqual([nextEvent(1), COMPLETED]);
	});

	test("takeUntilReplacement switches to the replacement", () => {
		const [signal, observer] = Signal.pipe<number, string>();
		const [replacement, replacementObserver] = Signal.pipe<number, string>();
		const recorder = createEventRecorder<number, string>();
		signal.takeUntilReplacement(replacement).observe(recorder.observer);

		sendNext(observer, 1);
		sendNext(replacementObserver, 10);
		sendNext(observer, 2);
		sendNext(replacementObserver, 11);
		sendCompleted(replacementObserver);

		expect(recorder.events).toEqual([
			nextEvent(1),
			nextEvent(10),
			nextEvent(11),
			COMPLETED,
		]);
	});
});
