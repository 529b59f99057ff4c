/**
 * Schedulers for cold-signal - where and when work runs
 */

import createDebug from "debug";
import { assertNonNegative } from "./errors.js";
import {
	ActionDisposable,
	type Disposable,
	SimpleDisposable,
} from "./disposable.js";

const debugScheduler = createDebug("cold-signal:scheduler");

/**
 * Runs actions, possibly later.
 */
export interface Scheduler {
	/**
	 * Enqueue an action. Returns a disposable that cancels it if it has not
	 * run yet, or undefined when the action already ran.
	 */
	schedule(action: () => void): Disposable | undefined;
}

export interface ScheduleAfterOptions {
	/**
	 * Run the action again every `repeatingEvery` milliseconds after the
	 * first run, until disposed.
	 */
	repeatingEvery?: number;
}

/**
 * A scheduler that can also run actions at a given date.
 */
export interface DateScheduler extends Scheduler {
	/**
	 * The scheduler's notion of "now".
	 */
	readonly currentDate: Date;

	scheduleAfter(
		date: Date,
		action: () => void,
		options?: ScheduleAfterOptions,
	): Disposable | undefined;
}

/**
 * Runs every action synchronously, inside `schedule`.
 */
export class ImmediateScheduler implements Scheduler {
	schedule(action: () => void): Disposable | undefined {
		action();
		return undefined;
	}
}

/**
 * Runs actions in FIFO order on a microtask after the current callback.
 *
 * @example
 * ```typescript
 * const producer = Producer.ofValue(1).startOn(new QueueScheduler())
 * producer.start({ next: console.log }) // logs on the next microtask
 * ```
 */
export class QueueScheduler implements Scheduler {
	private readonly queue: Array<{
		action: () => void;
		disposable: SimpleDisposable;
	}> = [];
	private draining = false;

	schedule(action: () => void): Disposable {
		const disposable = new SimpleDisposable();
		this.queue.push({ action, disposable });

		if (!this.draining) {
			this.draining = true;
			queueMicrotask(() => this.drain());
		}

		return disposable;
	}

	private drain(): void {
		try {
			while (this.queue.length > 0) {
				const item = this.queue.shift();
				if (item && !item.disposable.disposed) {
					item.action();
				}
			}
		} finally {
			this.draining = false;
			if (this.queue.length > 0) {
				this.draining = true;
				queueMicrotask(() => this.drain());
			}
		}
	}
}

/**
 * Runs actions on Node's timers against the wall clock.
 */
export class TimeoutScheduler implements DateScheduler {
	get currentDate(): Date {
		return new Date();
	}

	schedule(action: () => void): Disposable {
		const id = setTimeout(action, 0);
		return new ActionDisposable(() => clearTimeout(id));
	}

	scheduleAfter(
		date: Date,
		action: () => void,
		options?: ScheduleAfterOptions,
	): Disposable {
		const delay = Math.max(0, date.getTime() - Date.now());
		const interval = options?.repeatingEvery;

		if (interval === undefined) {
			const id = setTimeout(action, delay);
			return new ActionDisposable(() => clearTimeout(id));
		}

		assertNonNegative("repeatingEvery", interval);
		if (debugScheduler.enabled) {
			debugScheduler(
				"repeating action in %dms, every %dms",
				delay,
				interval,
			);
		}

		let intervalId: ReturnType<typeof setInterval> | undefined;
		const timeoutId = setTimeout(() => {
			intervalId = setInterval(action, interval);
			action();
		}, delay);

		return new ActionDisposable(() => {
			clearTimeout(timeoutId);
			if (intervalId !== undefined) {
				clearInterval(intervalId);
			}
		});
	}
}
