/**
 * Gate class for cold-signal - one-shot latch awaited by the reducers
 */

import createDebug from "debug";

const debugGate = createDebug("cold-signal:gate");

/**
 * A latch that starts closed and opens once. Every `wait()`, before or
 * after the opening, settles once the gate is open.
 *
 * @example
 * ```typescript
 * const gate = new Gate()
 * producer.start({ completed: () => gate.open() })
 * await gate.wait()
 * ```
 */
export class Gate {
	private opened = false;
	private waiters: Array<() => void> = [];

	/**
	 * Whether `open()` has been called.
	 */
	get isOpen(): boolean {
		return this.opened;
	}

	/**
	 * Number of pending `wait()` calls.
	 */
	get waiting(): number {
		return this.waiters.length;
	}

	/**
	 * Open the gate, releasing every waiter. Idempotent.
	 */
	open(): void {
		if (this.opened) return;
		this.opened = true;

		const waiters = this.waiters;
		this.waiters = [];
		if (debugGate.enabled) {
			debugGate("opened, releasing %d waiter(s)", waiters.length);
		}
		for (const resolve of waiters) {
			resolve();
		}
	}

	wait(): Promise<void> {
		if (this.opened) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			this.waiters.push(resolve);
		});
	}
}
