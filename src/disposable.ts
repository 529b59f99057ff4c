/**
 * Disposables for cold-signal - the disposal tree
 *
 * A started producer owns a CompositeDisposable (its disposal root). Work
 * registers children into it; disposing the root releases all of them once.
 * Every disposable here also implements `Symbol.dispose`, so it can be held
 * with `using`.
 */

import createDebug from "debug";
import { Atomic } from "./atomic.js";
import { Bag, type RemovalToken } from "./bag.js";

const debugDisposable = createDebug("cold-signal:disposable");

/**
 * Represents something that can be disposed, cancelling work and releasing
 * resources.
 */
export interface Disposable {
	/**
	 * Whether this disposable has been disposed already.
	 */
	readonly disposed: boolean;

	dispose(): void;

	[Symbol.dispose](): void;
}

/**
 * What `CompositeDisposable.add` accepts: a disposable or a bare action.
 */
export type DisposableLike = Disposable | (() => void);

function toDisposable(disposable: DisposableLike): Disposable {
	return typeof disposable === "function"
		? new ActionDisposable(disposable)
		: disposable;
}

/**
 * A disposable that only flips a flag.
 */
export class SimpleDisposable implements Disposable {
	private readonly state = new Atomic(false);

	get disposed(): boolean {
		return this.state.value;
	}

	dispose(): void {
		this.state.value = true;
	}

	[Symbol.dispose](): void {
		this.dispose();
	}
}

/**
 * A disposable that runs an action upon disposal. The action runs at most once.
 */
export class ActionDisposable implements Disposable {
	private readonly action: Atomic<(() => void) | undefined>;

	constructor(action: () => void) {
		this.action = new Atomic<(() => void) | undefined>(action);
	}

	get disposed(): boolean {
		return this.action.value === undefined;
	}

	dispose(): void {
		const action = this.action.swap(undefined);
		action?.();
	}

	[Symbol.dispose](): void {
		this.dispose();
	}
}

/**
 * Removes one child from a CompositeDisposable without disposing it.
 */
export class DisposableHandle {
	/**
	 * A handle that removes nothing. Returned when adding to a disposed composite.
	 */
	static readonly empty = new DisposableHandle(undefined, undefined);

	private readonly bagToken: Atomic<RemovalToken | undefined>;
	private readonly disposables: Atomic<Bag<Disposable> | undefined> | undefined;

	constructor(
		bagToken: RemovalToken | undefined,
		disposables: Atomic<Bag<Disposable> | undefined> | undefined,
	) {
		this.bagToken = new Atomic(bagToken);
		this.disposables = disposables;
	}

	/**
	 * Remove the pointed-to disposable from its composite. Idempotent.
	 */
	remove(): void {
		const token = this.bagToken.swap(undefined);
		if (token === undefined || this.disposables === undefined) return;
		this.disposables.withValue((bag) => bag?.removeForToken(token));
	}
}

/**
 * A disposable that disposes its children, each exactly once, in the order
 * they were added.
 *
 * @example
 * ```typescript
 * const root = new CompositeDisposable()
 * const handle = root.add(() => clearInterval(id))
 * handle.remove()   // detach without running
 * root.dispose()    // runs every child still attached
 * ```
 */
export class CompositeDisposable implements Disposable {
	private readonly disposables: Atomic<Bag<Disposable> | undefined>;

	constructor(disposables: Iterable<Disposable> = []) {
		const bag = new Bag<Disposable>();
		for (const disposable of disposables) {
			bag.insert(disposable);
		}
		this.disposables = new Atomic<Bag<Disposable> | undefined>(bag);
	}

	get disposed(): boolean {
		return this.disposables.value === undefined;
	}

	/**
	 * Number of children still attached. Zero once disposed.
	 */
	get size(): number {
		return this.disposables.value?.size ?? 0;
	}

	dispose(): void {
		const bag = this.disposables.swap(undefined);
		if (bag === undefined) return;

		const children = bag.snapshot();
		if (debugDisposable.enabled) {
			debugDisposable("disposing composite (%d children)", children.length);
		}
		for (const child of children) {
			child.dispose();
		}
	}

	/**
	 * Attach a child. If this composite is already disposed, the child is
	 * disposed immediately and an empty handle is returned.
	 */
	add(disposable: DisposableLike | undefined): DisposableHandle {
		if (disposable === undefined) return DisposableHandle.empty;

		const child = toDisposable(disposable);
		const bag = this.disposables.value;
		if (bag === undefined) {
			child.dispose();
			return DisposableHandle.empty;
		}

		return new DisposableHandle(bag.insert(child), this.disposables);
	}

	[Symbol.dispose](): void {
		this.dispose();
	}
}

/**
 * A disposable that holds one inner disposable at a time. Assigning a new
 * inner disposable disposes the previous one; assigning after disposal
 * disposes the new one immediately.
 */
export class SerialDisposable implements Disposable {
	private readonly state = new Atomic<{
		inner: Disposable | undefined;
		disposed: boolean;
	}>({ inner: undefined, disposed: false });

	get disposed(): boolean {
		return this.state.value.disposed;
	}

	get inner(): Disposable | undefined {
		return this.state.value.inner;
	}

	set inner(disposable: Disposable | undefined) {
		const previous = this.state.modify((state) => ({
			inner: disposable,
			disposed: state.disposed,
		}));

		previous.inner?.dispose();
		if (previous.disposed) {
			disposable?.dispose();
		}
	}

	dispose(): void {
		const previous = this.state.swap({ inner: undefined, disposed: true });
		if (!previous.disposed) {
			previous.inner?.dispose();
		}
	}

	[Symbol.dispose](): void {
		this.dispose();
	}
}
