/**
 * Built-in error classes for cold-signal
 */

/**
 * UnknownError - wraps rejection reasons that are not `Error` instances.
 *
 * `Producer.fromPromise` uses it when no error mapper is given, so the
 * error slot of a failed run always holds something with a message.
 *
 * @example
 * ```typescript
 * const [err] = (await Producer.fromPromise(() => Promise.reject("nope")).wait()) ?? []
 * if (err instanceof UnknownError) {
 *   console.error(err.cause) // "nope"
 * }
 * ```
 */
export class UnknownError extends Error {
	readonly _tag = "UnknownError" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "UnknownError";
	}
}

/**
 * AbortError - the reason recorded when a run is cancelled through an
 * AbortSignal that was aborted without a reason of its own.
 */
export class AbortError extends Error {
	readonly _tag = "AbortError" as const;
	readonly reason: unknown;

	constructor(reason: unknown) {
		super(typeof reason === "string" ? reason : "aborted");
		this.name = "AbortError";
		this.reason = reason;
	}
}

/**
 * InvalidArgumentError - thrown synchronously when an operator receives
 * an argument outside its domain (negative count, capacity or interval).
 */
export class InvalidArgumentError extends Error {
	readonly _tag = "InvalidArgumentError" as const;
	readonly argument: string;

	constructor(argument: string, message: string) {
		super(`${argument}: ${message}`);
		this.name = "InvalidArgumentError";
		this.argument = argument;
	}
}

/**
 * Throw an {@link InvalidArgumentError} unless `value` is >= 0 (NaN fails).
 */
export function assertNonNegative(argument: string, value: number): void {
	if (!(value >= 0)) {
		throw new InvalidArgumentError(
			argument,
			`expected a non-negative number, got ${value}`,
		);
	}
}
