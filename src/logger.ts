/**
 * Loggers used by `Producer.logEvents` and `Signal.logEvents`
 */

import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Writes to the console method of the same name. Every line starts with
 * the producer's identifier in brackets, e.g. `[users] next 1`, and lines
 * below `minimum` are dropped.
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly minimum: number;

	constructor(identifier: string, minimum: LogLevel = "info") {
		this.prefix = `[${identifier}]`;
		this.minimum = LEVEL_RANK[minimum];
	}

	debug(message: string, ...args: unknown[]): void {
		this.write("debug", message, args);
	}

	info(message: string, ...args: unknown[]): void {
		this.write("info", message, args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write("warn", message, args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write("error", message, args);
	}

	private write(level: LogLevel, message: string, args: unknown[]): void {
		if (LEVEL_RANK[level] < this.minimum) return;
		console[level](`${this.prefix} ${message}`, ...args);
	}
}

/** Discards everything. */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Pick the logger for `logEvents`: the caller's own logger if given, a
 * console logger prefixed with `identifier` when only a level is given,
 * otherwise one that discards everything.
 */
export function createLogger(
	identifier: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	if (level) return new ConsoleLogger(identifier, level);
	return new NoOpLogger();
}
