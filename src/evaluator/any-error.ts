/**
 * anyError — short-circuit evaluation of a cooperative producer.
 *
 * The producer is a generator function whose yielded items are checkpoints:
 * an Error or a failed Result stops evaluation at once, a successful Result
 * (or anything else) lets the producer continue. The evaluator folds the whole
 * run into a single Result and never throws.
 *
 * ```ts
 * const content = await anyErrorAsync(async function* () {
 *   const file = yield* take(await openFile("notes.txt"));
 *   try {
 *     return yield* take(await readAll(file));
 *   } finally {
 *     await closeFile(file);
 *   }
 * });
 * ```
 */

import { DEFAULT_EVALUATOR_CONFIG, type EvaluatorConfig } from "../shared/config.js";
import { FaultError, StepResumedError, describeError, toFault } from "../shared/errors.js";
import { createLogger, type LogLevel, type Logger } from "../lib/logger/index.js";
import {
	type Err,
	type Ok,
	type Result,
	error,
	isResult,
	ok,
	tryCatch,
	tryCatchAsync,
} from "../shared/result.js";

// ── Types ───────────────────────────────────────────────────────────

/** Per-call overrides; unset fields fall back to DEFAULT_EVALUATOR_CONFIG. */
export type EvaluatorOptions = Partial<EvaluatorConfig> & {
	readonly logger?: Logger;
};

/** Value type of a sequence-mode result: an absent final value becomes `true`. */
export type Settled<R> = R extends Ok<infer T>
	? T
	: R extends Err<Error>
		? never
		: R extends null | undefined | void
			? true
			: R;

/** Value type of a direct-mode result: a returned Result is passed through. */
export type Direct<R> = R extends Ok<infer T> ? T : R extends Err<Error> ? never : R;

interface Settings {
	readonly closeOnFailure: boolean;
	readonly logger: Logger;
}

// ── Shared loggers ──────────────────────────────────────────────────

const sharedLoggers = new Map<LogLevel, Logger>();

function sharedLogger(level: LogLevel): Logger {
	let logger = sharedLoggers.get(level);
	if (logger === undefined) {
		logger = createLogger({ level });
		sharedLoggers.set(level, logger);
	}
	return logger;
}

function resolveSettings(options: EvaluatorOptions): Settings {
	const level = options.logLevel ?? DEFAULT_EVALUATOR_CONFIG.logLevel;
	const bindings = { evaluator: options.name ?? DEFAULT_EVALUATOR_CONFIG.name };
	const closeOnFailure = options.closeOnFailure ?? DEFAULT_EVALUATOR_CONFIG.closeOnFailure;

	const bound = tryCatch(() => (options.logger ?? sharedLogger(level)).child(bindings));
	if (bound.ok) return { closeOnFailure, logger: bound.value };

	const fallback = sharedLogger(level).child(bindings);
	fallback.warn({ error: bound.error }, "Caller logger could not bind, using the shared logger");
	return { closeOnFailure, logger: fallback };
}

// ── Step classification ─────────────────────────────────────────────

function isGenerator(value: unknown): value is Generator<unknown, unknown, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		"next" in value &&
		typeof value.next === "function" &&
		"return" in value &&
		typeof value.return === "function"
	);
}

function isAsyncGenerator(value: unknown): value is AsyncGenerator<unknown, unknown, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.asyncIterator in value &&
		"next" in value &&
		typeof value.next === "function" &&
		"return" in value &&
		typeof value.return === "function"
	);
}

/** The error a step item carries, or null when the item is a checkpoint to skip. */
function isThenable(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}

/** Mark a promise the sync evaluator cannot await as handled, so its rejection stays contained. */
function discard(pending: PromiseLike<unknown>): void {
	pending.then(undefined, () => {});
}

function asyncMisuse(what: string, context: Record<string, unknown> = {}): FaultError {
	return new FaultError(`${what}, use anyErrorAsync`, context);
}

function stepFailure(item: unknown): Error | null {
	if (item instanceof Error) return item;
	if (isResult(item) && !item.ok) return item.error;
	return null;
}

function settle(returned: unknown): Result<unknown, Error> {
	if (isResult(returned)) return returned;
	return ok(returned ?? true);
}

function direct(produced: unknown): Result<unknown, Error> {
	return isResult(produced) ? produced : ok(produced);
}

function shortCircuit(failure: Error, step: number, settings: Settings): Result<never, Error> {
	settings.logger.debug({ step, error: failure }, "Step failed, short-circuiting");
	return error(failure);
}

function contain(thrown: unknown, settings: Settings): Result<never, Error> {
	const fault = toFault(thrown);
	settings.logger.warn(
		{ error: fault, description: describeError(fault) },
		"Producer raised a fault, returning it as an error result",
	);
	return error(fault);
}

// ── Drivers ─────────────────────────────────────────────────────────

// A producer stopped by a failed step or by a fault is closed with return(),
// so its finally blocks run. On a generator that already finished this is a no-op.

function close(iterator: Generator<unknown, unknown, unknown>, settings: Settings): void {
	if (!settings.closeOnFailure) return;
	const cleanup = tryCatch(() => iterator.return(undefined));
	if (!cleanup.ok) warnCleanup(cleanup.error, settings);
}

async function closeAsync(
	iterator: AsyncGenerator<unknown, unknown, unknown> | Generator<unknown, unknown, unknown>,
	settings: Settings,
): Promise<void> {
	if (!settings.closeOnFailure) return;
	const cleanup = await tryCatchAsync(async () => iterator.return(undefined));
	if (!cleanup.ok) warnCleanup(cleanup.error, settings);
}

function drive(
	iterator: Generator<unknown, unknown, unknown>,
	settings: Settings,
): Result<unknown, Error> {
	let step = 0;
	try {
		let current = iterator.next();
		while (!current.done) {
			if (isThenable(current.value)) {
				discard(current.value);
				throw asyncMisuse(`step ${step} yielded a promise`, { step });
			}
			const failure = stepFailure(current.value);
			if (failure !== null) {
				close(iterator, settings);
				return shortCircuit(failure, step, settings);
			}
			step++;
			current = iterator.next();
		}
		return settle(current.value);
	} catch (e) {
		close(iterator, settings);
		return contain(e, settings);
	}
}

async function driveAsync(
	iterator: AsyncGenerator<unknown, unknown, unknown> | Generator<unknown, unknown, unknown>,
	settings: Settings,
): Promise<Result<unknown, Error>> {
	let step = 0;
	try {
		let current = await iterator.next();
		while (!current.done) {
			const failure = stepFailure(await current.value);
			if (failure !== null) {
				await closeAsync(iterator, settings);
				return shortCircuit(failure, step, settings);
			}
			step++;
			current = await iterator.next();
		}
		return settle(await current.value);
	} catch (e) {
		await closeAsync(iterator, settings);
		return contain(e, settings);
	}
}

function warnCleanup(cause: Error, settings: Settings): void {
	settings.logger.warn(
		{ error: cause },
		"Producer cleanup failed after stopping early, keeping the original error",
	);
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Run a producer and fold its output into one Result, stopping at the first failure.
 *
 * - A generator is driven item by item: an Error or failed Result ends the run
 *   with `error(...)`, anything else is skipped. The final return value is
 *   passed through when it is a Result, otherwise wrapped with `ok`
 *   (`undefined`/`null` become `true`).
 * - Any other return value is passed through when it is a Result, otherwise wrapped with `ok`.
 * - A thrown fault becomes an error Result.
 * - Asynchronous producers, and promises yielded as steps, are reported as a
 *   FaultError pointing at {@link anyErrorAsync}; they are never awaited here.
 */
export function anyError<R>(
	producer: () => Generator<unknown, R, unknown>,
	options?: EvaluatorOptions,
): Result<Settled<R>, Error>;
export function anyError<R>(producer: () => R, options?: EvaluatorOptions): Result<Direct<R>, Error>;
export function anyError(
	producer: () => unknown,
	options: EvaluatorOptions = {},
): Result<unknown, Error> {
	const settings = resolveSettings(options);
	try {
		const produced = producer();
		if (isGenerator(produced)) return drive(produced, settings);
		if (isAsyncGenerator(produced)) throw asyncMisuse("producer is an async generator");
		if (isThenable(produced)) {
			discard(produced);
			throw asyncMisuse("producer returned a promise");
		}
		return direct(produced);
	} catch (e) {
		return contain(e, settings);
	}
}

/**
 * Async counterpart of {@link anyError}. The producer may be an async generator
 * function, a generator function, or a function returning a value or a promise.
 * Items (and the final return value) are awaited one at a time, so a plain
 * generator may yield promises; rejections are contained like thrown faults.
 */
export function anyErrorAsync<R>(
	producer: () => AsyncGenerator<unknown, R, unknown>,
	options?: EvaluatorOptions,
): Promise<Result<Settled<R>, Error>>;
export function anyErrorAsync<R>(
	producer: () => Generator<unknown, R, unknown>,
	options?: EvaluatorOptions,
): Promise<Result<Settled<Awaited<R>>, Error>>;
export function anyErrorAsync<R>(
	producer: () => R | PromiseLike<R>,
	options?: EvaluatorOptions,
): Promise<Result<Direct<R>, Error>>;
export async function anyErrorAsync(
	producer: () => unknown,
	options: EvaluatorOptions = {},
): Promise<Result<unknown, Error>> {
	const settings = resolveSettings(options);
	try {
		const produced: unknown = await producer();
		if (isAsyncGenerator(produced) || isGenerator(produced)) {
			return await driveAsync(produced, settings);
		}
		return direct(produced);
	} catch (e) {
		return contain(e, settings);
	}
}

/**
 * Yield a Result as a checkpoint and hand back its value once the evaluator resumes.
 *
 * Use with `yield*` inside a producer: `const file = yield* take(await openFile(path))`.
 */
export function* take<T, E extends Error>(result: Result<T, E>): Generator<Result<T, E>, T, unknown> {
	yield result;
	if (result.ok) return result.value;
	throw new StepResumedError(result.error);
}
