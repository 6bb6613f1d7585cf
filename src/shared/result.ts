/**
 * Result<T, E> — value-based error propagation.
 *
 * No exceptions across call boundaries. Fallible operations return a Result;
 * callers inspect the explicit `ok` discriminant, never the truthiness of the value.
 * Both branches carry `value` and `error`, with `null` as the empty sentinel.
 */

import { toErrorValue, toFault } from "./errors.js";

/** Success branch: `error` is the `null` "no error" sentinel. */
export interface Ok<T> {
	readonly ok: true;
	readonly value: T;
	readonly error: null;
}

/** Failure branch: `value` is the `null` "no value" sentinel. */
export interface Err<E> {
	readonly ok: false;
	readonly value: null;
	readonly error: E;
}

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E extends Error = Error> = Ok<T> | Err<E>;

/** Result of {@link unwrap}: the value and the error, exactly one of them non-null. */
export type Unwrapped<T, E> = readonly [value: T, error: null] | readonly [value: null, error: E];

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result. With no argument the value is `true`. */
export function ok(): Result<true, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok<T>(...args: [] | [value: T]): Result<T | true, never> {
	const result: Ok<T | true> = { ok: true, value: args.length === 0 ? true : args[0], error: null };
	return Object.freeze(result);
}

/** Create a failed Result. A plain message is wrapped into an `Error` first. */
export function error(message: string): Result<never, Error>;
export function error<E extends Error>(error: E): Result<never, E>;
export function error<E extends Error>(input: string | E): Result<never, E | Error> {
	const result: Err<E | Error> = { ok: false, value: null, error: toErrorValue(input) };
	return Object.freeze(result);
}

// ── Guards ───────────────────────────────────────────────────────────

/** Type guard: narrows a Result to its success variant. */
export function isOk<T, E extends Error>(result: Result<T, E>): result is Ok<T> {
	return result.ok;
}

/** Type guard: narrows a Result to its error variant. */
export function isErr<T, E extends Error>(result: Result<T, E>): result is Err<E> {
	return !result.ok;
}

/** Runtime check for a Result-shaped value of unknown origin. */
export function isResult(value: unknown): value is Result<unknown, Error> {
	if (typeof value !== "object" || value === null) return false;
	if (!("ok" in value && "value" in value && "error" in value)) return false;
	if (value.ok === true) return value.error === null;
	if (value.ok === false) return value.value === null && value.error instanceof Error;
	return false;
}

// ── Unwrap ───────────────────────────────────────────────────────────

/**
 * Split a Result into `[value, error]`. Never throws.
 *
 * @example
 * ```ts
 * const [file, e] = unwrap(await openFile("notes.txt"));
 * if (e !== null) return error(e);
 * ```
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): Unwrapped<T, E> {
	return result.ok ? [result.value, null] : [null, result.error];
}

/** Extract the success value or return the provided fallback on error. */
export function unwrapOr<T, E extends Error>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error;
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E extends Error>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Transform the error value of a Result, leaving successes untouched. */
export function mapErr<T, E extends Error, F extends Error>(
	result: Result<T, E>,
	fn: (error: E) => F,
): Result<T, F> {
	return result.ok ? result : error(fn(result.error));
}

/** Chain a fallible operation on the success value; short-circuits on error. */
export function flatMap<T, U, E extends Error, F extends Error = E>(
	result: Result<T, E>,
	fn: (value: T) => Result<U, F>,
): Result<U, E | F> {
	return result.ok ? fn(result.value) : result;
}

/** Fold both branches of a Result into a single value. */
export function match<T, E extends Error, U>(
	result: Result<T, E>,
	arms: { readonly ok: (value: T) => U; readonly error: (error: E) => U },
): U {
	return result.ok ? arms.ok(result.value) : arms.error(result.error);
}

// ── Try wrapper for boundary code ────────────────────────────────────

/** Wrap a synchronous function call in a Result, catching any thrown errors. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
	try {
		return ok(fn());
	} catch (e) {
		return error(toFault(e));
	}
}

/** Wrap an async function call in a Result, catching any thrown errors. */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
	try {
		return ok(await fn());
	} catch (e) {
		return error(toFault(e));
	}
}
