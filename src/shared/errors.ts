/**
 * DomainError hierarchy — structured error values carried inside Results.
 *
 * Errors here are data, not control flow: they are built, placed in an
 * `Err` and inspected by the caller. Nothing in this module throws.
 */

/** Options for constructing DomainError subclasses with optional cause chain. */
interface DomainErrorOptions {
	readonly cause?: unknown;
}

/** Base class for structured errors: a stable code, a context record and an optional hint. */
export class DomainError extends Error {
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(message: string, code: string, context: Record<string, unknown> = {}, hint?: string) {
		super(message);
		this.name = "DomainError";
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	override toString(): string {
		const base = `${this.name} [${this.code}]: ${this.message}`;
		return this.hint === undefined ? base : `${base} (hint: ${this.hint})`;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A runtime fault caught at an evaluator or tryCatch boundary. */
export class FaultError extends DomainError {
	constructor(message: string, context: Record<string, unknown> & DomainErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "FAULT", rest);
		this.name = "FaultError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A `take` step was resumed after it yielded a failed Result. */
export class StepResumedError extends DomainError {
	constructor(stepError: Error) {
		super(
			`step resumed after failure: ${stepError.message}`,
			"STEP_RESUMED",
			{},
			"drive producers with anyError or anyErrorAsync",
		);
		this.name = "StepResumedError";
		this.cause = stepError;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends DomainError {
	constructor(message: string, context: Record<string, unknown> & DomainErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Conversion ───────────────────────────────────────────────────────

/** Turn a plain message into an Error; Error instances pass through untouched. */
export function toErrorValue(input: string | Error): Error {
	return typeof input === "string" ? new Error(input) : input;
}

/** Normalize anything thrown into an Error. Non-Error throws become a FaultError. */
export function toFault(thrown: unknown): Error {
	if (thrown instanceof Error) return thrown;
	return new FaultError(renderThrown(thrown), { cause: thrown });
}

function renderThrown(thrown: unknown): string {
	try {
		return String(thrown);
	} catch {
		// Null-prototype objects and throwing toString() overrides land here.
		return Object.prototype.toString.call(thrown);
	}
}

/**
 * Human-readable rendering of an error value, honoring `toString()` overrides.
 * A throwing override falls back to `name: message`.
 */
export function describeError(error: Error): string {
	try {
		return error.toString();
	} catch {
		return `${error.name}: ${error.message}`;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for DomainError and its subclasses. */
export function isDomainError(e: unknown): e is DomainError {
	return e instanceof DomainError;
}

/** Type guard for FaultError. */
export function isFaultError(e: unknown): e is FaultError {
	return e instanceof FaultError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
