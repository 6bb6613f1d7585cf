/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas can be built from the same import path.
 */

import { z } from "zod";
import { DomainError } from "../../shared/errors.js";
import { error, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Structured error containing one or more validation issues. */
export class ValidationError extends DomainError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toString(): string {
		const details = this.issues
			.map((i) => `${i.path.length > 0 ? i.path.join(".") : "<root>"}: ${i.message}`)
			.join("; ");
		return `${super.toString()} (${details})`;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return error(new ValidationError("Validation failed", issues));
}
