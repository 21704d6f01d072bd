/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Raw caller input (config objects, nested number arrays for a dataset) is
 * checked here before it is copied into typed arrays. `z` is re-exported so
 * the rest of the package builds schemas through this single import path.
 */

import { z } from "zod";
import { ErrorCategory, EstimatorError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends EstimatorError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * The error message names the first failing path, e.g. `features.1.0`.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(describeIssues(issues), issues));
}

function describeIssues(issues: readonly ValidationIssue[]): string {
	const [first] = issues;
	if (first === undefined) return "Validation failed";
	const where = first.path.length > 0 ? first.path.join(".") : "input";
	const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
	return `Validation failed at ${where}: ${first.message}${more}`;
}

/** A finite number; rejects NaN and ±Infinity. */
export const finiteNumber = z.number().finite();

/** A non-empty vector of finite numbers. */
export const vectorSchema = z.array(finiteNumber).nonempty();
