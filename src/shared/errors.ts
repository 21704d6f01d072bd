/**
 * EstimatorError hierarchy: structured error classification.
 *
 * Every failure in this package is a caller contract violation or a broken
 * invariant, so nothing is retryable. Schema rejections of raw input
 * (`ValidationError`) are non-retryable: the caller gets a value back and can
 * fix the input. Everything else is fatal, including `ConfigError`, because a
 * bad shape, parameter or index means the run cannot start or continue.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing EstimatorError subclasses with optional cause chain. */
interface EstimatorErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for every failure raised by the estimator, sampler or driver. */
export class EstimatorError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "EstimatorError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Dimension mismatch between θ, a feature vector, or the reference parameter. */
export class ShapeError extends EstimatorError {
	readonly expected: number;
	readonly actual: number;

	constructor(
		message: string,
		expected: number,
		actual: number,
		context: Record<string, unknown> & EstimatorErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "SHAPE_MISMATCH", ErrorCategory.Fatal, { ...rest, expected, actual });
		this.name = "ShapeError";
		this.expected = expected;
		this.actual = actual;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid run configuration: λ ≤ 0, empty dataset, non-positive iteration count, bad env values. */
export class ConfigError extends EstimatorError {
	constructor(message: string, context: Record<string, unknown> & EstimatorErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A sample index outside `[0, n)`, either requested or produced by a broken sampler. */
export class IndexOutOfRangeError extends EstimatorError {
	readonly index: number;
	readonly size: number;

	constructor(
		message: string,
		index: number,
		size: number,
		context: Record<string, unknown> & EstimatorErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "INDEX_OUT_OF_RANGE", ErrorCategory.Fatal, { ...rest, index, size });
		this.name = "IndexOutOfRangeError";
		this.index = index;
		this.size = size;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Internal numeric invariant broken, e.g. a non-positive or non-finite normalizer. */
export class InvariantError extends EstimatorError {
	constructor(
		message: string,
		context: Record<string, unknown> & EstimatorErrorOptions = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message, "INVARIANT_VIOLATION", ErrorCategory.Fatal, rest, hint);
		this.name = "InvariantError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends EstimatorError {
	constructor(message: string, context: Record<string, unknown> & EstimatorErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Pass package errors through unchanged and wrap anything else in a SystemError. */
export function classifyError(error: unknown): EstimatorError {
	if (error instanceof EstimatorError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ShapeError. */
export function isShapeError(e: unknown): e is ShapeError {
	return e instanceof ShapeError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for IndexOutOfRangeError. */
export function isIndexOutOfRangeError(e: unknown): e is IndexOutOfRangeError {
	return e instanceof IndexOutOfRangeError;
}

/** Type guard for InvariantError. */
export function isInvariantError(e: unknown): e is InvariantError {
	return e instanceof InvariantError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
