/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Numeric vectors in logged objects are summarized before they reach pino,
 * so logging an estimate of dimension 10 000 writes a length and a short head
 * instead of every coordinate. Path-based redaction is still available for
 * anything else a caller wants kept out of the output.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log levels accepted by the run config, from least to most severe. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface; the object form carries fields, the string is the message. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Vector summarization ────────────────────────────────────────────

/** Vectors up to this length are logged in full. */
export const MAX_INLINE_VECTOR = 8;
const SUMMARY_HEAD = 4;

/** Shape a long vector takes in log output. */
export interface VectorSummary {
	readonly length: number;
	readonly head: readonly number[];
}

function isNumericVector(value: unknown): value is ArrayLike<number> {
	if (value instanceof Float64Array || value instanceof Float32Array) return true;
	return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function summarizeVector(vector: ArrayLike<number>): readonly number[] | VectorSummary {
	if (vector.length <= MAX_INLINE_VECTOR) return Array.from(vector);
	return {
		length: vector.length,
		head: Array.from({ length: SUMMARY_HEAD }, (_, i) => vector[i] ?? Number.NaN),
	};
}

/**
 * Replaces numeric vectors at the top level of a log object: typed arrays
 * become plain arrays, vectors longer than {@link MAX_INLINE_VECTOR} become a
 * {@link VectorSummary}. Other values pass through untouched.
 */
export function summarizeVectors(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isNumericVector(value) ? summarizeVector(value) : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function forward(pinoLogger: pino.Logger, method: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[method](String(msgOrObj ?? ""));
		return;
	}
	if (typeof msgOrObj === "object") {
		pinoLogger[method](summarizeVectors({ ...msgOrObj }), msg ?? "");
		return;
	}
	pinoLogger[method]({ value: msgOrObj }, msg ?? "");
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with vector summarization and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ step: 100, distance: 0.42 }, "Progress");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const target = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				target.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** A logger that drops everything; the default when a caller passes none. */
export function createSilentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
