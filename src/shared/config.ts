/**
 * Run configuration for the incremental proximal driver.
 *
 * Values resolve in three layers: built-in defaults, then `IPM_*` environment
 * variables, then explicit overrides. The merged config is validated once;
 * a run never starts with λ ≤ 0 or a non-positive iteration count.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { MAX_SEED } from "../lib/random/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface RunConfig {
	/** Proximal regularization strength λ; pulls each estimate toward the previous one */
	readonly lambda: number;
	/** Number of samples drawn (T) */
	readonly iterations: number;
	/** Seed for the sampling and data generators */
	readonly seed: number;
	/** Minimum level written by the run logger */
	readonly logLevel: LogLevel;
}

export const DEFAULT_RUN_CONFIG: RunConfig = {
	lambda: 1,
	iterations: 10_000,
	seed: 42,
	logLevel: "info",
};

const runConfigSchema = z.object({
	lambda: z.number().finite().positive(),
	iterations: z.number().int().positive(),
	seed: z.number().int().nonnegative().max(MAX_SEED),
	logLevel: z.enum(LOG_LEVELS),
});

/** Mutable builder shape for collecting env overrides before freezing them into Partial<RunConfig>. */
interface MutableRunConfig {
	lambda?: number;
	iterations?: number;
	seed?: number;
	logLevel?: LogLevel;
}

/**
 * Reads run config values from environment variables.
 * Supported: IPM_LAMBDA, IPM_ITERATIONS, IPM_SEED, IPM_LOG_LEVEL.
 * @throws ConfigError if a variable is set to an invalid value
 */
export function configFromEnv(): Partial<RunConfig> {
	const result: MutableRunConfig = {};

	const lambda = parsePositiveNumberEnv("IPM_LAMBDA");
	if (lambda !== undefined) result.lambda = lambda;

	const iterations = parseIntEnv("IPM_ITERATIONS", 1);
	if (iterations !== undefined) result.iterations = iterations;

	const seed = parseIntEnv("IPM_SEED", 0);
	if (seed !== undefined) result.seed = seed;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = process.env["IPM_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid IPM_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	return result;
}

/**
 * Merges defaults, environment and overrides, then validates the result.
 * @throws ConfigError listing every invalid field
 */
export function resolveRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
	const merged = { ...DEFAULT_RUN_CONFIG, ...configFromEnv(), ...overrides };
	const result = validate(runConfigSchema, merged);
	if (!result.ok) {
		const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
		throw new ConfigError(`Invalid run configuration: ${fields}`, {
			issues: result.error.issues,
			cause: result.error,
		});
	}
	return result.value;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(envKey: string, min: number): number | undefined {
	const raw = process.env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		const kind = min > 0 ? "a positive integer" : "a non-negative integer";
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be ${kind}`);
	}
	return parsed;
}

function parsePositiveNumberEnv(envKey: string): number | undefined {
	const raw = process.env[envKey];
	if (!raw) return undefined;
	const parsed = raw.trim() === "" ? Number.NaN : Number(raw);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive number`);
	}
	return parsed;
}
