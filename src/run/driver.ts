/**
 * Driver loop: draws T samples, feeds each to the estimator, and records
 * ‖θ* − θ_t‖₂ after every update.
 *
 * A plain bounded loop: no suspension points, one update per iteration in a
 * single total order. Failures are caught at this boundary and returned as
 * the error variant of a Result; a failed run yields no partial trace.
 */
import type { SampleSource } from "../data/sample-source.js";
import type { IncrementalEstimator } from "../estimator/incremental-estimator.js";
import type { VectorLike } from "../linalg/vector.js";
import type { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createSilentLogger } from "../lib/logger/index.js";
import {
	ConfigError,
	type EstimatorError,
	ShapeError,
	classifyError,
} from "../shared/errors.js";
import { type Result, tryCatch } from "../shared/result.js";
import { type TraceSummary, summarizeTrace } from "./metrics.js";

const DEFAULT_PROGRESS_INTERVAL = 1_000;

/** Emitted after every update. */
export interface StepRecord {
	/** 1-based step number t */
	readonly step: number;
	/** Sample index k drawn at this step */
	readonly index: number;
	/** ‖θ* − θ_t‖₂ */
	readonly distance: number;
}

export type RunEvents = {
	step: (record: StepRecord) => void;
	complete: (summary: TraceSummary) => void;
};

interface DriveOptions {
	readonly source: SampleSource;
	/** Mutated in place; holds the final θ once the run returns */
	readonly estimator: IncrementalEstimator;
	/** θ*, used only for the error trace */
	readonly reference: VectorLike;
	readonly logger?: Logger | undefined;
	readonly events?: TypedEmitter<RunEvents> | undefined;
	/** Emit a debug progress line every this many steps */
	readonly progressInterval?: number | undefined;
}

export interface RunOptions extends DriveOptions {
	/** Number of samples T to draw */
	readonly iterations: number;
}

export interface ReplayOptions extends DriveOptions {
	/** Sample indices to apply, in order; T is their count */
	readonly indices: readonly number[];
}

export interface RunResult {
	/** Copy of the final estimate θ_T */
	readonly theta: Float64Array;
	/** E: distance after each update, exactly T entries in call order */
	readonly errorTrace: Float64Array;
	/** Sample index used at each step */
	readonly indices: readonly number[];
	readonly summary: TraceSummary;
}

/**
 * Runs T steps of the incremental proximal method with indices drawn from
 * `source.nextIndex()`.
 *
 * Configuration and shape problems are reported before the first update.
 */
export function runIncrementalProximal(options: RunOptions): Result<RunResult, EstimatorError> {
	const { source } = options;
	return drive(options, options.iterations, () => source.nextIndex());
}

/** Same loop as {@link runIncrementalProximal}, over a fixed index order. */
export function replayIndices(options: ReplayOptions): Result<RunResult, EstimatorError> {
	const { indices } = options;
	let cursor = 0;
	return drive(options, indices.length, () => {
		const k = indices[cursor] ?? Number.NaN;
		cursor++;
		return k;
	});
}

function drive(
	options: DriveOptions,
	iterations: number,
	pickIndex: () => number,
): Result<RunResult, EstimatorError> {
	const { source, estimator, reference, events } = options;
	const log = (options.logger ?? createSilentLogger()).child({ component: "driver" });
	const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
	let step = 0;

	const outcome = tryCatch((): RunResult => {
		if (!Number.isInteger(iterations) || iterations <= 0) {
			throw new ConfigError(`Iteration count must be a positive integer, got ${iterations}`, {
				iterations,
			});
		}
		if (!Number.isInteger(progressInterval) || progressInterval <= 0) {
			throw new ConfigError(
				`progressInterval must be a positive integer, got ${progressInterval}`,
				{ progressInterval },
			);
		}
		if (source.dimension !== estimator.dimension) {
			throw new ShapeError(
				`Sample source has dimension ${source.dimension}, estimator has ${estimator.dimension}`,
				estimator.dimension,
				source.dimension,
				{ operand: "source" },
			);
		}
		const initialDistance = estimator.distanceTo(reference);

		log.info(
			{
				iterations,
				dimension: estimator.dimension,
				samples: source.size,
				lambda: estimator.lambda,
				initialDistance,
			},
			"Run started",
		);

		const errorTrace = new Float64Array(iterations);
		const indices: number[] = [];
		for (step = 1; step <= iterations; step++) {
			const k = pickIndex();
			const sample = source.sampleAt(k);
			estimator.update(sample.x, sample.y);
			const d = estimator.distanceTo(reference);

			errorTrace[step - 1] = d;
			indices.push(k);
			events?.emit("step", { step, index: k, distance: d });
			if (step % progressInterval === 0) {
				log.debug({ step, distance: d }, "Progress");
			}
		}

		const summary = summarizeTrace(errorTrace, initialDistance);
		log.info({ ...summary, theta: estimator.theta }, "Run complete");
		events?.emit("complete", summary);

		return { theta: estimator.theta, errorTrace, indices, summary };
	}, classifyError);

	if (!outcome.ok) {
		const { error } = outcome;
		log.error({ code: error.code, step, context: error.context }, error.message);
	}
	return outcome;
}
