/**
 * Error-trace metrics: pure functions over the per-step distances ‖θ* − θ_t‖₂.
 *
 * Steps are numbered from 1: `trace[t - 1]` is the distance after update t.
 */
import type { VectorLike } from "../linalg/vector.js";
import { ConfigError } from "../shared/errors.js";

export interface TraceSummary {
	readonly steps: number;
	/** Distance before the first update */
	readonly initialDistance: number;
	readonly finalDistance: number;
	readonly minDistance: number;
	/** Step at which `minDistance` was first reached */
	readonly minStep: number;
	/** finalDistance / initialDistance; 0 when the run started at the reference */
	readonly improvementRatio: number;
}

/** A single point of a (possibly downsampled) trace, for plotting layers. */
export interface TracePoint {
	readonly step: number;
	readonly distance: number;
}

/**
 * @throws ConfigError for an empty trace
 */
export function summarizeTrace(trace: VectorLike, initialDistance: number): TraceSummary {
	if (trace.length === 0) {
		throw new ConfigError("Cannot summarize an empty trace");
	}

	let minDistance = Number.POSITIVE_INFINITY;
	let minStep = 0;
	for (let i = 0; i < trace.length; i++) {
		const d = trace[i] ?? Number.POSITIVE_INFINITY;
		if (d < minDistance) {
			minDistance = d;
			minStep = i + 1;
		}
	}

	const finalDistance = trace[trace.length - 1] ?? Number.NaN;
	return {
		steps: trace.length,
		initialDistance,
		finalDistance,
		minDistance,
		minStep,
		improvementRatio: initialDistance > 0 ? finalDistance / initialDistance : 0,
	};
}

/**
 * Picks at most `maxPoints` evenly spaced points from the trace. The first
 * and last steps are always kept when `maxPoints >= 2`; with `maxPoints = 1`
 * only the last step is returned.
 *
 * @throws ConfigError unless `maxPoints` is a positive integer
 */
export function downsampleTrace(trace: VectorLike, maxPoints: number): TracePoint[] {
	if (!Number.isInteger(maxPoints) || maxPoints <= 0) {
		throw new ConfigError(`maxPoints must be a positive integer, got ${maxPoints}`, { maxPoints });
	}

	const n = trace.length;
	const point = (i: number): TracePoint => ({ step: i + 1, distance: trace[i] ?? Number.NaN });

	if (n === 0) return [];
	if (maxPoints >= n) return Array.from({ length: n }, (_, i) => point(i));
	if (maxPoints === 1) return [point(n - 1)];

	const points: TracePoint[] = [];
	for (let j = 0; j < maxPoints; j++) {
		points.push(point(Math.round((j * (n - 1)) / (maxPoints - 1))));
	}
	return points;
}
