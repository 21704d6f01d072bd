/**
 * Synthetic linear-Gaussian regression data.
 *
 * x_k ~ N(0, I_d), y_k ~ N(x_kᵀθ*, σ²). Everything derives from one seed, so
 * the same config always yields the same dataset and ground truth.
 */
import { DenseMatrix } from "../linalg/matrix.js";
import { dot } from "../linalg/vector.js";
import { SeededRandom, type UniformSource, gaussianSampler } from "../lib/random/index.js";
import { ConfigError } from "../shared/errors.js";
import { Dataset } from "./dataset.js";

export interface LinearDatasetConfig {
	/** Feature dimension d */
	readonly dimension: number;
	/** Number of samples n */
	readonly size: number;
	/** Standard deviation σ of the label noise */
	readonly noiseStdDev: number;
	readonly seed: number;
	/** Ground-truth parameter; drawn uniformly from [-1, 1]^d when omitted */
	readonly trueTheta?: readonly number[] | undefined;
}

export interface LinearDataset {
	readonly dataset: Dataset;
	readonly trueTheta: Float64Array;
}

/**
 * Draws a vector uniformly from [-bound, bound]^dimension.
 * Used for both the hidden θ* and bounded random initial estimates.
 */
export function randomTheta(dimension: number, uniform: UniformSource, bound = 1): Float64Array {
	if (!Number.isInteger(dimension) || dimension <= 0) {
		throw new ConfigError(`Dimension must be a positive integer, got ${dimension}`, { dimension });
	}
	if (!Number.isFinite(bound) || bound <= 0) {
		throw new ConfigError(`Bound must be a positive finite number, got ${bound}`, { bound });
	}
	const theta = new Float64Array(dimension);
	for (let i = 0; i < dimension; i++) {
		theta[i] = (2 * uniform.next() - 1) * bound;
	}
	return theta;
}

/**
 * @throws ConfigError for a non-positive dimension or size, a negative noise level,
 *   or a `trueTheta` of the wrong length
 */
export function generateLinearDataset(config: LinearDatasetConfig): LinearDataset {
	const { dimension, size, noiseStdDev, seed } = config;
	if (!Number.isInteger(dimension) || dimension <= 0) {
		throw new ConfigError(`Dimension must be a positive integer, got ${dimension}`, { dimension });
	}
	if (!Number.isInteger(size) || size <= 0) {
		throw new ConfigError(`Dataset size must be a positive integer, got ${size}`, { size });
	}
	if (!Number.isFinite(noiseStdDev) || noiseStdDev < 0) {
		throw new ConfigError(`Noise standard deviation must be non-negative, got ${noiseStdDev}`, {
			noiseStdDev,
		});
	}

	const uniform = SeededRandom.create(seed);
	const gaussian = gaussianSampler(uniform);

	let trueTheta: Float64Array;
	if (config.trueTheta !== undefined) {
		if (config.trueTheta.length !== dimension) {
			throw new ConfigError(
				`trueTheta has ${config.trueTheta.length} components, expected ${dimension}`,
				{ dimension, actual: config.trueTheta.length },
			);
		}
		trueTheta = Float64Array.from(config.trueTheta);
	} else {
		trueTheta = randomTheta(dimension, uniform);
	}

	const columns: Float64Array[] = [];
	const labels = new Float64Array(size);
	for (let k = 0; k < size; k++) {
		const x = new Float64Array(dimension);
		for (let i = 0; i < dimension; i++) {
			x[i] = gaussian.nextGaussian(0, 1);
		}
		columns.push(x);
		labels[k] = gaussian.nextGaussian(dot(x, trueTheta), noiseStdDev);
	}

	return { dataset: Dataset.create(DenseMatrix.fromColumns(columns), labels), trueTheta };
}
