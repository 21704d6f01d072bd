/**
 * Immutable labeled dataset: a `d × n` feature matrix X and a length-n label vector y.
 */
import { DenseMatrix } from "../linalg/matrix.js";
import type { VectorLike } from "../linalg/vector.js";
import { validate, vectorSchema, z } from "../lib/validation/index.js";
import { type EstimatorError, IndexOutOfRangeError, ShapeError, classifyError } from "../shared/errors.js";
import { type Result, tryCatch } from "../shared/result.js";

/** Raw dataset as plain arrays: `features[i][k]` is feature i of sample k. */
export interface RawDataset {
	readonly features: readonly (readonly number[])[];
	readonly labels: readonly number[];
}

const rawDatasetSchema = z.object({
	features: z.array(vectorSchema).nonempty(),
	labels: vectorSchema,
});

export class Dataset {
	private readonly _features: DenseMatrix;
	private readonly _labels: Float64Array;

	private constructor(features: DenseMatrix, labels: Float64Array) {
		this._features = features;
		this._labels = labels;
	}

	/**
	 * @throws ShapeError if `labels` does not have one entry per column of `features`
	 */
	static create(features: DenseMatrix, labels: VectorLike): Dataset {
		if (labels.length !== features.cols) {
			throw new ShapeError(
				`Dataset has ${features.cols} samples but ${labels.length} labels`,
				features.cols,
				labels.length,
				{ operand: "labels" },
			);
		}
		return new Dataset(features, Float64Array.from(labels));
	}

	/** Number of features per sample (d). */
	get dimension(): number {
		return this._features.rows;
	}

	/** Number of samples (n). */
	get size(): number {
		return this._features.cols;
	}

	/** Read-only view of feature vector x_k. */
	features(k: number): VectorLike {
		return this._features.column(k);
	}

	/** Label y_k. */
	label(k: number): number {
		const value = this._labels[k];
		if (!Number.isInteger(k) || value === undefined) {
			throw new IndexOutOfRangeError(`Label index ${k} outside [0, ${this.size})`, k, this.size);
		}
		return value;
	}
}

/**
 * Validates raw arrays (finite numbers, non-empty, rectangular) and builds a Dataset.
 * Schema failures come back as ValidationError, shape failures as ShapeError.
 */
export function parseDataset(input: unknown): Result<Dataset, EstimatorError> {
	const parsed = validate(rawDatasetSchema, input);
	if (!parsed.ok) return parsed;

	return tryCatch(
		() => Dataset.create(DenseMatrix.fromRows(parsed.value.features), parsed.value.labels),
		classifyError,
	);
}
