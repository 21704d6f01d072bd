/**
 * SampleSource: uniform, with-replacement access to a fixed dataset.
 *
 * Holds nothing beyond the immutable dataset and the sampler it was given.
 * Indices may repeat and some rows may never be drawn over a finite run.
 */
import type { VectorLike } from "../linalg/vector.js";
import type { IntegerSampler } from "../lib/random/index.js";
import { IndexOutOfRangeError } from "../shared/errors.js";
import type { Dataset } from "./dataset.js";

/** One labeled sample (x_k, y_k); `x` is a read-only view into the dataset. */
export interface Sample {
	readonly index: number;
	readonly x: VectorLike;
	readonly y: number;
}

export class SampleSource {
	private readonly _dataset: Dataset;
	private readonly _sampler: IntegerSampler;

	private constructor(dataset: Dataset, sampler: IntegerSampler) {
		this._dataset = dataset;
		this._sampler = sampler;
	}

	static create(dataset: Dataset, sampler: IntegerSampler): SampleSource {
		return new SampleSource(dataset, sampler);
	}

	/** Number of rows available (n). */
	get size(): number {
		return this._dataset.size;
	}

	/** Feature dimension (d). */
	get dimension(): number {
		return this._dataset.dimension;
	}

	/**
	 * Draws an index uniformly from [0, n), independently of earlier draws.
	 * @throws IndexOutOfRangeError if the sampler yields anything outside [0, n)
	 */
	nextIndex(): number {
		const k = this._sampler.nextInt(this.size);
		this.checkIndex(k, "Sampler produced");
		return k;
	}

	/**
	 * Pure lookup of x_k and y_k.
	 * @throws IndexOutOfRangeError if `k` is not an integer in [0, n)
	 */
	sampleAt(k: number): Sample {
		this.checkIndex(k, "Requested");
		return { index: k, x: this._dataset.features(k), y: this._dataset.label(k) };
	}

	private checkIndex(k: number, origin: string): void {
		if (!Number.isInteger(k) || k < 0 || k >= this.size) {
			throw new IndexOutOfRangeError(
				`${origin} sample index ${k} outside [0, ${this.size})`,
				k,
				this.size,
			);
		}
	}
}
