/**
 * Incremental proximal estimator for linear least squares.
 *
 * Owns θ and applies one exact proximal step per sample:
 *
 *   θ ← θ + (y − xᵀθ) / (λ + xᵀx) · x
 *
 * Each step is O(d). There is no inner optimization loop and no state beyond
 * θ, λ and a step counter; the estimator is always ready for the next sample.
 */
import { type VectorLike, assertDimension, distance, dot, isFiniteVector } from "../linalg/vector.js";
import { ConfigError } from "../shared/errors.js";
import { assertLambda, proximalStep } from "./proximal.js";

export interface EstimatorConfig {
	/** Proximal regularization strength λ > 0 */
	readonly lambda: number;
	/** Starting estimate θ₀; its length fixes the dimension d */
	readonly initialTheta: VectorLike;
}

export class IncrementalEstimator {
	private readonly _theta: Float64Array;
	private readonly _lambda: number;
	private _steps = 0;

	private constructor(theta: Float64Array, lambda: number) {
		this._theta = theta;
		this._lambda = lambda;
	}

	/**
	 * @throws ConfigError if λ is not positive and finite, or `initialTheta` is
	 *   empty or holds a non-finite value
	 */
	static create(config: EstimatorConfig): IncrementalEstimator {
		assertLambda(config.lambda);
		if (config.initialTheta.length === 0) {
			throw new ConfigError("initialTheta must have at least one component");
		}
		if (!isFiniteVector(config.initialTheta)) {
			throw new ConfigError("initialTheta must contain only finite values");
		}
		return new IncrementalEstimator(Float64Array.from(config.initialTheta), config.lambda);
	}

	/**
	 * Applies one proximal step for the sample (x, y).
	 *
	 * The next estimate is built from the current θ in a scratch vector and
	 * checked before it is copied in, so a throwing call leaves θ as it was.
	 *
	 * @throws ShapeError if `x` does not have d components
	 * @throws InvariantError if the step would produce a non-finite estimate
	 */
	update(x: VectorLike, y: number): void {
		this._theta.set(proximalStep(this._theta, x, y, this._lambda));
		this._steps++;
	}

	/**
	 * ‖reference − θ‖₂. Read-only; used for monitoring, never by `update`.
	 * @throws ShapeError if `reference` does not have d components
	 */
	distanceTo(reference: VectorLike): number {
		assertDimension(reference, this._theta.length, "reference");
		return distance(reference, this._theta);
	}

	/** xᵀθ */
	predict(x: VectorLike): number {
		assertDimension(x, this._theta.length, "x");
		return dot(x, this._theta);
	}

	/** y − xᵀθ for the current θ. */
	residual(x: VectorLike, y: number): number {
		return y - this.predict(x);
	}

	/** Copy of the current estimate. */
	get theta(): Float64Array {
		return Float64Array.from(this._theta);
	}

	get dimension(): number {
		return this._theta.length;
	}

	get lambda(): number {
		return this._lambda;
	}

	/** Number of updates applied since construction. */
	get stepCount(): number {
		return this._steps;
	}
}
