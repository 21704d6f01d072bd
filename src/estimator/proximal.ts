/**
 * Squared-loss proximal sub-problem and its closed-form minimizer.
 *
 *   g(θ) = (y − xᵀθ)² + λ‖θ − θ_prev‖²
 *
 * Setting ∇g = 0 gives (λI + xxᵀ)θ = λθ_prev + yx. The matrix is a rank-one
 * correction of λI, so by Sherman–Morrison the solution is
 *
 *   θ = θ_prev + (y − xᵀθ_prev) / (λ + xᵀx) · x
 *
 * which costs O(d) and needs no inner solver.
 */
import {
	type VectorLike,
	assertDimension,
	axpy,
	dot,
	isFiniteVector,
	squaredNorm,
	toVector,
} from "../linalg/vector.js";
import { ConfigError, InvariantError } from "../shared/errors.js";

/**
 * @throws ConfigError unless λ is a positive finite number
 */
export function assertLambda(lambda: number): void {
	if (!Number.isFinite(lambda) || lambda <= 0) {
		throw new ConfigError(`lambda must be a positive finite number, got ${lambda}`, { lambda });
	}
}

/**
 * Step coefficient r / s for the closed-form update, where r = y − xᵀθ_prev
 * and s = λ + xᵀx. Both are read from `prev` before anything is written.
 *
 * @throws ShapeError if `x` and `prev` differ in length
 * @throws InvariantError if s is not a positive finite number, or r or r / s is not finite
 */
export function stepCoefficient(prev: VectorLike, x: VectorLike, y: number, lambda: number): number {
	assertDimension(x, prev.length, "x");
	const residual = y - dot(x, prev);
	const normalizer = lambda + squaredNorm(x);

	if (!Number.isFinite(normalizer) || normalizer <= 0) {
		throw new InvariantError(
			`Proximal normalizer must be positive and finite, got ${normalizer}`,
			{ normalizer, lambda },
			"lambda must be positive and the feature vector finite",
		);
	}
	if (!Number.isFinite(residual)) {
		throw new InvariantError(`Residual is not finite: ${residual}`, { residual, y });
	}
	const coefficient = residual / normalizer;
	if (!Number.isFinite(coefficient)) {
		throw new InvariantError(
			`Step coefficient overflowed: ${residual} / ${normalizer}`,
			{ residual, normalizer, lambda },
			"lambda is too small for the scale of this sample",
		);
	}
	return coefficient;
}

/**
 * Exact minimizer of g for the given previous estimate, as a fresh vector.
 * `prev` is not modified.
 *
 * @throws InvariantError if any component of the result is not finite
 */
export function proximalStep(
	prev: VectorLike,
	x: VectorLike,
	y: number,
	lambda: number,
): Float64Array {
	assertLambda(lambda);
	const coefficient = stepCoefficient(prev, x, y, lambda);
	const next = toVector(prev);
	axpy(coefficient, x, next);
	if (!isFiniteVector(next)) {
		throw new InvariantError("Proximal step produced a non-finite estimate", {
			coefficient,
			lambda,
		});
	}
	return next;
}

/** g(θ) = (y − xᵀθ)² + λ‖θ − θ_prev‖² */
export function proximalObjective(
	theta: VectorLike,
	prev: VectorLike,
	x: VectorLike,
	y: number,
	lambda: number,
): number {
	assertDimension(prev, theta.length, "prev");
	const residual = y - dot(x, theta);
	let penalty = 0;
	for (let i = 0; i < theta.length; i++) {
		const diff = (theta[i] ?? 0) - (prev[i] ?? 0);
		penalty += diff * diff;
	}
	return residual * residual + lambda * penalty;
}

/** ∇g(θ) = −2(y − xᵀθ)x + 2λ(θ − θ_prev) */
export function proximalGradient(
	theta: VectorLike,
	prev: VectorLike,
	x: VectorLike,
	y: number,
	lambda: number,
): Float64Array {
	assertDimension(prev, theta.length, "prev");
	const residual = y - dot(x, theta);
	const gradient = new Float64Array(theta.length);
	for (let i = 0; i < theta.length; i++) {
		gradient[i] = -2 * residual * (x[i] ?? 0) + 2 * lambda * ((theta[i] ?? 0) - (prev[i] ?? 0));
	}
	return gradient;
}
