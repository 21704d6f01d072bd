/**
 * Dense vector kernels over Float64Array.
 *
 * Inputs are typed `ArrayLike<number>` so plain arrays, typed arrays and the
 * read-only column views handed out by {@link DenseMatrix} all fit. Every
 * binary kernel checks lengths and throws ShapeError on mismatch.
 */
import { ShapeError } from "../shared/errors.js";

/** Read-only view of a dense vector. */
export type VectorLike = ArrayLike<number>;

/** Copy any vector-like input into a fresh Float64Array. */
export function toVector(values: VectorLike): Float64Array {
	return Float64Array.from(values);
}

/**
 * Throws ShapeError unless `v` has exactly `expected` components.
 * @param label names the operand in the error message
 */
export function assertDimension(v: VectorLike, expected: number, label: string): void {
	if (v.length !== expected) {
		throw new ShapeError(
			`${label} has dimension ${v.length}, expected ${expected}`,
			expected,
			v.length,
			{ operand: label },
		);
	}
}

/** Inner product aᵀb. */
export function dot(a: VectorLike, b: VectorLike): number {
	assertDimension(b, a.length, "right operand");
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += (a[i] ?? 0) * (b[i] ?? 0);
	}
	return sum;
}

/** ‖a‖₂² */
export function squaredNorm(a: VectorLike): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const v = a[i] ?? 0;
		sum += v * v;
	}
	return sum;
}

/** ‖a‖₂ */
export function norm(a: VectorLike): number {
	return Math.sqrt(squaredNorm(a));
}

/** Euclidean distance ‖a − b‖₂. */
export function distance(a: VectorLike, b: VectorLike): number {
	assertDimension(b, a.length, "right operand");
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		sum += diff * diff;
	}
	return Math.sqrt(sum);
}

/** In place y ← y + αx. */
export function axpy(alpha: number, x: VectorLike, y: Float64Array): void {
	assertDimension(x, y.length, "x");
	for (let i = 0; i < y.length; i++) {
		y[i] = (y[i] ?? 0) + alpha * (x[i] ?? 0);
	}
}

/** True when every component is a finite number. */
export function isFiniteVector(v: VectorLike): boolean {
	for (let i = 0; i < v.length; i++) {
		if (!Number.isFinite(v[i])) return false;
	}
	return true;
}
