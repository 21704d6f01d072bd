import { describe, expect, it } from "vitest";
import { ShapeError } from "../shared/errors.js";
import {
	assertDimension,
	axpy,
	distance,
	dot,
	isFiniteVector,
	norm,
	squaredNorm,
	toVector,
} from "./vector.js";

describe("vector kernels", () => {
	it("toVector copies into a Float64Array", () => {
		const source = [1, 2, 3];
		const v = toVector(source);
		v[0] = 10;
		expect(v).toBeInstanceOf(Float64Array);
		expect(Array.from(v)).toEqual([10, 2, 3]);
		expect(source).toEqual([1, 2, 3]);
	});

	it("dot computes the inner product", () => {
		expect(dot([1, 2, 3], [4, -5, 6])).toBe(12);
		expect(dot(Float64Array.from([0.5]), [4])).toBe(2);
	});

	it("squaredNorm and norm", () => {
		expect(squaredNorm([3, 4])).toBe(25);
		expect(norm([3, 4])).toBe(5);
		expect(norm([])).toBe(0);
	});

	it("distance is the Euclidean norm of the difference", () => {
		expect(distance([1, 1], [4, 5])).toBe(5);
		expect(distance([2, -1], [2, -1])).toBe(0);
	});

	it("axpy updates y in place", () => {
		const y = Float64Array.from([1, 1, 1]);
		axpy(2, [1, 0, -1], y);
		expect(Array.from(y)).toEqual([3, 1, -1]);
	});

	it("isFiniteVector rejects NaN and infinities", () => {
		expect(isFiniteVector([0, -1.5, 1e300])).toBe(true);
		expect(isFiniteVector([0, Number.NaN])).toBe(false);
		expect(isFiniteVector([Number.NEGATIVE_INFINITY])).toBe(false);
	});

	describe("shape checks", () => {
		it("assertDimension names the operand", () => {
			expect(() => assertDimension([1, 2], 3, "x")).toThrow("x has dimension 2, expected 3");
		});

		it("binary kernels throw ShapeError on mismatched lengths", () => {
			expect(() => dot([1, 2], [1])).toThrow(ShapeError);
			expect(() => distance([1], [1, 2])).toThrow(ShapeError);
			expect(() => axpy(1, [1, 2], new Float64Array(3))).toThrow(ShapeError);
		});

		it("axpy leaves y untouched when shapes differ", () => {
			const y = Float64Array.from([1, 2, 3]);
			expect(() => axpy(1, [1, 1], y)).toThrow(ShapeError);
			expect(Array.from(y)).toEqual([1, 2, 3]);
		});
	});
});
