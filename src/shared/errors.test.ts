import { describe, expect, it } from "vitest";
import {
	ConfigError,
	ErrorCategory,
	EstimatorError,
	IndexOutOfRangeError,
	InvariantError,
	ShapeError,
	SystemError,
	classifyError,
	isConfigError,
	isIndexOutOfRangeError,
	isInvariantError,
	isShapeError,
	isSystemError,
} from "./errors.js";

describe("EstimatorError hierarchy", () => {
	describe("codes and categories", () => {
		const cases: Array<[string, EstimatorError, string, ErrorCategory]> = [
			["ShapeError", new ShapeError("bad shape", 3, 2), "SHAPE_MISMATCH", ErrorCategory.Fatal],
			["ConfigError", new ConfigError("bad config"), "CONFIG_ERROR", ErrorCategory.Fatal],
			[
				"IndexOutOfRangeError",
				new IndexOutOfRangeError("bad index", 7, 5),
				"INDEX_OUT_OF_RANGE",
				ErrorCategory.Fatal,
			],
			["InvariantError", new InvariantError("broken"), "INVARIANT_VIOLATION", ErrorCategory.Fatal],
			["SystemError", new SystemError("panic"), "SYSTEM_ERROR", ErrorCategory.Fatal],
		];

		it.each(cases)("%s has code %s", (name, error, code, category) => {
			expect(error.name).toBe(name);
			expect(error.code).toBe(code);
			expect(error.category).toBe(category);
			expect(error.isFatal).toBe(true);
			expect(error).toBeInstanceOf(EstimatorError);
			expect(error).toBeInstanceOf(Error);
		});

		it("non-retryable errors are not fatal", () => {
			const error = new EstimatorError("rejected", "CUSTOM", ErrorCategory.NonRetryable);
			expect(error.isFatal).toBe(false);
		});
	});

	describe("ShapeError", () => {
		it("records expected and actual dimensions in fields and context", () => {
			const error = new ShapeError("x has dimension 2, expected 3", 3, 2, { operand: "x" });
			expect(error.expected).toBe(3);
			expect(error.actual).toBe(2);
			expect(error.context).toEqual({ operand: "x", expected: 3, actual: 2 });
		});
	});

	describe("IndexOutOfRangeError", () => {
		it("records the index and the dataset size", () => {
			const error = new IndexOutOfRangeError("out of range", -1, 4);
			expect(error.index).toBe(-1);
			expect(error.size).toBe(4);
			expect(error.context).toEqual({ index: -1, size: 4 });
		});
	});

	describe("cause chain", () => {
		it("keeps the cause out of context and on the error", () => {
			const root = new Error("root");
			const error = new ConfigError("wrapped", { cause: root, lambda: 0 });
			expect(error.cause).toBe(root);
			expect(error.context).toEqual({ lambda: 0 });
		});

		it("leaves cause undefined when none is given", () => {
			expect(new SystemError("plain").cause).toBeUndefined();
		});
	});

	describe("toJSON", () => {
		it("serializes code, category and context", () => {
			const json = new ConfigError("lambda must be positive", { lambda: -1 }).toJSON();
			expect(json).toEqual({
				name: "ConfigError",
				message: "lambda must be positive",
				code: "CONFIG_ERROR",
				category: "fatal",
				context: { lambda: -1 },
			});
		});

		it("includes the hint only when present", () => {
			const withHint = new InvariantError("s <= 0", {}, "check lambda").toJSON();
			expect(withHint).toMatchObject({ hint: "check lambda" });
			expect("hint" in new InvariantError("s <= 0").toJSON()).toBe(false);
		});
	});

	describe("classifyError", () => {
		it("returns package errors unchanged", () => {
			const error = new ShapeError("mismatch", 2, 3);
			expect(classifyError(error)).toBe(error);
		});

		it("wraps a plain Error in SystemError with the original as cause", () => {
			const original = new TypeError("boom");
			const classified = classifyError(original);
			expect(classified).toBeInstanceOf(SystemError);
			expect(classified.message).toBe("boom");
			expect(classified.cause).toBe(original);
		});

		it("wraps non-Error throwables", () => {
			const classified = classifyError("string failure");
			expect(classified).toBeInstanceOf(SystemError);
			expect(classified.message).toBe("string failure");
		});
	});

	describe("type guards", () => {
		it("each guard accepts only its own class", () => {
			const shape = new ShapeError("s", 1, 2);
			const config = new ConfigError("c");
			const index = new IndexOutOfRangeError("i", 3, 2);
			const invariant = new InvariantError("v");
			const system = new SystemError("x");

			expect(isShapeError(shape)).toBe(true);
			expect(isShapeError(config)).toBe(false);
			expect(isConfigError(config)).toBe(true);
			expect(isConfigError(index)).toBe(false);
			expect(isIndexOutOfRangeError(index)).toBe(true);
			expect(isIndexOutOfRangeError(invariant)).toBe(false);
			expect(isInvariantError(invariant)).toBe(true);
			expect(isInvariantError(system)).toBe(false);
			expect(isSystemError(system)).toBe(true);
			expect(isSystemError(new Error("plain"))).toBe(false);
		});
	});
});
