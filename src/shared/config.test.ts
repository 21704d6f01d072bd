import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_RUN_CONFIG, configFromEnv, resolveRunConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("RunConfig", () => {
	beforeEach(() => {
		for (const key of Object.keys(process.env).filter((k) => k.startsWith("IPM_"))) {
			Reflect.deleteProperty(process.env, key);
		}
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	describe("DEFAULT_RUN_CONFIG", () => {
		it("has the documented defaults", () => {
			expect(DEFAULT_RUN_CONFIG).toEqual({
				lambda: 1,
				iterations: 10_000,
				seed: 42,
				logLevel: "info",
			});
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when no IPM_ variables are set", () => {
			expect(configFromEnv()).toEqual({});
		});

		it("reads every supported variable", () => {
			vi.stubEnv("IPM_LAMBDA", "0.25");
			vi.stubEnv("IPM_ITERATIONS", "500");
			vi.stubEnv("IPM_SEED", "0");
			vi.stubEnv("IPM_LOG_LEVEL", "debug");

			expect(configFromEnv()).toEqual({
				lambda: 0.25,
				iterations: 500,
				seed: 0,
				logLevel: "debug",
			});
		});

		it.each([
			["IPM_LAMBDA", "0"],
			["IPM_LAMBDA", "-1"],
			["IPM_LAMBDA", "abc"],
			["IPM_LAMBDA", "Infinity"],
			["IPM_ITERATIONS", "0"],
			["IPM_ITERATIONS", "12.5"],
			["IPM_ITERATIONS", "10abc"],
			["IPM_SEED", "-3"],
			["IPM_LOG_LEVEL", "verbose"],
		])("rejects %s=%s", (key, value) => {
			vi.stubEnv(key, value);
			expect(() => configFromEnv()).toThrow(ConfigError);
		});

		it("names the variable in the error message", () => {
			vi.stubEnv("IPM_ITERATIONS", "-5");
			expect(() => configFromEnv()).toThrow('Invalid IPM_ITERATIONS: "-5" must be a positive integer');
		});
	});

	describe("resolveRunConfig", () => {
		it("returns the defaults when nothing is overridden", () => {
			expect(resolveRunConfig()).toEqual(DEFAULT_RUN_CONFIG);
		});

		it("applies env on top of defaults and overrides on top of env", () => {
			vi.stubEnv("IPM_LAMBDA", "2");
			vi.stubEnv("IPM_SEED", "7");

			const config = resolveRunConfig({ seed: 9 });
			expect(config).toEqual({ lambda: 2, iterations: 10_000, seed: 9, logLevel: "info" });
		});

		it("rejects a seed the 32-bit generator cannot represent", () => {
			expect(() => resolveRunConfig({ seed: 2 ** 32 })).toThrow("Invalid run configuration: seed");
			expect(resolveRunConfig({ seed: 2 ** 32 - 1 }).seed).toBe(2 ** 32 - 1);
		});

		it("rejects a non-positive lambda override", () => {
			expect(() => resolveRunConfig({ lambda: 0 })).toThrow(ConfigError);
		});

		it("lists every invalid field", () => {
			expect(() => resolveRunConfig({ lambda: -1, iterations: 0 })).toThrow(
				"Invalid run configuration: lambda, iterations",
			);
		});

		it("rejects a fractional iteration count", () => {
			expect(() => resolveRunConfig({ iterations: 2.5 })).toThrow(ConfigError);
		});
	});
});
