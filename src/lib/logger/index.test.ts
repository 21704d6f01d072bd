import { describe, expect, it } from "vitest";
import { MAX_INLINE_VECTOR, createLogger, createSilentLogger, summarizeVectors } from "./index.js";

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
	const lines: string[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	};
}

function parseLine(line: string | undefined): Record<string, unknown> {
	return JSON.parse(line ?? "{}");
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("writes the message and structured fields as one JSON line", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ step: 10, distance: 0.5 }, "Progress");

			expect(lines).toHaveLength(1);
			expect(parseLine(lines[0])).toMatchObject({ msg: "Progress", step: 10, distance: 0.5 });
		});

		it("child loggers carry their bindings", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.child({ component: "driver" }).child({ run: 1 }).info("Run started");

			expect(parseLine(lines[0])).toMatchObject({ component: "driver", run: 1, msg: "Run started" });
		});
	});

	describe("vector summarization", () => {
		it("summarizes a long typed array to its length and head", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ theta: new Float64Array(20).fill(0.5) }, "estimate");

			expect(parseLine(lines[0])).toMatchObject({
				theta: { length: 20, head: [0.5, 0.5, 0.5, 0.5] },
			});
		});

		it("logs a short typed array as a plain array", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ theta: Float64Array.from([1, 2, 3]) }, "estimate");

			expect(parseLine(lines[0])).toMatchObject({ theta: [1, 2, 3] });
		});

		it("summarizes long number arrays and leaves other values alone", () => {
			const long = Array.from({ length: MAX_INLINE_VECTOR + 1 }, (_, i) => i);
			const labels = Array.from({ length: 12 }, (_, i) => `row-${i}`);

			const result = summarizeVectors({ long, labels, lambda: 1, name: "run" });

			expect(result).toEqual({
				long: { length: 9, head: [0, 1, 2, 3] },
				labels,
				lambda: 1,
				name: "run",
			});
		});

		it("keeps a vector of exactly MAX_INLINE_VECTOR entries inline", () => {
			const vector = Array.from({ length: MAX_INLINE_VECTOR }, () => 2);
			expect(summarizeVectors({ vector })).toEqual({ vector });
		});
	});

	describe("redact paths", () => {
		it("censors configured paths in log output", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", redactPaths: ["token"], destination });

			logger.info({ token: "test-secret", safe: "visible" }, "test");

			const output = lines.join("");
			expect(output).not.toContain("test-secret");
			expect(parseLine(lines[0])).toMatchObject({ token: "[REDACTED]", safe: "visible" });
		});
	});

	describe("log levels", () => {
		it("respects the configured level", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "warn", destination });

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines).toHaveLength(1);
			expect(parseLine(lines[0])).toMatchObject({ msg: "should appear" });
		});

		it("accepts every configured level name", () => {
			const levels = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
			for (const level of levels) {
				expect(() => createLogger({ level })).not.toThrow();
			}
		});
	});

	describe("createSilentLogger", () => {
		it("accepts calls without writing anything", () => {
			const logger = createSilentLogger();
			expect(() => {
				logger.error({ code: "CONFIG_ERROR" }, "failed");
				logger.child({ component: "driver" }).info("ignored");
			}).not.toThrow();
		});
	});
});
