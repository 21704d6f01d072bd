// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	type Ok,
	type Err,
	ok,
	err,
	unwrap,
	tryCatch,
	ErrorCategory,
	EstimatorError,
	ShapeError,
	ConfigError,
	IndexOutOfRangeError,
	InvariantError,
	SystemError,
	classifyError,
	isShapeError,
	isConfigError,
	isIndexOutOfRangeError,
	isInvariantError,
	isSystemError,
	type RunConfig,
	DEFAULT_RUN_CONFIG,
	configFromEnv,
	resolveRunConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	LOG_LEVELS,
	createLogger,
	createSilentLogger,
} from "./lib/logger/index.js";
export { type EventMap, TypedEmitter } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
export {
	type UniformSource,
	type IntegerSampler,
	type GaussianSampler,
	MAX_SEED,
	SeededRandom,
	integerSampler,
	gaussianSampler,
	scriptedSampler,
} from "./lib/random/index.js";

// ── Linear Algebra ───────────────────────────────────────────────────
export {
	type VectorLike,
	toVector,
	dot,
	norm,
	squaredNorm,
	distance,
	axpy,
} from "./linalg/vector.js";
export { DenseMatrix } from "./linalg/matrix.js";

// ── Data ─────────────────────────────────────────────────────────────
export { Dataset, type RawDataset, parseDataset } from "./data/dataset.js";
export { SampleSource, type Sample } from "./data/sample-source.js";
export {
	type LinearDatasetConfig,
	type LinearDataset,
	generateLinearDataset,
	randomTheta,
} from "./data/synthetic.js";

// ── Estimator ────────────────────────────────────────────────────────
export {
	IncrementalEstimator,
	type EstimatorConfig,
} from "./estimator/incremental-estimator.js";
export {
	proximalStep,
	proximalObjective,
	proximalGradient,
} from "./estimator/proximal.js";

// ── Run ──────────────────────────────────────────────────────────────
export {
	type StepRecord,
	type RunEvents,
	type RunOptions,
	type ReplayOptions,
	type RunResult,
	runIncrementalProximal,
	replayIndices,
} from "./run/driver.js";
export {
	type TraceSummary,
	type TracePoint,
	summarizeTrace,
	downsampleTrace,
} from "./run/metrics.js";
