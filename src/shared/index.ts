export {
	type Result,
	type Ok,
	type Err,
	ok,
	err,
	unwrap,
	tryCatch,
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type RunConfig,
	DEFAULT_RUN_CONFIG,
	configFromEnv,
	resolveRunConfig,
} from "./config.js";
