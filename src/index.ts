// ── Result kernel ────────────────────────────────────────────────────
export {
	type Result,
	type Ok,
	type Err,
	type Unwrapped,
	ok,
	error,
	isOk,
	isErr,
	isResult,
	unwrap,
	unwrapOr,
	unwrapOrThrow,
	map,
	mapErr,
	flatMap,
	match,
	tryCatch,
	tryCatchAsync,
	DomainError,
	FaultError,
	StepResumedError,
	ConfigError,
	toErrorValue,
	toFault,
	describeError,
	isDomainError,
	isFaultError,
	isConfigError,
	type EvaluatorConfig,
	DEFAULT_EVALUATOR_CONFIG,
	configFromEnv,
	loadConfig,
} from "./shared/index.js";

// ── Evaluator ────────────────────────────────────────────────────────
export {
	type EvaluatorOptions,
	type Settled,
	type Direct,
	anyError,
	anyErrorAsync,
	take,
} from "./evaluator/index.js";

// ── File access ──────────────────────────────────────────────────────
export {
	FileNotFoundError,
	FileAccessError,
	openFile,
	readChunk,
	readAll,
	closeFile,
	readTextFile,
	readJsonFile,
} from "./fs/index.js";

// ── Lib: Logger ──────────────────────────────────────────────────────
export { createLogger, LOG_LEVELS } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ──────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";
