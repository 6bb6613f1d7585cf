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
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type EvaluatorConfig,
	DEFAULT_EVALUATOR_CONFIG,
	configFromEnv,
	loadConfig,
} from "./config.js";
