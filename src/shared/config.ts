/**
 * Evaluator configuration.
 *
 * Defaults are safe to run with no environment at all. Environment overrides
 * are opt-in through `configFromEnv()` or `loadConfig()`.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Result, error, ok } from "./result.js";

export interface EvaluatorConfig {
	/** Name bound on log lines as `evaluator` */
	readonly name: string;
	/** Level of the shared default logger */
	readonly logLevel: LogLevel;
	/** Run the producer's cleanup (`return()`) after a short-circuit */
	readonly closeOnFailure: boolean;
}

export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = {
	name: "anyError",
	logLevel: "warn",
	closeOnFailure: true,
};

/** Mutable builder shape for constructing Partial<EvaluatorConfig>. */
interface MutableEvaluatorConfig {
	name?: string;
	logLevel?: LogLevel;
	closeOnFailure?: boolean;
}

const logLevelSchema = z.enum(LOG_LEVELS);

/**
 * Reads evaluator config values from environment variables.
 * Supported: STEPWISE_EVALUATOR_NAME, STEPWISE_LOG_LEVEL, STEPWISE_CLOSE_ON_FAILURE.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(): Partial<EvaluatorConfig> {
	const result: MutableEvaluatorConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const envName = process.env["STEPWISE_EVALUATOR_NAME"];
	if (envName) {
		result.name = envName;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawLevel = process.env["STEPWISE_LOG_LEVEL"];
	if (rawLevel) {
		const level = validate(logLevelSchema, rawLevel.trim().toLowerCase());
		if (!level.ok) {
			throw new ConfigError(
				`Invalid STEPWISE_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
				{ cause: level.error },
			);
		}
		result.logLevel = level.value;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawClose = process.env["STEPWISE_CLOSE_ON_FAILURE"];
	if (rawClose !== undefined && rawClose !== "") {
		result.closeOnFailure = parseBooleanEnv("STEPWISE_CLOSE_ON_FAILURE", rawClose);
	}

	return result;
}

/** Defaults merged with the environment; an invalid variable comes back as an error. */
export function loadConfig(): Result<EvaluatorConfig, ConfigError> {
	try {
		return ok({ ...DEFAULT_EVALUATOR_CONFIG, ...configFromEnv() });
	} catch (e) {
		if (e instanceof ConfigError) return error(e);
		throw e;
	}
}

function parseBooleanEnv(envKey: string, raw: string): boolean {
	const normalized = raw.trim().toLowerCase();
	if (normalized === "true") return true;
	if (normalized === "false") return false;
	throw new ConfigError(`Invalid ${envKey}: "${raw}" must be "true" or "false"`);
}
