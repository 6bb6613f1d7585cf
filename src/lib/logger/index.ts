/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Error values in log fields are flattened to `{ name, message, code }` so
 * failed steps and contained faults stay readable in JSON output.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type EmitLevel = "info" | "warn" | "error" | "debug";

// ── Error serializer ────────────────────────────────────────────────

function serializeError(error: Error): Record<string, unknown> {
	const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
	return {
		name: error.name,
		message: error.message,
		...(code !== undefined && { code }),
	};
}

function serializeFields(obj: object): Record<string, unknown> {
	const fields: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		fields[key] = value instanceof Error ? serializeError(value) : value;
	}
	return fields;
}

// ── Factory ─────────────────────────────────────────────────────────

function wrapPino(pinoLogger: pino.Logger): Logger {
	const emit = (level: EmitLevel, msgOrObj: unknown, msg?: string): void => {
		if (!pinoLogger.isLevelEnabled(level)) return;
		if (typeof msgOrObj === "object" && msgOrObj !== null) {
			pinoLogger[level](serializeFields(msgOrObj), msg ?? "");
		} else {
			pinoLogger[level](String(msgOrObj ?? ""));
		}
	};

	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit("info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit("warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit("error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit("debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(serializeFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino, with optional path redaction and a custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ step: 2, error: new Error("boom") }, "Step failed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger = config.destination
		? pino(pinoOptions, config.destination)
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}
