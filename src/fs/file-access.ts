/**
 * File access helpers that report failures as Results instead of throwing.
 *
 * Each helper wraps one `node:fs/promises` call. `readTextFile` drives its
 * steps through `anyErrorAsync`, so a failed step ends the read and the open
 * handle is still closed by the producer's `finally` block.
 */

import { type FileHandle, open } from "node:fs/promises";
import { anyErrorAsync, take } from "../evaluator/any-error.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { type z, validate } from "../lib/validation/index.js";
import { DomainError } from "../shared/errors.js";
import { type Result, error, flatMap, ok, tryCatch } from "../shared/result.js";

const logger = createLogger({ level: "warn" }).child({ module: "file-access" });

// ── Errors ──────────────────────────────────────────────────────────

/** The requested path does not exist. */
export class FileNotFoundError extends DomainError {
	readonly path: string;

	constructor(path: string, cause?: unknown) {
		super(`no such file: ${path}`, "FILE_NOT_FOUND", { path });
		this.name = "FileNotFoundError";
		this.path = path;
		if (cause !== undefined) this.cause = cause;
	}

	override toString(): string {
		return `File not found: ${this.path}`;
	}
}

/** Any other failure while opening, reading or closing a file. */
export class FileAccessError extends DomainError {
	constructor(message: string, path: string | undefined, cause: unknown) {
		super(message, "FILE_ACCESS", {
			...(path !== undefined && { path }),
			errno: errnoCode(cause),
		});
		this.name = "FileAccessError";
		this.cause = cause;
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

function errnoCode(err: unknown): string {
	return isNodeError(err) && err.code !== undefined ? err.code : "UNKNOWN";
}

// ── Single steps ────────────────────────────────────────────────────

/** Attempt to open a file. */
export async function openFile(
	path: string,
	flags = "r",
): Promise<Result<FileHandle, FileNotFoundError | FileAccessError>> {
	try {
		return ok(await open(path, flags));
	} catch (e: unknown) {
		if (isNodeError(e) && e.code === "ENOENT") {
			return error(new FileNotFoundError(path, e));
		}
		return error(new FileAccessError(`could not open ${path}`, path, e));
	}
}

/** Read up to `length` bytes from the current position, decoded as UTF-8. */
export async function readChunk(
	handle: FileHandle,
	length: number,
): Promise<Result<string, FileAccessError>> {
	try {
		const buffer = Buffer.alloc(length);
		const { bytesRead } = await handle.read(buffer, 0, length, null);
		return ok(buffer.subarray(0, bytesRead).toString("utf-8"));
	} catch (e: unknown) {
		return error(
			new FileAccessError(`could not read from file descriptor ${handle.fd}`, undefined, e),
		);
	}
}

/** Read the remaining contents of a file as UTF-8. */
export async function readAll(handle: FileHandle): Promise<Result<string, FileAccessError>> {
	try {
		return ok(await handle.readFile({ encoding: "utf-8" }));
	} catch (e: unknown) {
		return error(
			new FileAccessError(`could not read from file descriptor ${handle.fd}`, undefined, e),
		);
	}
}

/** Attempt to close a file handle. */
export async function closeFile(handle: FileHandle): Promise<Result<true, FileAccessError>> {
	try {
		await handle.close();
		return ok();
	} catch (e: unknown) {
		return error(
			new FileAccessError(`could not close file descriptor ${handle.fd}`, undefined, e),
		);
	}
}

// ── Composed readers ────────────────────────────────────────────────

async function release(handle: FileHandle, log: Logger): Promise<void> {
	const closed = await closeFile(handle);
	if (!closed.ok) {
		log.warn({ error: closed.error }, "File handle did not close cleanly");
	}
}

/**
 * Open `path`, read it (the first `length` bytes when given, else everything) and close it.
 *
 * @example
 * ```ts
 * const greeting = await readTextFile("greeting.txt", 5);
 * if (greeting.ok) console.log(greeting.value);
 * ```
 */
export function readTextFile(path: string, length?: number): Promise<Result<string, Error>> {
	return anyErrorAsync(
		async function* () {
			const handle = yield* take(await openFile(path));
			try {
				const read = length === undefined ? readAll(handle) : readChunk(handle, length);
				return yield* take(await read);
			} finally {
				await release(handle, logger);
			}
		},
		{ name: "readTextFile" },
	);
}

/** Read a JSON file and validate its contents against `schema`. */
export async function readJsonFile<T>(
	path: string,
	schema: z.ZodType<T>,
): Promise<Result<T, Error>> {
	const text = await readTextFile(path);
	if (!text.ok) return text;
	const parsed = tryCatch((): unknown => JSON.parse(text.value));
	return flatMap(parsed, (data) => validate(schema, data));
}
