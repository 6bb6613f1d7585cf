import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError, z } from "../lib/validation/index.js";
import { FaultError } from "../shared/errors.js";
import {
	FileAccessError,
	FileNotFoundError,
	closeFile,
	openFile,
	readAll,
	readChunk,
	readJsonFile,
	readTextFile,
} from "./file-access.js";

describe("file access", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "file-access-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("single steps", () => {
		it("opens, reads a chunk and closes a file", async () => {
			const path = join(dir, "greeting.txt");
			await writeFile(path, "hello world");

			const opened = await openFile(path);
			expect(opened.ok).toBe(true);
			if (!opened.ok) return;

			const chunk = await readChunk(opened.value, 5);
			expect(chunk.value).toBe("hello");

			const rest = await readAll(opened.value);
			expect(rest.value).toBe(" world");

			const closed = await closeFile(opened.value);
			expect(closed.ok).toBe(true);
			expect(closed.value).toBe(true);
		});

		it("reports a missing file as FileNotFoundError", async () => {
			const path = join(dir, "missing.txt");
			const opened = await openFile(path);

			expect(opened.ok).toBe(false);
			expect(opened.error).toBeInstanceOf(FileNotFoundError);
			expect(opened.error?.toString()).toBe(`File not found: ${path}`);
			if (opened.error instanceof FileNotFoundError) {
				expect(opened.error.code).toBe("FILE_NOT_FOUND");
				expect(opened.error.path).toBe(path);
			}
		});

		it("reports other open failures as FileAccessError", async () => {
			const opened = await openFile(dir, "w");

			expect(opened.ok).toBe(false);
			expect(opened.error).toBeInstanceOf(FileAccessError);
			expect(opened.error?.context["errno"]).toBe("EISDIR");
		});

		it("reports reading a closed handle as FileAccessError", async () => {
			const path = join(dir, "closed.txt");
			await writeFile(path, "data");
			const opened = await openFile(path);
			if (!opened.ok) throw opened.error;
			await closeFile(opened.value);

			const chunk = await readChunk(opened.value, 4);
			expect(chunk.ok).toBe(false);
			expect(chunk.error).toBeInstanceOf(FileAccessError);
		});
	});

	describe("readTextFile", () => {
		it("reads the first bytes of a file", async () => {
			const path = join(dir, "greeting.txt");
			await writeFile(path, "hello world");

			const r = await readTextFile(path, 5);
			expect(r.ok).toBe(true);
			expect(r.value).toBe("hello");
		});

		it("reads a whole file", async () => {
			const path = join(dir, "notes.txt");
			await writeFile(path, "line one\nline two\n");

			const r = await readTextFile(path);
			expect(r.value).toBe("line one\nline two\n");
		});

		it("short-circuits on a missing file", async () => {
			const r = await readTextFile(join(dir, "missing.txt"));
			expect(r.ok).toBe(false);
			expect(r.error).toBeInstanceOf(FileNotFoundError);
		});
	});

	describe("readJsonFile", () => {
		const schema = z.object({ name: z.string(), retries: z.number().int() });

		it("parses and validates a JSON file", async () => {
			const path = join(dir, "settings.json");
			await writeFile(path, JSON.stringify({ name: "worker", retries: 3 }));

			const r = await readJsonFile(path, schema);
			expect(r.ok).toBe(true);
			expect(r.value).toEqual({ name: "worker", retries: 3 });
		});

		it("returns a ValidationError for a schema mismatch", async () => {
			const path = join(dir, "settings.json");
			await writeFile(path, JSON.stringify({ name: "worker", retries: "three" }));

			const r = await readJsonFile(path, schema);
			expect(r.error).toBeInstanceOf(ValidationError);
		});

		it("returns the parse error for malformed JSON", async () => {
			const path = join(dir, "settings.json");
			await writeFile(path, "{ not json");

			const r = await readJsonFile(path, schema);
			expect(r.error).toBeInstanceOf(SyntaxError);
			expect(r.error).not.toBeInstanceOf(FaultError);
		});

		it("returns FileNotFoundError for a missing file", async () => {
			const r = await readJsonFile(join(dir, "absent.json"), schema);
			expect(r.error).toBeInstanceOf(FileNotFoundError);
		});
	});
});
