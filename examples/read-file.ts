/**
 * Read File — the same three fallible steps, unwrapped by hand and then
 * composed with anyErrorAsync.
 *
 * Run: npx tsx examples/read-file.ts [path]
 */

import {
	anyErrorAsync,
	closeFile,
	describeError,
	openFile,
	readChunk,
	take,
	unwrap,
} from "../src/index.js";

const path = process.argv[2] ?? "file.txt";

// ── Step by step ─────────────────────────────────────────────────────

async function byHand(): Promise<void> {
	const [file, openError] = unwrap(await openFile(path));
	if (openError !== null) {
		console.error(describeError(openError));
		return;
	}

	const [contents, readError] = unwrap(await readChunk(file, 5));
	await closeFile(file);
	if (readError !== null) {
		console.error(describeError(readError));
		return;
	}

	console.log(`by hand: ${contents}`);
}

// ── Short-circuit ────────────────────────────────────────────────────

async function composed(): Promise<void> {
	const result = await anyErrorAsync(async function* () {
		const file = yield* take(await openFile(path));
		try {
			return yield* take(await readChunk(file, 5));
		} finally {
			await closeFile(file);
		}
	});

	if (result.ok) {
		console.log(`composed: ${result.value}`);
	} else {
		console.error(describeError(result.error));
	}
}

await byHand();
await composed();
