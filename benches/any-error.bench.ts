import { bench, describe } from "vitest";
import { anyError, take } from "../src/evaluator/any-error.js";
import { error, flatMap, ok } from "../src/shared/result.js";

describe("short-circuit evaluation", () => {
	const steps = Array.from({ length: 100 }, (_, i) => ok(i));

	bench("anyError over 100 checkpoints", () => {
		anyError(function* () {
			let sum = 0;
			for (const step of steps) sum += yield* take(step);
			return sum;
		});
	});

	bench("flatMap chain over 100 steps", () => {
		let result = ok(0);
		for (const step of steps) {
			result = flatMap(result, (sum) => flatMap(step, (n) => ok(sum + n)));
		}
	});

	bench("anyError stopping at the first step", () => {
		anyError(function* () {
			yield error("first step failed");
			for (const step of steps) yield step;
		});
	});
});
