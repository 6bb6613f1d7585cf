import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { error, ok } from "../shared/result.js";
import { anyError } from "./any-error.js";

describe("anyError (property-based)", () => {
	it("a run of successful checkpoints settles to ok(final)", () => {
		fc.assert(
			fc.property(fc.array(fc.integer()), fc.string(), (steps, final) => {
				const r = anyError(function* () {
					for (const s of steps) yield ok(s);
					return final;
				});
				expect(r.ok).toBe(true);
				expect(r.value).toBe(final);
			}),
		);
	});

	it("stops at the first failing checkpoint and never pulls the next one", () => {
		fc.assert(
			fc.property(fc.nat({ max: 20 }), fc.nat({ max: 20 }), (before, after) => {
				let pulled = 0;
				const r = anyError(function* () {
					for (let i = 0; i < before; i++) {
						pulled++;
						yield ok(i);
					}
					pulled++;
					yield error(`failed at ${before}`);
					for (let i = 0; i < after; i++) {
						pulled++;
						yield ok(i);
					}
					return "unreachable";
				});
				expect(r.ok).toBe(false);
				expect(r.error?.message).toBe(`failed at ${before}`);
				expect(pulled).toBe(before + 1);
			}),
		);
	});
});
