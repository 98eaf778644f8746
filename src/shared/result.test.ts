import { describe, expect, it } from "vitest";
import type { Result } from "./result.js";
import { err, ok } from "./result.js";

function half(n: number): Result<number, string> {
	return n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
}

describe("Result", () => {
	it("ok wraps a value", () => {
		const r = half(8);
		expect(r).toEqual({ ok: true, value: 4 });
		if (r.ok) expect(r.value).toBe(4);
	});

	it("err wraps an error", () => {
		const r = half(3);
		expect(r).toEqual({ ok: false, error: "3 is odd" });
		if (!r.ok) expect(r.error).toBe("3 is odd");
	});

	it("carries issue lists as errors", () => {
		const r = err([{ path: ["a"], message: "is required", code: "required" }]);
		expect(r.ok).toBe(false);
		expect(r.error).toHaveLength(1);
	});
});
