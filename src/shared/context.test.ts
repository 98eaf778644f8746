import { describe, expect, it } from "vitest";
import { Context } from "./context.js";

describe("Context", () => {
	it("reads entries", () => {
		const ctx = Context.of({ userId: 42, role: "admin" });
		expect(ctx.get("userId")).toBe(42);
		expect(ctx.has("role")).toBe(true);
		expect(ctx.has("locale")).toBe(false);
		expect(ctx.get("locale")).toBeUndefined();
	});

	it("shares a single empty instance", () => {
		expect(Context.empty()).toBe(Context.empty());
		expect(Context.empty().isEmpty()).toBe(true);
	});

	it("from() accepts a context, a record or nothing", () => {
		const ctx = Context.of({ a: 1 });
		expect(Context.from(ctx)).toBe(ctx);
		expect(Context.from({ b: 2 }).get("b")).toBe(2);
		expect(Context.from(undefined)).toBe(Context.empty());
	});

	it("with() returns a new context and leaves the original untouched", () => {
		const base = Context.of({ a: 1 });
		const next = base.with({ a: 2, b: 3 });
		expect(base.toRecord()).toEqual({ a: 1 });
		expect(next.toRecord()).toEqual({ a: 2, b: 3 });
	});

	it("does not observe later changes to the source record", () => {
		const source: Record<string, unknown> = { a: 1 };
		const ctx = Context.of(source);
		source.a = 99;
		expect(ctx.get("a")).toBe(1);
	});
});
