import { describe, expect, it } from "vitest";
import {
	Decimal,
	ValidationError,
	createEngine,
	dumpJson,
	isFailure,
	schema,
	serializeIssues,
} from "../index.js";

const engine = createEngine();

// ── Concrete scenarios ───────────────────────────────────────────────

describe("end-to-end scenarios", () => {
	const person = engine.schema((s) => {
		s.field("name", "string", { min: 2 });
		s.optional("age", "integer", { min: 0 });
	});

	it("coerces a numeric string on an optional integer", () => {
		expect(person.safeParse({ name: "Al", age: "17" })).toEqual({
			success: true,
			data: { name: "Al", age: 17 },
		});
	});

	it("reports a single min error for a short name", () => {
		const result = person.safeParse({ name: "A" });
		if (!isFailure(result)) throw new Error("expected failure");
		expect(result.errors.size).toBe(1);
		expect(result.errors.first()?.path).toEqual(["name"]);
		expect(result.errors.first()?.code).toBe("min");
	});

	it("fills a default that satisfies the enum", () => {
		const roles = engine.schema((s) => s.field("role", "string", { enum: ["admin", "user"], default: "user" }));
		expect(roles.safeParse({})).toEqual({ success: true, data: { role: "user" } });
	});

	it("coerces symbols and numbers inside a string array", () => {
		const tagged = engine.schema((s) => s.field("tags", "array", { of: "string" }));
		expect(tagged.safeParse({ tags: [Symbol("a"), 1, "b"] })).toEqual({
			success: true,
			data: { tags: ["a", "1", "b"] },
		});
	});

	it("reports a format error for a bad email", () => {
		const contact = engine.schema((s) => s.field("email", "string", { format: "email" }));
		const result = contact.safeParse({ email: "not-an-email" });
		if (!isFailure(result)) throw new Error("expected failure");
		expect(result.errors.toArray()).toEqual([
			{ path: ["email"], message: "must be a valid email", code: "format" },
		]);
	});
});

// ── A realistic request body ─────────────────────────────────────────

describe("order request", () => {
	const order = schema((s) => {
		s.field("id", "string", { format: "uuid" });
		s.field("total", "decimal", { min: 0 });
		s.field("placedAt", "datetime");
		s.field("shipping", "object", (a) => {
			a.field("country", "string", { length: 2, transform: (v) => String(v).toUpperCase() });
			a.optional("zip", "string", { format: "numeric" });
		});
		s.field("lines", "array", (l) => {
			l.field("sku", "string", { format: "slug" });
			l.field("qty", "integer", { min: 1, max: 99 });
		});
		s.optional("coupon", "string", { nullable: true });
		s.field("giftNote", "string", { when: "gift", length: { max: 20 } });
		s.optional("gift", "boolean", { default: false });
		s.validate(({ get, baseError }) => {
			const lines = get("lines");
			if (Array.isArray(lines) && lines.length === 0) baseError("order has no lines");
		});
	});

	const body = {
		id: "0b0c3e2a-5d2e-4a8a-9f5b-2a1c3d4e5f60",
		total: "42.50",
		placedAt: "2024-03-01T10:00:00Z",
		shipping: { country: "no" },
		lines: [{ sku: "blue-mug", qty: "2" }],
		coupon: null,
	};

	it("parses and dumps a valid body", () => {
		const data = order.parse(body);
		expect(data.total).toBeInstanceOf(Decimal);
		expect(order.dump(body)).toEqual({
			id: "0b0c3e2a-5d2e-4a8a-9f5b-2a1c3d4e5f60",
			total: "42.5",
			placedAt: "2024-03-01T10:00:00.000Z",
			shipping: { country: "NO" },
			lines: [{ sku: "blue-mug", qty: 2 }],
			coupon: null,
			gift: false,
		});
	});

	it("collects every problem in one pass", () => {
		const result = order.safeParse({
			...body,
			total: "-1",
			shipping: { country: "NOR", zip: "12a" },
			lines: [{ sku: "Blue Mug", qty: 0 }],
			gift: true,
		});
		if (!isFailure(result)) throw new Error("expected failure");
		expect(result.errors.toHash()).toEqual({
			total: ["must be at least 0"],
			"shipping.country": ["length must be exactly 2 (got 3)"],
			"shipping.zip": ["must be a valid numeric"],
			"lines.0.sku": ["must be a valid slug"],
			"lines.0.qty": ["must be at least 1"],
			giftNote: ["is required"],
		});
	});

	it("runs the schema validator once fields pass", () => {
		expect(() => order.parse({ ...body, lines: [] })).toThrow(ValidationError);
		const result = order.safeParse({ ...body, lines: [] });
		if (!isFailure(result)) throw new Error("expected failure");
		expect(serializeIssues(result.errors)).toEqual({
			errors: [{ path: [], message: "order has no lines", code: "custom" }],
		});
	});

	it("dumps JSON text", () => {
		const slim = order.pick("id", "total");
		expect(dumpJson(slim.parse(body))).toBe('{"id":"0b0c3e2a-5d2e-4a8a-9f5b-2a1c3d4e5f60","total":"42.5"}');
	});
});
