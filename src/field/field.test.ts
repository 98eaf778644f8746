import { describe, expect, it, vi } from "vitest";
import { ConstraintRegistry } from "../constraints/registry.js";
import { defaultMessages } from "../issues/messages.js";
import { Context } from "../shared/context.js";
import { DefinitionError, UnknownConstraintError } from "../shared/errors.js";
import { FloatType, IntegerType } from "../types/number.js";
import { StringType } from "../types/string.js";
import type { SchemaType } from "../types/types.js";
import { Field } from "./field.js";
import { ABSENT, present } from "./types.js";
import type { FieldData, FieldDefinitionOptions, FieldOutcome, FieldScope } from "./types.js";

const constraints = ConstraintRegistry.withBuiltins();

function field(type: SchemaType, options: FieldDefinitionOptions = {}, name = "value"): Field {
	return Field.create(name, type, options, constraints);
}

function scope(data: FieldData = {}, context = Context.empty()): FieldScope {
	return { pathPrefix: [], data, env: { context, messages: defaultMessages } };
}

function invalid(message: string, code: string, path: (string | number)[] = ["value"]): FieldOutcome {
	return { status: "invalid", issues: [{ path, message, code }] };
}

// ── Presence ────────────────────────────────────────────────────────

describe("Field missing values", () => {
	it("reports required at the prefixed path", () => {
		const name = field(new StringType(), {}, "name");
		const outcome = name.evaluate(ABSENT, { ...scope(), pathPrefix: ["user", 0] });
		expect(outcome).toEqual(invalid("is required", "required", ["user", 0, "name"]));
	});

	it("omits an absent optional field", () => {
		expect(field(new StringType(), { optional: true }).evaluate(ABSENT, scope())).toEqual({
			status: "omitted",
		});
	});

	it("uses a default, running it through preprocess then transform", () => {
		const f = field(new StringType(), {
			default: " guest ",
			preprocess: (v) => String(v).trim(),
			transform: (v) => String(v).toUpperCase(),
		});
		expect(f.evaluate(ABSENT, scope())).toEqual({ status: "value", value: "GUEST" });
	});

	it("calls defaultFn on every use", () => {
		const thunk = vi.fn(() => []);
		const f = field(new StringType(), { defaultFn: thunk });
		f.evaluate(ABSENT, scope());
		f.evaluate(ABSENT, scope());
		expect(thunk).toHaveBeenCalledTimes(2);
		expect(f.hasDefault).toBe(true);
	});

	it("keeps a null default", () => {
		expect(field(new StringType(), { default: null }).evaluate(ABSENT, scope())).toEqual({
			status: "value",
			value: null,
		});
	});

	it("rejects default together with defaultFn", () => {
		expect(() => field(new StringType(), { default: 1, defaultFn: () => 2 })).toThrow(DefinitionError);
	});
});

describe("Field null handling", () => {
	it("treats null on a non-nullable field as missing", () => {
		expect(field(new StringType()).evaluate(present(null), scope())).toEqual(
			invalid("is required", "required"),
		);
		expect(field(new StringType(), { default: "x" }).evaluate(present(null), scope())).toEqual({
			status: "value",
			value: "x",
		});
	});

	it("keeps an explicit null on a nullable field, optional or not", () => {
		expect(field(new StringType(), { nullable: true }).evaluate(present(null), scope())).toEqual({
			status: "value",
			value: null,
		});
		expect(
			field(new StringType(), { nullable: true, optional: true }).evaluate(present(null), scope()),
		).toEqual({ status: "value", value: null });
	});

	it("treats a preprocess result of null like an input null", () => {
		const f = field(new StringType(), { optional: true, preprocess: (v) => (v === "" ? null : v) });
		expect(f.evaluate(present(""), scope())).toEqual({ status: "omitted" });
	});
});

// ── Coercion, constraints, refinements ──────────────────────────────

describe("Field coercion", () => {
	it("stores the coerced value", () => {
		expect(field(new IntegerType()).evaluate(present(" 42 "), scope())).toEqual({
			status: "value",
			value: 42,
		});
	});

	it("reports a type error from the type", () => {
		expect(field(new IntegerType()).evaluate(present("abc"), scope())).toEqual(
			invalid("cannot coerce string to integer", "type_error"),
		);
	});

	it("only checks the raw shape when coercion is off", () => {
		const strict = field(new IntegerType(), { coerce: false });
		expect(strict.evaluate(present(7), scope())).toEqual({ status: "value", value: 7 });
		expect(strict.evaluate(present("7"), scope())).toEqual(invalid("must be a integer", "type_error"));
	});
});

describe("Field constraints", () => {
	it("reports every failing constraint in declaration order", () => {
		const f = field(new StringType(), { min: 5, format: "numeric", enum: ["12345"] });
		const outcome = f.evaluate(present("ab"), scope());
		expect(outcome).toEqual({
			status: "invalid",
			issues: [
				{ path: ["value"], message: "length must be at least 5 (got 2)", code: "min" },
				{ path: ["value"], message: "must be a valid numeric", code: "format" },
				{ path: ["value"], message: 'must be one of: "12345"', code: "enum" },
			],
		});
	});

	it("does not run refinements after a constraint failure", () => {
		const check = vi.fn(() => true);
		const f = field(new IntegerType(), { min: 10, refine: check });
		f.evaluate(present(1), scope());
		expect(check).not.toHaveBeenCalled();
	});

	it("builds plug-in constraints after the built-ins", () => {
		const registry = ConstraintRegistry.withBuiltins().define("even", {
			check: (value) => typeof value === "number" && value % 2 === 0,
			message: () => "must be even",
		});
		const f = Field.create("n", new IntegerType(), { max: 10, constraints: { even: true } }, registry);
		expect(f.constraints.map((c) => c.spec.kind)).toEqual(["max", "custom"]);
		expect(f.evaluate(present(13), scope())).toEqual({
			status: "invalid",
			issues: [
				{ path: ["n"], message: "must be at most 10", code: "max" },
				{ path: ["n"], message: "must be even", code: "even" },
			],
		});
	});

	it("throws for an unregistered plug-in constraint", () => {
		expect(() => field(new IntegerType(), { constraints: { prime: true } })).toThrow(
			UnknownConstraintError,
		);
	});

	it("exposes configured constraint values", () => {
		const f = field(new StringType(), { min: 1, max: 5, length: { max: 4 }, format: "slug", enum: ["a"] });
		expect(f.constraintValues()).toEqual({
			min: 1,
			max: 5,
			length: { kind: "max", max: 4 },
			format: "slug",
			enum: ["a"],
		});
	});
});

describe("Field refinements", () => {
	it("accepts a bare predicate with the catalog message", () => {
		const f = field(new IntegerType(), { refine: (v) => v !== 13 });
		expect(f.evaluate(present(13), scope())).toEqual(invalid("failed refinement", "refinement"));
	});

	it("collects every failing refinement with static or derived messages", () => {
		const f = field(new FloatType(), {
			refine: [
				{ check: (v) => typeof v === "number" && v > 0, message: "must be positive" },
				{ check: (v) => typeof v === "number" && v % 1 === 0, message: (v) => `${String(v)} is fractional` },
			],
		});
		expect(f.evaluate(present("-1.5"), scope())).toEqual({
			status: "invalid",
			issues: [
				{ path: ["value"], message: "must be positive", code: "refinement" },
				{ path: ["value"], message: "-1.5 is fractional", code: "refinement" },
			],
		});
	});

	it("passes the context to context-aware checks", () => {
		const f = field(new IntegerType(), {
			refine: { checkWithContext: (v, ctx) => typeof v === "number" && v <= Number(ctx.get("limit")) },
		});
		const context = Context.of({ limit: 5 });
		expect(f.evaluate(present(5), scope({}, context))).toEqual({ status: "value", value: 5 });
		expect(f.evaluate(present(6), scope({}, context)).status).toBe("invalid");
	});

	it("throws for malformed refinements", () => {
		expect(() => field(new IntegerType(), { refine: { check: () => true, checkWithContext: () => true } })).toThrow(
			DefinitionError,
		);
		expect(() =>
			Field.create("n", new IntegerType(), JSON.parse('{"refine": {"check": 1}}'), constraints),
		).toThrow("Invalid refinement #0 on field n: check must be a function");
	});
});

// ── Custom message ──────────────────────────────────────────────────

describe("Field message override", () => {
	const f = field(new IntegerType(), { min: 18, message: "must be an adult age" });

	it("rewrites required, type and constraint issues keeping code and path", () => {
		expect(f.evaluate(ABSENT, scope())).toEqual(invalid("must be an adult age", "required"));
		expect(f.evaluate(present("x"), scope())).toEqual(invalid("must be an adult age", "type_error"));
		expect(f.evaluate(present(3), scope())).toEqual(invalid("must be an adult age", "min"));
	});
});

// ── Transform ───────────────────────────────────────────────────────

describe("Field transform", () => {
	it("runs after validation on the coerced value", () => {
		const f = field(new IntegerType(), { transform: (v) => Number(v) * 2 });
		expect(f.evaluate(present("21"), scope())).toEqual({ status: "value", value: 42 });
	});

	it("passes the context to the context-aware form", () => {
		const f = field(new StringType(), { transformWithContext: (v, ctx) => `${String(ctx.get("prefix"))}${String(v)}` });
		expect(f.evaluate(present("x"), scope({}, Context.of({ prefix: "id-" })))).toEqual({
			status: "value",
			value: "id-x",
		});
	});

	it("omits a null result of an optional field and stores null otherwise", () => {
		const toNull = () => undefined;
		expect(field(new StringType(), { optional: true, transform: toNull }).evaluate(present("a"), scope())).toEqual({
			status: "omitted",
		});
		expect(field(new StringType(), { transform: toNull }).evaluate(present("a"), scope())).toEqual({
			status: "value",
			value: null,
		});
	});

	it("rejects both forms of one callback", () => {
		expect(() => field(new StringType(), { transform: (v) => v, transformWithContext: (v) => v })).toThrow(
			"Field value accepts only one of transform and transformWithContext",
		);
	});
});

// ── Conditions ──────────────────────────────────────────────────────

describe("Field conditions", () => {
	const card = field(new StringType(), { when: "paid", min: 4 }, "card");

	it("validates when the sibling is truthy", () => {
		expect(card.evaluate(ABSENT, scope({ paid: true }))).toEqual(invalid("is required", "required", ["card"]));
		expect(card.evaluate(ABSENT, scope({ paid: 0 })).status).toBe("invalid");
	});

	it("skips validation when the sibling is null, absent or false", () => {
		expect(card.evaluate(ABSENT, scope({ paid: false }))).toEqual({ status: "omitted" });
		expect(card.evaluate(ABSENT, scope({}))).toEqual({ status: "omitted" });
		expect(card.evaluate(present("12"), scope({ paid: null }))).toEqual({ status: "value", value: "12" });
	});

	it("still preprocesses and transforms a skipped present value", () => {
		const f = field(new IntegerType(), {
			unless: (data) => data.mode === "strict",
			preprocess: (v) => String(v).trim(),
			transform: (v) => `<${String(v)}>`,
		});
		expect(f.evaluate(present(" 5 "), scope({ mode: "strict" }))).toEqual({ status: "value", value: "<5>" });
	});

	it("reads the context in context-aware predicates", () => {
		const f = field(new StringType(), { whenWithContext: (_data, ctx) => ctx.get("admin") === true });
		expect(f.conditional).toBe(true);
		expect(f.evaluate(ABSENT, scope({}, Context.of({ admin: true }))).status).toBe("invalid");
		expect(f.evaluate(ABSENT, scope({}, Context.of({ admin: false })))).toEqual({ status: "omitted" });
	});
});

describe("Field.asOptional", () => {
	it("returns an optional copy and leaves the original unchanged", () => {
		const original = field(new StringType());
		const copy = original.asOptional();
		expect(copy.optional).toBe(true);
		expect(original.optional).toBe(false);
		expect(copy.evaluate(ABSENT, scope())).toEqual({ status: "omitted" });
		expect(copy.asOptional()).toBe(copy);
	});
});
