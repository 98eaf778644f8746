import { describe, expect, it } from "vitest";
import { createMessageCatalog } from "../issues/messages.js";
import { issuesOf } from "../issues/parse-result.js";
import { createLogger } from "../lib/logger/index.js";
import { ConfigError, DuplicateRegistrationError, UnknownTypeError } from "../shared/errors.js";
import { createEngine } from "./engine.js";

function capture(): { lines: Record<string, unknown>[]; destination: { write(msg: string): void } } {
	const lines: Record<string, unknown>[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	};
}

describe("createEngine", () => {
	it("starts with defaults and the built-in registries", () => {
		const engine = createEngine();
		expect(engine.config).toEqual({ name: "validkit", logLevel: "silent" });
		expect(engine.types.has("integer")).toBe(true);
		expect(engine.constraints.names()).toEqual(["min", "max", "length", "format", "enum"]);
		expect(Object.isFrozen(engine)).toBe(true);
	});

	it("rejects an invalid configuration", () => {
		expect(() => createEngine({ config: { name: " " } })).toThrow(ConfigError);
	});

	it("keeps registrations per engine", () => {
		const a = createEngine();
		const b = createEngine();
		a.defineType("even", {
			coerce: (raw) => raw,
			validate: (value) => typeof value === "number" && value % 2 === 0,
		});
		expect(a.types.has("even")).toBe(true);
		expect(b.types.has("even")).toBe(false);
		expect(() => b.schema((s) => s.field("n", "even"))).toThrow(UnknownTypeError);
	});

	it("refuses to replace a built-in", () => {
		const engine = createEngine();
		expect(() => engine.defineConstraint("min", { check: () => true })).toThrow(
			DuplicateRegistrationError,
		);
	});
});

describe("Engine plug-ins", () => {
	const engine = createEngine()
		.defineType("upper", {
			coerce: (raw) => (typeof raw === "string" ? raw.toUpperCase() : raw),
			validate: (value) => typeof value === "string",
		})
		.defineConstraint("multipleOf", {
			check: (value, step) => typeof value === "number" && typeof step === "number" && value % step === 0,
			message: (_value, step) => `must be a multiple of ${String(step)}`,
		});

	it("uses plug-in types and constraints by name", () => {
		const s = engine.schema((b) => {
			b.field("code", "upper");
			b.field("qty", "integer", { constraints: { multipleOf: 5 } });
		});
		expect(s.parse({ code: "ab", qty: 10 })).toEqual({ code: "AB", qty: 10 });
		expect(issuesOf(s.safeParse({ code: "ab", qty: 7 })).toArray()).toEqual([
			{ path: ["qty"], message: "must be a multiple of 5", code: "multipleOf" },
		]);
	});
});

describe("Engine messages", () => {
	it("applies message overrides", () => {
		const engine = createEngine({ messages: { required: "missing" } });
		const s = engine.schema((b) => b.field("a", "string"));
		expect(issuesOf(s.safeParse({})).messages()).toEqual(["missing"]);
	});

	it("accepts a full catalog", () => {
		const catalog = createMessageCatalog({ required: "fehlt" });
		const engine = createEngine({ messages: catalog });
		expect(engine.messages).toBe(catalog);
	});
});

describe("Engine logging", () => {
	it("binds the engine name and logs at debug", () => {
		const out = capture();
		const engine = createEngine({
			config: { name: "api" },
			logger: createLogger({ level: "debug", bindings: { engine: "api" }, destination: out.destination }),
		});
		const s = engine.schema((b) => b.field("a", "string"));
		s.safeParse({}, { pathPrefix: ["body"] });

		const messages = out.lines.map((line) => line.msg);
		expect(messages).toContain("engine ready");
		expect(out.lines.find((line) => line.msg === "schema built")).toMatchObject({
			engine: "api",
			component: "schema",
			fields: 1,
			validators: 0,
		});
		expect(out.lines.find((line) => line.msg === "parse failed")).toMatchObject({
			issueCount: 1,
			pathPrefix: "body",
		});
	});

	it("writes nothing at the default silent level", () => {
		const out = capture();
		const engine = createEngine({
			logger: createLogger({ level: "silent", destination: out.destination }),
		});
		engine.schema((b) => b.field("a", "string")).safeParse({});
		expect(out.lines).toEqual([]);
	});
});
