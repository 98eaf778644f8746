import { describe, expect, it } from "vitest";
import { defaultMessages } from "../issues/messages.js";
import { createLogger } from "../lib/logger/index.js";
import { Context } from "../shared/context.js";
import { DefinitionError, DuplicateRegistrationError, UnknownTypeError } from "../shared/errors.js";
import { TypeRegistry } from "./registry.js";
import { StringType } from "./string.js";
import type { EvalEnv } from "./types.js";

const env: EvalEnv = { context: Context.empty(), messages: defaultMessages };

describe("TypeRegistry", () => {
	it("holds every built-in type and alias", () => {
		const registry = TypeRegistry.withBuiltins();
		expect(registry.names()).toEqual([
			"string",
			"integer",
			"float",
			"decimal",
			"bigdecimal",
			"boolean",
			"bool",
			"date",
			"datetime",
			"date_time",
			"time",
			"array",
			"object",
			"hash",
			"union",
			"discriminated_union",
			"literal",
		]);
	});

	it("resolves aliases to the same kind", () => {
		const registry = TypeRegistry.withBuiltins();
		expect(registry.build("bool").spec.kind).toBe("boolean");
		expect(registry.build("date_time").spec.kind).toBe("datetime");
		expect(registry.build("hash").spec.kind).toBe("object");
		expect(registry.build("bigdecimal").spec.kind).toBe("decimal");
	});

	it("passes options to structural factories", () => {
		const registry = TypeRegistry.withBuiltins();
		const type = registry.build("array", { of: registry.build("integer") });
		expect(type.typeName()).toBe("array<integer>");
		expect(type.evaluate(["1", 2], [], env)).toEqual({ ok: true, value: [1, 2] });
	});

	it("throws UnknownTypeError with the registered names as hint", () => {
		const registry = TypeRegistry.create().register("string", () => new StringType());
		try {
			registry.build("uuid");
			expect.unreachable("build should throw");
		} catch (error) {
			expect(error).toBeInstanceOf(UnknownTypeError);
			if (error instanceof UnknownTypeError) {
				expect(error.message).toBe("Unknown type: uuid");
				expect(error.typeName).toBe("uuid");
				expect(error.hint).toBe("Registered types: string");
			}
		}
	});

	it("refuses to re-register a name", () => {
		const registry = TypeRegistry.withBuiltins();
		expect(() => registry.register("string", () => new StringType())).toThrow(
			DuplicateRegistrationError,
		);
		expect(() => registry.register("string", () => new StringType())).toThrow(
			'Type "string" is already registered',
		);
	});

	it("requires the options combinator types depend on", () => {
		const registry = TypeRegistry.withBuiltins();
		expect(() => registry.build("union")).toThrow(DefinitionError);
		expect(() => registry.build("literal")).toThrow("Type literal requires the literal option");
		expect(() => registry.build("discriminated_union")).toThrow(
			"Type discriminated_union requires the discriminator option",
		);
	});

	it("defines custom types", () => {
		const registry = TypeRegistry.withBuiltins().define("slug", {
			coerce: (raw) => String(raw).trim().toLowerCase().replace(/\s+/g, "-"),
		});
		expect(registry.has("slug")).toBe(true);
		expect(registry.lookup("slug")).not.toBeNull();
		expect(registry.build("slug").evaluate(" Hello World ", [], env)).toEqual({
			ok: true,
			value: "hello-world",
		});
	});

	it("logs registrations at debug", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "debug", destination: { write: (l) => lines.push(l) } });
		TypeRegistry.create(logger).register("string", () => new StringType());
		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0] ?? "{}");
		expect(entry).toMatchObject({ registry: "Type", name: "string", msg: "registered" });
	});
});
