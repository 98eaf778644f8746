import { Decimal } from "../lib/decimal/index.js";
import { ScalarType } from "./base.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

/** Strings pass; symbols become their description; numbers their decimal form. */
export class StringType extends ScalarType<string> {
	readonly spec: TypeSpec = { kind: "string" };

	typeName(): string {
		return "string";
	}

	coerce(raw: unknown): Coerced<string> {
		switch (typeof raw) {
			case "string":
				return coerced(raw);
			case "symbol":
				return coerced(raw.description ?? "");
			case "number":
			case "bigint":
				return coerced(String(raw));
			default:
				return raw instanceof Decimal ? coerced(raw.toString()) : COERCION_FAILED;
		}
	}

	isValid(value: unknown): value is string {
		return typeof value === "string";
	}
}
