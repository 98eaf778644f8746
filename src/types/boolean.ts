import { ScalarType } from "./base.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

const TRUTHY: ReadonlySet<unknown> = new Set([true, 1, 1n, "1", "true", "yes", "on", "t", "y"]);
const FALSY: ReadonlySet<unknown> = new Set([false, 0, 0n, "0", "false", "no", "off", "f", "n"]);

/** Membership in fixed truthy/falsy sets; strings compare case-insensitively. */
export class BooleanType extends ScalarType<boolean> {
	readonly spec: TypeSpec = { kind: "boolean" };

	typeName(): string {
		return "boolean";
	}

	coerce(raw: unknown): Coerced<boolean> {
		const key = typeof raw === "string" ? raw.toLowerCase() : raw;
		if (TRUTHY.has(key)) return coerced(true);
		if (FALSY.has(key)) return coerced(false);
		return COERCION_FAILED;
	}

	isValid(value: unknown): value is boolean {
		return typeof value === "boolean";
	}
}
