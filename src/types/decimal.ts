import { Decimal } from "../lib/decimal/index.js";
import { ScalarType } from "./base.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

/**
 * Arbitrary-precision decimal. Numeral strings are parsed directly, so
 * `"0.1"` is exactly one tenth.
 */
export class DecimalType extends ScalarType<Decimal> {
	readonly spec: TypeSpec = { kind: "decimal" };

	typeName(): string {
		return "decimal";
	}

	coerce(raw: unknown): Coerced<Decimal> {
		if (raw instanceof Decimal) return coerced(raw);
		if (typeof raw === "bigint") return coerced(Decimal.from(raw));
		if (typeof raw === "number") {
			return Number.isFinite(raw) ? coerced(Decimal.from(raw)) : COERCION_FAILED;
		}
		if (typeof raw !== "string") return COERCION_FAILED;

		const trimmed = raw.trim();
		return Decimal.isNumeral(trimmed) ? coerced(Decimal.from(trimmed)) : COERCION_FAILED;
	}

	isValid(value: unknown): value is Decimal {
		return value instanceof Decimal;
	}
}
