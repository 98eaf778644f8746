/**
 * Integer and float types.
 *
 * Both are plain JavaScript numbers. Integers stay within the safe integer
 * range so the value round-trips exactly; anything outside fails coercion.
 */

import { ScalarType } from "./base.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

const INTEGER_STRING = /^-?\d+$/;
const ZERO_FRACTION_STRING = /^(-?\d+)\.0+$/;
const FLOAT_STRING = /^-?\d+(\.\d+)?$/;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Number for a bigint within the safe integer range, else null. */
export function safeBigIntToNumber(value: bigint): number | null {
	return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : null;
}

function safeInteger(n: number): Coerced<number> {
	if (!Number.isSafeInteger(n)) return COERCION_FAILED;
	// -0 reads as 0
	return coerced(n === 0 ? 0 : n);
}

export class IntegerType extends ScalarType<number> {
	readonly spec: TypeSpec = { kind: "integer" };

	typeName(): string {
		return "integer";
	}

	coerce(raw: unknown): Coerced<number> {
		if (typeof raw === "number") {
			return Number.isFinite(raw) && Number.isInteger(raw) ? safeInteger(raw) : COERCION_FAILED;
		}
		if (typeof raw === "bigint") {
			const n = safeBigIntToNumber(raw);
			return n === null ? COERCION_FAILED : coerced(n);
		}
		if (typeof raw !== "string") return COERCION_FAILED;

		const trimmed = raw.trim();
		if (INTEGER_STRING.test(trimmed)) return safeInteger(Number(trimmed));
		const zeroFraction = ZERO_FRACTION_STRING.exec(trimmed);
		if (zeroFraction) return safeInteger(Number(zeroFraction[1]));
		return COERCION_FAILED;
	}

	isValid(value: unknown): value is number {
		return typeof value === "number" && Number.isSafeInteger(value);
	}
}

export class FloatType extends ScalarType<number> {
	readonly spec: TypeSpec = { kind: "float" };

	typeName(): string {
		return "float";
	}

	coerce(raw: unknown): Coerced<number> {
		if (typeof raw === "number") {
			return Number.isFinite(raw) ? coerced(raw) : COERCION_FAILED;
		}
		if (typeof raw === "bigint") {
			const n = Number(raw);
			return Number.isFinite(n) ? coerced(n) : COERCION_FAILED;
		}
		if (typeof raw !== "string") return COERCION_FAILED;

		const trimmed = raw.trim();
		if (!FLOAT_STRING.test(trimmed)) return COERCION_FAILED;
		const n = Number(trimmed);
		return Number.isFinite(n) ? coerced(n) : COERCION_FAILED;
	}

	isValid(value: unknown): value is number {
		return typeof value === "number" && Number.isFinite(value);
	}
}
