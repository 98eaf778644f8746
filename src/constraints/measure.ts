/**
 * Measurement helpers: how constraints read a size or a magnitude from a value.
 */

import { Decimal } from "../lib/decimal/index.js";
import { isPlainRecord } from "../shared/records.js";
import type { Threshold } from "./types.js";

/**
 * Length of a value that has one: code points for strings, element count for
 * arrays, sets and maps, key count for plain records. Null otherwise.
 */
export function lengthOf(value: unknown): number | null {
	if (typeof value === "string") return [...value].length;
	if (Array.isArray(value)) return value.length;
	if (value instanceof Map || value instanceof Set) return value.size;
	if (isPlainRecord(value)) return Object.keys(value).length;
	return null;
}

export function isNumeric(value: unknown): value is Threshold {
	return typeof value === "number" || typeof value === "bigint" || value instanceof Decimal;
}

function toDecimal(value: Threshold): Decimal {
	return value instanceof Decimal ? value : Decimal.from(value);
}

function toNumber(value: Threshold): number {
	return value instanceof Decimal ? value.toNumber() : Number(value);
}

/**
 * Compares two numeric values of any supported representation.
 * @returns -1, 0 or 1; null when either side is NaN
 */
export function compareNumeric(a: Threshold, b: Threshold): -1 | 0 | 1 | null {
	if (typeof a === "number" && Number.isNaN(a)) return null;
	if (typeof b === "number" && Number.isNaN(b)) return null;

	const bothExact =
		!(typeof a === "number" && !Number.isFinite(a)) && !(typeof b === "number" && !Number.isFinite(b));
	if (bothExact) return toDecimal(a).cmp(toDecimal(b));

	const x = toNumber(a);
	const y = toNumber(b);
	return x < y ? -1 : x > y ? 1 : 0;
}

export function formatThreshold(value: Threshold): string {
	return value.toString();
}
