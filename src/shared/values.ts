/**
 * Value helpers shared by types, constraints and messages.
 */

import { Decimal } from "../lib/decimal/index.js";
import { CalendarDate } from "../lib/temporal/index.js";
import { isPlainRecord } from "./records.js";

/**
 * Short runtime category of a value, used in coercion messages.
 * @example describeValue("1") // "string"
 */
export function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (typeof value !== "object") return typeof value;
	if (value instanceof Decimal) return "Decimal";
	if (value instanceof CalendarDate) return "CalendarDate";
	if (isPlainRecord(value)) return "object";
	const ctor: unknown = Reflect.get(value, "constructor");
	return typeof ctor === "function" && ctor.name.length > 0 ? ctor.name : "object";
}

/**
 * Literal-style rendering for messages: strings are quoted, everything else
 * reads as it would in source.
 * @example inspectValue("dog") // "\"dog\""
 */
export function inspectValue(value: unknown): string {
	switch (typeof value) {
		case "string":
			return JSON.stringify(value);
		case "bigint":
			return `${value}n`;
		case "symbol":
			return value.toString();
		case "function":
			return "[function]";
		case "undefined":
			return "undefined";
		case "number":
		case "boolean":
			return String(value);
		default:
			break;
	}
	if (value === null) return "null";
	if (value instanceof Decimal || value instanceof CalendarDate) return value.toString();
	if (value instanceof Date) return value.toISOString();
	if (Array.isArray(value)) return `[${value.map(inspectValue).join(", ")}]`;
	if (isPlainRecord(value)) {
		const body = Object.entries(value)
			.map(([k, v]) => `${k}: ${inspectValue(v)}`)
			.join(", ");
		return `{${body}}`;
	}
	return describeValue(value);
}

/**
 * Equality without type conversion: `1` never equals `"1"`. Numbers compare
 * by value (NaN equals NaN), value objects by content, arrays and plain
 * records structurally.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
	if (a === b) return true;
	if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
	if (a instanceof Decimal && b instanceof Decimal) return a.eq(b);
	if (a instanceof CalendarDate && b instanceof CalendarDate) return a.equals(b);
	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
	if (Array.isArray(a) && Array.isArray(b)) {
		return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
	}
	if (isPlainRecord(a) && isPlainRecord(b)) {
		const keys = Object.keys(a);
		if (keys.length !== Object.keys(b).length) return false;
		return keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
	}
	return false;
}
