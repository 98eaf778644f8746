/**
 * Serializer: canonicalises validated output into JSON-safe primitives.
 *
 * Leaves become strings, numbers, booleans or null; sequences and key-value
 * structures are recursed. Decimals keep their exact fixed-point digits.
 */

import type { ErrorCollection } from "../issues/error-collection.js";
import { Decimal } from "../lib/decimal/index.js";
import { CalendarDate } from "../lib/temporal/index.js";
import { canonicalKey } from "../shared/records.js";

export type JsonValue =
	| null
	| boolean
	| number
	| string
	| readonly JsonValue[]
	| { readonly [key: string]: JsonValue };

function hasToJSON(value: object): value is { toJSON(): unknown } {
	return "toJSON" in value && typeof value.toJSON === "function";
}

function serializeEntries(entries: Iterable<readonly [unknown, unknown]>): Record<string, JsonValue> {
	return Object.fromEntries(
		Array.from(entries, ([key, item]) => [canonicalKey(key), serializeValue(item)] as const),
	);
}

/**
 * Canonical JSON-safe form of a value.
 *
 * @example
 * serializeValue({ price: Decimal.from("19.90"), at: CalendarDate.of(2024, 1, 5) })
 * // { price: "19.9", at: "2024-01-05" }
 */
export function serializeValue(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	switch (typeof value) {
		case "boolean":
		case "string":
			return value;
		case "number":
			return Number.isFinite(value) ? value : null;
		case "bigint":
			return value.toString();
		case "symbol":
			return value.description ?? "";
		case "function":
			return String(value);
		default:
			break;
	}
	if (value instanceof Decimal) return value.toString();
	if (value instanceof CalendarDate) return value.toString();
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
	if (Array.isArray(value)) return value.map(serializeValue);
	if (value instanceof Set) return Array.from(value, serializeValue);
	if (value instanceof Map) return serializeEntries(value.entries());
	if (typeof value !== "object") return String(value);
	if (hasToJSON(value)) return serializeValue(value.toJSON());
	return serializeEntries(Object.entries(value));
}

/** JSON text of the canonical form. */
export function dumpJson(value: unknown, indent?: number): string {
	return JSON.stringify(serializeValue(value), null, indent);
}

export interface SerializedIssue {
	readonly path: readonly string[];
	readonly message: string;
	readonly code: string;
}

/** Failure payload with stringified paths, e.g. for an HTTP error body. */
export function serializeIssues(errors: ErrorCollection): { readonly errors: readonly SerializedIssue[] } {
	return {
		errors: errors.toArray().map((found) => ({
			path: found.path.map(String),
			message: found.message,
			code: String(found.code),
		})),
	};
}
