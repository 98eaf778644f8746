/**
 * Key-value input handling.
 *
 * A key-value structure is a plain object (prototype Object or null) or a Map.
 * Keys are normalised to strings: symbol keys use their description, other Map
 * keys are stringified. String keys win when both forms name the same key.
 */

export type KeyValueInput = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

export function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export function isKeyValue(value: unknown): value is KeyValueInput {
	return value instanceof Map || isPlainRecord(value);
}

/** Canonical string form of a key. */
export function canonicalKey(key: unknown): string {
	if (typeof key === "string") return key;
	if (typeof key === "symbol") return key.description ?? "";
	return String(key);
}

/**
 * Normalises a key-value structure into an insertion-ordered Map with string
 * keys. Entries whose value is `undefined` are dropped: they count as missing.
 */
export function normalizeKeys(input: KeyValueInput): Map<string, unknown> {
	const symbolic = new Map<string, unknown>();
	const textual = new Map<string, unknown>();

	const entries: Iterable<readonly [unknown, unknown]> =
		input instanceof Map ? input.entries() : ownEntries(input);

	for (const [key, value] of entries) {
		if (value === undefined) continue;
		if (typeof key === "string") {
			textual.set(key, value);
		} else {
			symbolic.set(canonicalKey(key), value);
		}
	}

	const normalized = new Map<string, unknown>();
	for (const [key, value] of symbolic) {
		if (!textual.has(key)) normalized.set(key, value);
	}
	for (const [key, value] of textual) {
		normalized.set(key, value);
	}
	return normalized;
}

function* ownEntries(record: Readonly<Record<string, unknown>>): Generator<[unknown, unknown]> {
	for (const key of Reflect.ownKeys(record)) {
		yield [key, Reflect.get(record, key)];
	}
}
