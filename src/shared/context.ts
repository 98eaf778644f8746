/**
 * Context: immutable side channel for a single parse call.
 *
 * Carries request-scoped facts (current user, locale, limits) to conditions,
 * refinements, preprocess/transform functions and schema validators without
 * making them part of the validated data.
 */

export class Context {
	private static readonly EMPTY = new Context(new Map());

	private readonly entries: ReadonlyMap<string, unknown>;

	private constructor(entries: ReadonlyMap<string, unknown>) {
		this.entries = entries;
	}

	/** Creates a context from a plain record. */
	static of(values: Readonly<Record<string, unknown>>): Context {
		return new Context(new Map(Object.entries(values)));
	}

	static empty(): Context {
		return Context.EMPTY;
	}

	/** Accepts an existing Context, a plain record, or nothing. */
	static from(value: Context | Readonly<Record<string, unknown>> | undefined): Context {
		if (value === undefined) return Context.EMPTY;
		if (value instanceof Context) return value;
		return Context.of(value);
	}

	get(key: string): unknown {
		return this.entries.get(key);
	}

	has(key: string): boolean {
		return this.entries.has(key);
	}

	isEmpty(): boolean {
		return this.entries.size === 0;
	}

	/** Returns a new context with the given entries added or replaced. */
	with(values: Readonly<Record<string, unknown>>): Context {
		const next = new Map(this.entries);
		for (const [key, value] of Object.entries(values)) {
			next.set(key, value);
		}
		return new Context(next);
	}

	toRecord(): Record<string, unknown> {
		return Object.fromEntries(this.entries);
	}
}
