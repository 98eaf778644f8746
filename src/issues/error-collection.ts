import type { PathSegment, ValidationIssue } from "./issue.js";
import { formatIssue, fullPath, issuesEqual, pathStartsWith } from "./issue.js";

/**
 * Immutable, ordered collection of validation issues.
 *
 * `add` and `merge` return new collections. `toHash` groups messages by
 * dotted path for attribute-style error bags.
 *
 * @example
 * ```ts
 * const errors = ErrorCollection.of([issue(["name"], "is required", "required")]);
 * errors.toHash(); // { name: ["is required"] }
 * ```
 */
export class ErrorCollection implements Iterable<ValidationIssue> {
	private static readonly EMPTY = new ErrorCollection([]);

	private readonly issues: readonly ValidationIssue[];

	private constructor(issues: readonly ValidationIssue[]) {
		this.issues = Object.freeze([...issues]);
	}

	static of(issues: Iterable<ValidationIssue>): ErrorCollection {
		const list = [...issues];
		return list.length === 0 ? ErrorCollection.EMPTY : new ErrorCollection(list);
	}

	static empty(): ErrorCollection {
		return ErrorCollection.EMPTY;
	}

	get size(): number {
		return this.issues.length;
	}

	isEmpty(): boolean {
		return this.issues.length === 0;
	}

	at(index: number): ValidationIssue | undefined {
		return this.issues.at(index);
	}

	first(): ValidationIssue | undefined {
		return this.issues[0];
	}

	[Symbol.iterator](): Iterator<ValidationIssue> {
		return this.issues[Symbol.iterator]();
	}

	add(entry: ValidationIssue): ErrorCollection {
		return new ErrorCollection([...this.issues, entry]);
	}

	merge(other: ErrorCollection): ErrorCollection {
		if (other.isEmpty()) return this;
		if (this.isEmpty()) return other;
		return new ErrorCollection([...this.issues, ...other.issues]);
	}

	/** Issues whose path starts with the given segments. */
	forPath(...segments: PathSegment[]): ErrorCollection {
		return ErrorCollection.of(this.issues.filter((i) => pathStartsWith(i.path, segments)));
	}

	messages(): string[] {
		return this.issues.map((i) => i.message);
	}

	fullMessages(): string[] {
		return this.issues.map(formatIssue);
	}

	toArray(): ValidationIssue[] {
		return [...this.issues];
	}

	/** Messages grouped by dotted path, in first-seen order. Root issues use `""`. */
	toHash(): Record<string, string[]> {
		const grouped = new Map<string, string[]>();
		for (const entry of this.issues) {
			const key = fullPath(entry);
			const bucket = grouped.get(key);
			if (bucket) {
				bucket.push(entry.message);
			} else {
				grouped.set(key, [entry.message]);
			}
		}
		return Object.fromEntries(grouped);
	}

	equals(other: ErrorCollection): boolean {
		return (
			this.issues.length === other.issues.length &&
			this.issues.every((entry, i) => {
				const theirs = other.issues[i];
				return theirs !== undefined && issuesEqual(entry, theirs);
			})
		);
	}

	toJSON(): ValidationIssue[] {
		return this.toArray();
	}
}
