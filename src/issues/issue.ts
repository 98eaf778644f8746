/**
 * ValidationIssue: one path-addressed validation failure.
 *
 * Issues are data. Every evaluation step returns them instead of throwing, and
 * they are compared structurally.
 */

// ── Codes ───────────────────────────────────────────────────────────

export const IssueCode = {
	Required: "required",
	TypeError: "type_error",
	Min: "min",
	Max: "max",
	Length: "length",
	Format: "format",
	Enum: "enum",
	Refinement: "refinement",
	DiscriminatorMissing: "discriminator_missing",
	InvalidDiscriminator: "invalid_discriminator",
	UnionTypeError: "union_type_error",
	/** Raised by schema-level validators */
	Custom: "custom",
} as const;

export type IssueCode = (typeof IssueCode)[keyof typeof IssueCode];

/** Built-in codes plus whatever a plug-in constraint reports. */
export type IssueCodeLike = IssueCode | (string & Record<never, never>);

// ── Issue ───────────────────────────────────────────────────────────

export type PathSegment = string | number;

export interface ValidationIssue {
	readonly path: readonly PathSegment[];
	readonly message: string;
	readonly code: IssueCodeLike;
}

/** Creates a frozen issue. The path is copied. */
export function issue(
	path: readonly PathSegment[],
	message: string,
	code: IssueCodeLike,
): ValidationIssue {
	return Object.freeze({ path: Object.freeze([...path]), message, code });
}

/** Same issue with a different message; code and path are kept. */
export function withMessage(source: ValidationIssue, message: string): ValidationIssue {
	return issue(source.path, message, source.code);
}

/** Dotted path, e.g. `user.addresses.0.zip`. Empty for a root issue. */
export function fullPath(target: ValidationIssue): string {
	return target.path.map(String).join(".");
}

/** `"<path>: <message>"`, or just the message for a root issue. */
export function formatIssue(target: ValidationIssue): string {
	const path = fullPath(target);
	return path.length === 0 ? target.message : `${path}: ${target.message}`;
}

export function issuesEqual(a: ValidationIssue, b: ValidationIssue): boolean {
	return (
		a.message === b.message &&
		a.code === b.code &&
		a.path.length === b.path.length &&
		a.path.every((segment, i) => segment === b.path[i])
	);
}

export function pathStartsWith(
	path: readonly PathSegment[],
	prefix: readonly PathSegment[],
): boolean {
	return prefix.length <= path.length && prefix.every((segment, i) => segment === path[i]);
}
