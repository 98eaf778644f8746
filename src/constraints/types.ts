/**
 * Constraint contracts.
 *
 * Constraints are post-coercion predicates. They never change a value; each
 * failing constraint contributes one issue. Like types, every constraint
 * carries a tagged `spec` for introspection.
 */

import type { IssueCodeLike, PathSegment, ValidationIssue } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import type { Decimal } from "../lib/decimal/index.js";

/** Threshold accepted by `min` and `max`. */
export type Threshold = number | bigint | Decimal;

export const NAMED_FORMATS = [
	"email",
	"url",
	"uuid",
	"phone",
	"alphanumeric",
	"alpha",
	"numeric",
	"hex",
	"slug",
] as const;

export type NamedFormat = (typeof NAMED_FORMATS)[number];

export type LengthMode =
	| { readonly kind: "exact"; readonly value: number }
	| { readonly kind: "min"; readonly min: number }
	| { readonly kind: "max"; readonly max: number }
	| { readonly kind: "between"; readonly min: number; readonly max: number }
	| { readonly kind: "range"; readonly min: number; readonly max: number };

export type ConstraintSpec =
	| { readonly kind: "min"; readonly value: Threshold }
	| { readonly kind: "max"; readonly value: Threshold }
	| { readonly kind: "length"; readonly mode: LengthMode }
	| { readonly kind: "format"; readonly pattern: RegExp; readonly name: NamedFormat | undefined }
	| { readonly kind: "enum"; readonly values: readonly unknown[] }
	| { readonly kind: "custom"; readonly name: string; readonly options: unknown };

export type ConstraintKind = ConstraintSpec["kind"];

export interface Constraint {
	readonly spec: ConstraintSpec;
	readonly code: IssueCodeLike;
	isValid(value: unknown): boolean;
	errorMessage(value: unknown, messages: MessageCatalog): string;
	/** No issues when valid, otherwise exactly one at `path`. */
	evaluate(
		value: unknown,
		path: readonly PathSegment[],
		messages: MessageCatalog,
	): readonly ValidationIssue[];
}

/** Builds a constraint from its (unvalidated) field option. */
export type ConstraintFactory = (options: unknown) => Constraint;

/**
 * Plug-in constraint definition.
 *
 * @example
 * ```ts
 * engine.defineConstraint("multipleOf", {
 *   check: (value, step) => typeof value === "number" && typeof step === "number" && value % step === 0,
 *   message: (_value, step) => `must be a multiple of ${String(step)}`,
 * });
 * ```
 */
export interface CustomConstraintDefinition {
	readonly check: (value: unknown, options: unknown) => boolean;
	readonly message?: (value: unknown, options: unknown) => string;
	/** Issue code; defaults to the constraint name */
	readonly code?: string;
}
