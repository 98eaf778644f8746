/**
 * Field contracts: options accepted when declaring a field, and the
 * tri-state values flowing through its evaluation.
 */

import type { FormatOption } from "../constraints/format.js";
import type { LengthOption } from "../constraints/length.js";
import type { Threshold } from "../constraints/types.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import type { Context } from "../shared/context.js";
import type { EvalEnv } from "../types/types.js";

// ── Tri-state values ────────────────────────────────────────────────

/** A field's raw input: either a value was supplied or the key was absent. */
export type FieldInput =
	| { readonly status: "present"; readonly value: unknown }
	| { readonly status: "absent" };

export const ABSENT: FieldInput = { status: "absent" };

export function present(value: unknown): FieldInput {
	return { status: "present", value };
}

/** What a field contributes to the output. */
export type FieldOutcome =
	| { readonly status: "value"; readonly value: unknown }
	| { readonly status: "omitted" }
	| { readonly status: "invalid"; readonly issues: readonly ValidationIssue[] };

/** Sibling values of the field being evaluated, keyed by canonical name. */
export type FieldData = Readonly<Record<string, unknown>>;

/** Everything a field needs from the schema run it belongs to. */
export interface FieldScope {
	readonly pathPrefix: readonly PathSegment[];
	readonly data: FieldData;
	readonly env: EvalEnv;
}

// ── Callbacks ───────────────────────────────────────────────────────

export type ValueFn = (value: unknown) => unknown;
export type ValueWithContextFn = (value: unknown, context: Context) => unknown;

/** A sibling field name (truthy check) or a predicate over the sibling data. */
export type Condition = string | ((data: FieldData) => boolean);
export type ConditionWithContext = (data: FieldData, context: Context) => boolean;

export type RefinementMessage = string | ((value: unknown) => string);

export type RefinementOption =
	| ((value: unknown) => boolean)
	| { readonly check: (value: unknown) => boolean; readonly message?: RefinementMessage | undefined }
	| {
			readonly checkWithContext: (value: unknown, context: Context) => boolean;
			readonly message?: RefinementMessage | undefined;
	  };

// ── Options ─────────────────────────────────────────────────────────

/** Presence, pipeline and message policy of a field. */
export interface FieldPolicyOptions {
	optional?: boolean | undefined;
	nullable?: boolean | undefined;
	default?: unknown;
	/** Called once per parse that needs the default */
	defaultFn?: (() => unknown) | undefined;
	/** When false the raw value must already be of the field's type */
	coerce?: boolean | undefined;
	preprocess?: ValueFn | undefined;
	preprocessWithContext?: ValueWithContextFn | undefined;
	transform?: ValueFn | undefined;
	transformWithContext?: ValueWithContextFn | undefined;
	when?: Condition | undefined;
	whenWithContext?: ConditionWithContext | undefined;
	unless?: Condition | undefined;
	unlessWithContext?: ConditionWithContext | undefined;
	refine?: RefinementOption | readonly RefinementOption[] | undefined;
	/** Replaces the message of every issue the field reports */
	message?: string | undefined;
}

/** Post-coercion checks of a field. */
export interface FieldConstraintOptions {
	min?: Threshold | undefined;
	max?: Threshold | undefined;
	length?: LengthOption | undefined;
	format?: FormatOption | undefined;
	enum?: readonly unknown[] | undefined;
	/** Registered plug-in constraints, by name, with their options */
	constraints?: Readonly<Record<string, unknown>> | undefined;
}

export interface FieldDefinitionOptions extends FieldPolicyOptions, FieldConstraintOptions {}
