/**
 * Schema type contracts.
 *
 * A SchemaType turns a raw value into a typed value or a list of issues.
 * Every type carries a tagged `spec` describing its configuration, so
 * introspection switches on `spec.kind` instead of inspecting classes.
 */

import type { MessageCatalog } from "../issues/messages.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import type { SchemaDescription } from "../schema/introspection.js";
import type { Context } from "../shared/context.js";
import type { Result } from "../shared/result.js";

// ── Evaluation plumbing ─────────────────────────────────────────────

/** Per-call environment threaded through every evaluation. */
export interface EvalEnv {
	readonly context: Context;
	readonly messages: MessageCatalog;
}

/** Outcome of a type or nested schema evaluation. */
export type TypeResult<T> = Result<T, readonly ValidationIssue[]>;

/** Outcome of a bare coercion attempt. */
export type Coerced<T> =
	| { readonly status: "coerced"; readonly value: T }
	| { readonly status: "failed" };

export function coerced<T>(value: T): Coerced<T> {
	return { status: "coerced", value };
}

export const COERCION_FAILED: Coerced<never> = { status: "failed" };

/**
 * A schema as seen from inside a type. Object and discriminated union types
 * run one of these with the current path as prefix.
 */
export interface NestedSchema {
	run(
		input: unknown,
		pathPrefix: readonly PathSegment[],
		env: EvalEnv,
	): TypeResult<Readonly<Record<string, unknown>>>;
	describe(): SchemaDescription;
}

// ── Specs (tagged configuration) ────────────────────────────────────

export type ScalarKind =
	| "string"
	| "integer"
	| "float"
	| "decimal"
	| "boolean"
	| "date"
	| "datetime"
	| "time";

export type TypeSpec =
	| { readonly kind: ScalarKind }
	| { readonly kind: "array"; readonly of: SchemaType | undefined }
	| { readonly kind: "object"; readonly schema: NestedSchema | undefined }
	| { readonly kind: "union"; readonly members: readonly SchemaType[] }
	| {
			readonly kind: "discriminated_union";
			readonly discriminator: string;
			readonly mapping: ReadonlyMap<string, NestedSchema>;
	  }
	| { readonly kind: "literal"; readonly values: readonly unknown[] }
	| { readonly kind: "custom"; readonly name: string };

export type TypeKind = TypeSpec["kind"];

// ── SchemaType ──────────────────────────────────────────────────────

export interface SchemaType<T = unknown> {
	readonly spec: TypeSpec;
	/** Name used in messages, e.g. `integer` or `array<string>`. */
	typeName(): string;
	coerce(raw: unknown): Coerced<T>;
	isValid(value: unknown): value is T;
	/** Message for a value that is not of this type. */
	invalidMessage(value: unknown, messages: MessageCatalog): string;
	/** Coerce, then validate. Issues are reported at `path`. */
	evaluate(raw: unknown, path: readonly PathSegment[], env: EvalEnv): TypeResult<T>;
}

/**
 * Already-resolved configuration handed to a type factory. Names and schemas
 * are resolved by the schema builder before a factory sees them.
 */
export interface TypeOptions {
	readonly of?: SchemaType | undefined;
	readonly schema?: NestedSchema | undefined;
	readonly members?: readonly SchemaType[] | undefined;
	readonly values?: readonly unknown[] | undefined;
	readonly discriminator?: string | undefined;
	readonly mapping?: ReadonlyMap<string, NestedSchema> | undefined;
}

export type TypeFactory = (options: TypeOptions) => SchemaType;

/**
 * Plug-in type definition. A throwing `coerce` counts as a coercion failure.
 *
 * @example
 * ```ts
 * engine.defineType("money", {
 *   coerce: (raw) => Decimal.from(String(raw).replace("$", "")),
 *   validate: (value) => value instanceof Decimal,
 * });
 * ```
 */
export interface CustomTypeDefinition {
	readonly typeName?: string;
	readonly coerce?: (raw: unknown) => unknown;
	readonly validate?: (value: unknown) => boolean;
	/** Replaces both the coercion and the validation message */
	readonly message?: (value: unknown) => string;
}
