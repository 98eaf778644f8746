/**
 * Read-only reflection over schema definitions, for documentation and export
 * adapters. Descriptions are plain data built from the tagged `spec` of each
 * type and constraint.
 */

import type { Constraint, LengthMode, NamedFormat, Threshold } from "../constraints/types.js";
import type { Field } from "../field/field.js";
import type { ScalarKind, SchemaType } from "../types/types.js";

export type TypeDescription =
	| { readonly kind: ScalarKind; readonly name: string }
	| { readonly kind: "array"; readonly name: string; readonly of: TypeDescription | null }
	| { readonly kind: "object"; readonly name: string; readonly schema: SchemaDescription | null }
	| { readonly kind: "union"; readonly name: string; readonly members: readonly TypeDescription[] }
	| {
			readonly kind: "discriminated_union";
			readonly name: string;
			readonly discriminator: string;
			readonly mapping: Readonly<Record<string, SchemaDescription>>;
	  }
	| { readonly kind: "literal"; readonly name: string; readonly values: readonly unknown[] }
	| { readonly kind: "custom"; readonly name: string };

export type ConstraintDescription =
	| { readonly kind: "min" | "max"; readonly value: Threshold }
	| { readonly kind: "length"; readonly mode: LengthMode }
	| { readonly kind: "format"; readonly pattern: string; readonly name: NamedFormat | null }
	| { readonly kind: "enum"; readonly values: readonly unknown[] }
	| { readonly kind: "custom"; readonly name: string; readonly options: unknown };

export interface FieldDescription {
	readonly name: string;
	readonly type: TypeDescription;
	readonly optional: boolean;
	readonly nullable: boolean;
	readonly hasDefault: boolean;
	readonly conditional: boolean;
	readonly constraints: readonly ConstraintDescription[];
}

export interface SchemaDescription {
	readonly strict: boolean;
	readonly passthrough: boolean;
	readonly fields: readonly FieldDescription[];
}

export function describeType(type: SchemaType): TypeDescription {
	const spec = type.spec;
	const name = type.typeName();
	switch (spec.kind) {
		case "string":
		case "integer":
		case "float":
		case "decimal":
		case "boolean":
		case "date":
		case "datetime":
		case "time":
			return { kind: spec.kind, name };
		case "array":
			return { kind: "array", name, of: spec.of ? describeType(spec.of) : null };
		case "object":
			return { kind: "object", name, schema: spec.schema ? spec.schema.describe() : null };
		case "union":
			return { kind: "union", name, members: spec.members.map(describeType) };
		case "discriminated_union":
			return {
				kind: "discriminated_union",
				name,
				discriminator: spec.discriminator,
				mapping: Object.fromEntries(
					Array.from(spec.mapping, ([key, schema]) => [key, schema.describe()] as const),
				),
			};
		case "literal":
			return { kind: "literal", name, values: spec.values };
		case "custom":
			return { kind: "custom", name: spec.name };
	}
}

export function describeConstraint(constraint: Constraint): ConstraintDescription {
	const spec = constraint.spec;
	switch (spec.kind) {
		case "min":
		case "max":
			return { kind: spec.kind, value: spec.value };
		case "length":
			return { kind: "length", mode: spec.mode };
		case "format":
			return { kind: "format", pattern: String(spec.pattern), name: spec.name ?? null };
		case "enum":
			return { kind: "enum", values: spec.values };
		case "custom":
			return { kind: "custom", name: spec.name, options: spec.options };
	}
}

export function describeField(field: Field): FieldDescription {
	return {
		name: field.name,
		type: describeType(field.type),
		optional: field.optional,
		nullable: field.nullable,
		hasDefault: field.hasDefault,
		conditional: field.conditional,
		constraints: field.constraints.map(describeConstraint),
	};
}

export function describeSchema(
	fields: Iterable<Field>,
	options: { readonly strict: boolean; readonly passthrough: boolean },
): SchemaDescription {
	return {
		strict: options.strict,
		passthrough: options.passthrough,
		fields: Array.from(fields, describeField),
	};
}
