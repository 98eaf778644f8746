import { Field } from "../field/field.js";
import { DefinitionError, DuplicateFieldError } from "../shared/errors.js";
import { isPlainRecord } from "../shared/records.js";
import { describeValue } from "../shared/values.js";
import type { NestedSchema, SchemaType, TypeKind, TypeOptions } from "../types/types.js";
import { Schema } from "./schema.js";
import type { FieldOptions, SchemaBuild, SchemaDeps, SchemaOptions, TypeRef } from "./types.js";
import type { SchemaValidator } from "./validator.js";

function isSchemaType(value: unknown): value is SchemaType {
	return (
		typeof value === "object" &&
		value !== null &&
		"spec" in value &&
		"evaluate" in value &&
		typeof value.evaluate === "function"
	);
}

// ── Type resolution ─────────────────────────────────────────────────

/**
 * Resolves a type reference on its own, without field options.
 * @throws DefinitionError for anything that is not a name, a type or a schema
 */
export function resolveTypeRef(ref: TypeRef, deps: SchemaDeps): SchemaType {
	if (typeof ref === "string") return deps.types.build(ref);
	if (ref instanceof Schema) return deps.types.build("object", { schema: ref });
	if (isSchemaType(ref)) return ref;
	throw new DefinitionError(`Invalid type reference: ${describeValue(ref)}`);
}

function mappingOf(
	mapping: FieldOptions["mapping"],
): ReadonlyMap<string, NestedSchema> | undefined {
	if (mapping === undefined) return undefined;
	const entries: Iterable<readonly [string, unknown]> =
		mapping instanceof Map ? mapping.entries() : isPlainRecord(mapping) ? Object.entries(mapping) : [];
	const resolved = new Map<string, NestedSchema>();
	for (const [key, schema] of entries) {
		if (!(schema instanceof Schema)) {
			throw new DefinitionError(`Discriminated union mapping for "${key}" must be a schema`, {
				key,
			});
		}
		resolved.set(key, schema);
	}
	return resolved;
}

const STRUCTURAL_KEYS = ["of", "schema", "discriminator", "mapping"] as const;
type StructuralKey = (typeof STRUCTURAL_KEYS)[number];

function takesOption(kind: TypeKind, key: StructuralKey): boolean {
	switch (key) {
		case "of":
			return kind === "array";
		case "schema":
			return kind === "object";
		case "discriminator":
		case "mapping":
			return kind === "discriminated_union";
	}
}

/** @throws DefinitionError when a structural option is given to a type that ignores it */
function assertStructuralOptions(field: string, type: SchemaType, options: FieldOptions): void {
	const misplaced = STRUCTURAL_KEYS.filter(
		(key) => options[key] !== undefined && !takesOption(type.spec.kind, key),
	);
	if (misplaced.length === 0) return;
	throw new DefinitionError(
		`Field ${field} of type ${type.typeName()} does not take ${misplaced.map((key) => `"${key}"`).join(", ")}`,
		{ field, type: type.typeName(), options: misplaced },
	);
}

/**
 * Resolves a field's type from its reference, structural options and an
 * optional inline nested schema.
 * @throws DefinitionError for invalid references, misplaced inline schemas
 * or structural options the type does not take
 * @throws UnknownTypeError for an unregistered name
 */
export function resolveFieldType(
	field: string,
	ref: TypeRef,
	options: FieldOptions,
	nested: Schema | undefined,
	deps: SchemaDeps,
): SchemaType {
	const type = buildFieldType(field, ref, options, nested, deps);
	assertStructuralOptions(field, type, options);
	return type;
}

function buildFieldType(
	field: string,
	ref: TypeRef,
	options: FieldOptions,
	nested: Schema | undefined,
	deps: SchemaDeps,
): SchemaType {
	if (options.literal !== undefined) {
		return deps.types.build("literal", { values: options.literal });
	}
	if (options.union !== undefined) {
		return deps.types.build("union", {
			members: options.union.map((member) => resolveTypeRef(member, deps)),
		});
	}
	if (typeof ref !== "string") {
		if (nested) {
			throw new DefinitionError(`Field ${field} takes an inline schema only with a type name`, {
				field,
			});
		}
		return resolveTypeRef(ref, deps);
	}

	const typeOptions: TypeOptions = {
		of: options.of === undefined ? undefined : resolveTypeRef(options.of, deps),
		schema: options.schema,
		discriminator: options.discriminator,
		mapping: mappingOf(options.mapping),
	};
	const type = deps.types.build(ref, typeOptions);
	if (!nested) return type;

	switch (type.spec.kind) {
		case "array":
			if (typeOptions.of !== undefined) break;
			return deps.types.build(ref, {
				...typeOptions,
				of: deps.types.build("object", { schema: nested }),
			});
		case "object":
			if (typeOptions.schema !== undefined) break;
			return deps.types.build(ref, { ...typeOptions, schema: nested });
		default:
			throw new DefinitionError(
				`Field ${field} of type ${ref} cannot take an inline schema; use an object or array type`,
				{ field, type: ref },
			);
	}
	throw new DefinitionError(`Field ${field} has both an inline schema and an explicit item type or schema`, {
		field,
	});
}

// ── Builder ─────────────────────────────────────────────────────────

/** Seed for composition: fields and validators carried over from another schema. */
export interface BuilderSeed {
	readonly fields: Iterable<Field>;
	readonly validators: readonly SchemaValidator[];
}

/**
 * Collects field declarations and validators, then builds an immutable Schema.
 *
 * @example
 * ```ts
 * const user = engine.schema((s) => {
 *   s.field("email", "string", { format: "email" });
 *   s.optional("age", "integer", { min: 0 });
 *   s.field("address", "object", (a) => {
 *     a.field("city", "string");
 *   });
 * });
 * ```
 */
export class SchemaBuilder {
	private readonly deps: SchemaDeps;
	private readonly fields: Map<string, Field>;
	private readonly validators: SchemaValidator[];

	private constructor(deps: SchemaDeps, seed: BuilderSeed | undefined) {
		this.deps = deps;
		this.fields = new Map();
		this.validators = [...(seed?.validators ?? [])];
		for (const field of seed?.fields ?? []) {
			this.fields.set(field.name, field);
		}
	}

	static create(deps: SchemaDeps, seed?: BuilderSeed): SchemaBuilder {
		return new SchemaBuilder(deps, seed);
	}

	/**
	 * Declares a field. A trailing callback defines an inline nested schema
	 * for `object` fields, or for the items of `array` fields.
	 * @throws DuplicateFieldError if the name is already declared
	 * @throws DefinitionError for invalid options
	 */
	field(name: string, type: TypeRef, options?: FieldOptions | SchemaBuild, nested?: SchemaBuild): this {
		if (this.fields.has(name)) throw new DuplicateFieldError(name);
		const fieldOptions: FieldOptions = typeof options === "function" ? {} : (options ?? {});
		const build = typeof options === "function" ? options : nested;
		const inline = build ? Schema.define(build, {}, this.deps) : undefined;
		const resolved = resolveFieldType(name, type, fieldOptions, inline, this.deps);
		this.fields.set(name, Field.create(name, resolved, fieldOptions, this.deps.constraints));
		return this;
	}

	/** Declares an optional field. */
	optional(name: string, type: TypeRef, options?: FieldOptions | SchemaBuild, nested?: SchemaBuild): this {
		return this.declare(name, type, true, options, nested);
	}

	/** Declares a required field, overriding any `optional` option. */
	required(name: string, type: TypeRef, options?: FieldOptions | SchemaBuild, nested?: SchemaBuild): this {
		return this.declare(name, type, false, options, nested);
	}

	/** Adds a cross-field validator. Validators run in declaration order. */
	validate(validator: SchemaValidator): this {
		this.validators.push(validator);
		return this;
	}

	build(options: SchemaOptions = {}): Schema {
		return Schema.fromParts(this.fields.values(), this.validators, options, this.deps);
	}

	private declare(
		name: string,
		type: TypeRef,
		optional: boolean,
		options: FieldOptions | SchemaBuild | undefined,
		nested: SchemaBuild | undefined,
	): this {
		if (typeof options === "function") {
			return this.field(name, type, { optional }, options);
		}
		return this.field(name, type, { ...options, optional }, nested);
	}
}
