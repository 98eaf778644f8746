export {
	type SchemaDeps,
	type SchemaOptions,
	type ResolvedSchemaOptions,
	type ParseOptions,
	type TypeRef,
	type StructuralOptions,
	type FieldOptions,
	type SchemaBuild,
} from "./types.js";

export { Schema, type SchemaOutput } from "./schema.js";
export { type BuilderSeed, SchemaBuilder, resolveFieldType, resolveTypeRef } from "./builder.js";
export { type SchemaValidator, type ValidatorScope, runValidators } from "./validator.js";
export {
	type TypeDescription,
	type ConstraintDescription,
	type FieldDescription,
	type SchemaDescription,
	describeType,
	describeConstraint,
	describeField,
	describeSchema,
} from "./introspection.js";
