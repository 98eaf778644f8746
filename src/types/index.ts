export {
	type EvalEnv,
	type TypeResult,
	type Coerced,
	type NestedSchema,
	type ScalarKind,
	type TypeSpec,
	type TypeKind,
	type SchemaType,
	type TypeOptions,
	type TypeFactory,
	type CustomTypeDefinition,
	coerced,
	COERCION_FAILED,
} from "./types.js";

export { ScalarType } from "./base.js";
export { StringType } from "./string.js";
export { IntegerType, FloatType } from "./number.js";
export { DecimalType } from "./decimal.js";
export { BooleanType } from "./boolean.js";
export { DateType, InstantType } from "./temporal.js";
export { ArrayType } from "./array.js";
export { ObjectType } from "./object.js";
export { UnionType } from "./union.js";
export { DiscriminatedUnionType } from "./discriminated-union.js";
export { LiteralType } from "./literal.js";
export { CustomType } from "./custom.js";
export { TypeRegistry } from "./registry.js";
