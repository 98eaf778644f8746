export {
	type Constraint,
	type ConstraintFactory,
	type ConstraintKind,
	type ConstraintSpec,
	type CustomConstraintDefinition,
	type LengthMode,
	type NamedFormat,
	type Threshold,
	NAMED_FORMATS,
} from "./types.js";

export { BaseConstraint } from "./base.js";
export { MinConstraint, MaxConstraint } from "./bound.js";
export { type LengthOption, LengthConstraint, parseLengthOption } from "./length.js";
export { type FormatOption, FormatConstraint, isNamedFormat } from "./format.js";
export { EnumConstraint } from "./enum.js";
export { CustomConstraint } from "./custom.js";
export { compareNumeric, isNumeric, lengthOf } from "./measure.js";
export { ConstraintRegistry } from "./registry.js";
