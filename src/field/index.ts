export {
	type FieldInput,
	type FieldOutcome,
	type FieldData,
	type FieldScope,
	type ValueFn,
	type ValueWithContextFn,
	type Condition,
	type ConditionWithContext,
	type RefinementMessage,
	type RefinementOption,
	type FieldPolicyOptions,
	type FieldConstraintOptions,
	type FieldDefinitionOptions,
	ABSENT,
	present,
} from "./types.js";

export { type Refinement, buildRefinements } from "./refinement.js";
export { Field } from "./field.js";
