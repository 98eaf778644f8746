// ── Engine ───────────────────────────────────────────────────────────
export {
	type Engine,
	type EngineOptions,
	createEngine,
	defaultEngine,
	schema,
} from "./engine/index.js";

// ── Schema ───────────────────────────────────────────────────────────
export {
	type SchemaOptions,
	type ParseOptions,
	type TypeRef,
	type FieldOptions,
	type SchemaBuild,
	type SchemaOutput,
	type SchemaValidator,
	type ValidatorScope,
	type TypeDescription,
	type ConstraintDescription,
	type FieldDescription,
	type SchemaDescription,
	Schema,
	SchemaBuilder,
} from "./schema/index.js";

// ── Field ────────────────────────────────────────────────────────────
export {
	type Condition,
	type ConditionWithContext,
	type RefinementOption,
	type RefinementMessage,
	Field,
} from "./field/index.js";

// ── Issues & Results ─────────────────────────────────────────────────
export {
	IssueCode,
	type IssueCodeLike,
	type PathSegment,
	type ValidationIssue,
	fullPath,
	formatIssue,
	issuesEqual,
	ErrorCollection,
	type ParseResult,
	type Success,
	type Failure,
	isSuccess,
	isFailure,
	mapSuccess,
	flatMapSuccess,
	valueOr,
	DEFAULT_MESSAGES,
	type MessageKey,
	type MessageCatalog,
	createMessageCatalog,
	defaultMessages,
	ValidationError,
	isValidationError,
} from "./issues/index.js";

// ── Types ────────────────────────────────────────────────────────────
export {
	type SchemaType,
	type TypeSpec,
	type TypeKind,
	type ScalarKind,
	type CustomTypeDefinition,
	TypeRegistry,
} from "./types/index.js";

// ── Constraints ──────────────────────────────────────────────────────
export {
	type Constraint,
	type ConstraintSpec,
	type CustomConstraintDefinition,
	type NamedFormat,
	type LengthOption,
	type FormatOption,
	NAMED_FORMATS,
	ConstraintRegistry,
} from "./constraints/index.js";

// ── Serialization ────────────────────────────────────────────────────
export {
	type JsonValue,
	type SerializedIssue,
	serializeValue,
	dumpJson,
	serializeIssues,
} from "./serialize/index.js";

// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
	Context,
	ErrorCategory,
	ValidkitError,
	DefinitionError,
	UnknownTypeError,
	UnknownConstraintError,
	DuplicateFieldError,
	DuplicateRegistrationError,
	InvalidInputError,
	ConfigError,
	isDefinitionError,
	isInvalidInputError,
	isConfigError,
	type Result,
	type KeyValueInput,
} from "./shared/index.js";

export { Decimal } from "./lib/decimal/index.js";
export { CalendarDate } from "./lib/temporal/index.js";
export { type Logger, type LogLevel, createLogger } from "./lib/logger/index.js";
