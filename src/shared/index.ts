export { type EngineConfig, DEFAULT_ENGINE_CONFIG, configFromEnv, resolveConfig } from "./config.js";

export { Context } from "./context.js";

export {
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
} from "./errors.js";

export {
	type KeyValueInput,
	canonicalKey,
	isKeyValue,
	isPlainRecord,
	normalizeKeys,
} from "./records.js";

export { type UnknownEntryError, Registry } from "./registry.js";

export { type Result, ok, err } from "./result.js";

export { describeValue, inspectValue, valuesEqual } from "./values.js";
