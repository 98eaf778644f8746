/**
 * ValidkitError hierarchy: structured classification of thrown errors.
 *
 * Bad input is never thrown: it becomes a ValidationIssue. Thrown errors are
 * reserved for programmer mistakes (definitions, misuse of the API) and for
 * `parse`, which converts a failure into an exception on request.
 */

/** Error categories: where the mistake was made. */
export const ErrorCategory = {
	/** Schema, type or constraint misconfiguration, raised at build time */
	Definition: "definition",
	/** A caller broke the API contract (e.g. non key-value input) */
	Contract: "contract",
	/** Input failed validation (thrown only by `parse`-style entry points) */
	Validation: "validation",
	/** Invalid engine configuration */
	Config: "config",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing ValidkitError subclasses with optional cause chain. */
interface ValidkitErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for everything this library throws. */
export class ValidkitError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "ValidkitError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Definition errors ────────────────────────────────────────────────

/** Schema misconfiguration detected while building a definition. */
export class DefinitionError extends ValidkitError {
	constructor(
		message: string,
		context: Record<string, unknown> & ValidkitErrorOptions = {},
		code = "DEFINITION_ERROR",
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message, code, ErrorCategory.Definition, rest, hint);
		this.name = "DefinitionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A type name was not found in the type registry. */
export class UnknownTypeError extends DefinitionError {
	readonly typeName: string;

	constructor(typeName: string, known: readonly string[]) {
		super(
			`Unknown type: ${typeName}`,
			{ typeName, known: [...known] },
			"UNKNOWN_TYPE",
			`Registered types: ${known.join(", ")}`,
		);
		this.name = "UnknownTypeError";
		this.typeName = typeName;
	}
}

/** A constraint name was not found in the constraint registry. */
export class UnknownConstraintError extends DefinitionError {
	readonly constraintName: string;

	constructor(constraintName: string, known: readonly string[]) {
		super(
			`Unknown constraint: ${constraintName}`,
			{ constraintName, known: [...known] },
			"UNKNOWN_CONSTRAINT",
			`Registered constraints: ${known.join(", ")}`,
		);
		this.name = "UnknownConstraintError";
		this.constraintName = constraintName;
	}
}

/** The same field name was declared twice in one schema. */
export class DuplicateFieldError extends DefinitionError {
	readonly fieldName: string;

	constructor(fieldName: string) {
		super(`Field ${fieldName} already defined`, { fieldName }, "DUPLICATE_FIELD");
		this.name = "DuplicateFieldError";
		this.fieldName = fieldName;
	}
}

/** A registry already holds an entry under this name. */
export class DuplicateRegistrationError extends DefinitionError {
	constructor(registry: string, name: string) {
		super(
			`${registry} "${name}" is already registered`,
			{ registry, name },
			"DUPLICATE_REGISTRATION",
		);
		this.name = "DuplicateRegistrationError";
	}
}

// ── Contract errors ──────────────────────────────────────────────────

/** `safeParse` was handed something that is not a key-value structure. */
export class InvalidInputError extends ValidkitError {
	constructor(message: string, context: Record<string, unknown> & ValidkitErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_INPUT", ErrorCategory.Contract, rest);
		this.name = "InvalidInputError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Config errors ────────────────────────────────────────────────────

/** Invalid or missing engine configuration. */
export class ConfigError extends ValidkitError {
	constructor(message: string, context: Record<string, unknown> & ValidkitErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Config, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for DefinitionError (and its subclasses). */
export function isDefinitionError(e: unknown): e is DefinitionError {
	return e instanceof DefinitionError;
}

/** Type guard for InvalidInputError. */
export function isInvalidInputError(e: unknown): e is InvalidInputError {
	return e instanceof InvalidInputError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
