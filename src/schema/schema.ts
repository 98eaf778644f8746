import type { Field } from "../field/field.js";
import { ABSENT, present } from "../field/types.js";
import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import { failure, mapSuccess, success } from "../issues/parse-result.js";
import type { ParseResult } from "../issues/parse-result.js";
import { ValidationError } from "../issues/validation-error.js";
import { serializeValue } from "../serialize/serializer.js";
import type { JsonValue } from "../serialize/serializer.js";
import { Context } from "../shared/context.js";
import { DefinitionError, InvalidInputError } from "../shared/errors.js";
import { isKeyValue, normalizeKeys } from "../shared/records.js";
import type { KeyValueInput } from "../shared/records.js";
import { err, ok } from "../shared/result.js";
import { describeValue } from "../shared/values.js";
import type { EvalEnv, NestedSchema, TypeResult } from "../types/types.js";
import { SchemaBuilder } from "./builder.js";
import { describeSchema } from "./introspection.js";
import type { SchemaDescription } from "./introspection.js";
import type {
	ParseOptions,
	ResolvedSchemaOptions,
	SchemaBuild,
	SchemaDeps,
	SchemaOptions,
} from "./types.js";
import { runValidators } from "./validator.js";
import type { SchemaValidator } from "./validator.js";

/** Validated output: declared fields in declaration order, frozen. */
export type SchemaOutput = Readonly<Record<string, unknown>>;

/** @throws InvalidInputError for anything but null, undefined, a plain object or a Map */
function acceptInput(input: unknown): KeyValueInput | undefined {
	if (input === null || input === undefined) return undefined;
	if (isKeyValue(input)) return input;
	throw new InvalidInputError(`Expected a key-value structure, got ${describeValue(input)}`, {
		actual: describeValue(input),
	});
}

function resolveOptions(options: SchemaOptions): ResolvedSchemaOptions {
	return Object.freeze({
		strict: options.strict === true,
		passthrough: options.passthrough === true,
	});
}

/**
 * Immutable ordered set of fields plus schema-level validators.
 *
 * `safeParse` never throws for bad data: every problem becomes an issue in
 * the returned Failure. Only a non key-value input, which is a caller bug,
 * throws.
 */
export class Schema implements NestedSchema {
	readonly options: ResolvedSchemaOptions;
	private readonly fieldMap: ReadonlyMap<string, Field>;
	private readonly validators: readonly SchemaValidator[];
	private readonly deps: SchemaDeps;

	private constructor(
		fields: ReadonlyMap<string, Field>,
		validators: readonly SchemaValidator[],
		options: ResolvedSchemaOptions,
		deps: SchemaDeps,
	) {
		this.fieldMap = fields;
		this.validators = validators;
		this.options = options;
		this.deps = deps;
		Object.freeze(this);
	}

	// ── Construction ────────────────────────────────────────────────

	/**
	 * Runs a builder callback and freezes the result.
	 * @throws DefinitionError (and subclasses) for any misconfigured field
	 */
	static define(build: SchemaBuild | undefined, options: SchemaOptions, deps: SchemaDeps): Schema {
		const builder = SchemaBuilder.create(deps);
		build?.(builder);
		return builder.build(options);
	}

	/** Assembles a schema from already built fields. Used by the builder and composition. */
	static fromParts(
		fields: Iterable<Field>,
		validators: readonly SchemaValidator[],
		options: SchemaOptions,
		deps: SchemaDeps,
	): Schema {
		const map = new Map<string, Field>();
		for (const field of fields) map.set(field.name, field);
		const schema = new Schema(map, Object.freeze([...validators]), resolveOptions(options), deps);
		deps.logger.debug(
			{ fields: map.size, validators: validators.length, ...schema.options },
			"schema built",
		);
		return schema;
	}

	// ── Parsing ─────────────────────────────────────────────────────

	/**
	 * Validates and coerces `input`. `null` and `undefined` read as `{}`.
	 * @throws InvalidInputError if the input is not a plain object or a Map
	 */
	safeParse(input: unknown, options: ParseOptions = {}): ParseResult<SchemaOutput> {
		const source = acceptInput(input);
		const pathPrefix = options.pathPrefix ?? [];
		const env: EvalEnv = { context: Context.from(options.context), messages: this.deps.messages };
		const result = this.evaluate(source, pathPrefix, env);
		if (result.ok) return success(result.value);

		this.deps.logger.debug(
			{ issueCount: result.error.length, pathPrefix: pathPrefix.map(String).join(".") },
			"parse failed",
		);
		return failure(result.error);
	}

	/**
	 * Like `safeParse`, returning the data directly.
	 * @throws ValidationError carrying every issue when validation fails
	 */
	parse(input: unknown, options: ParseOptions = {}): SchemaOutput {
		const result = this.safeParse(input, options);
		if (!result.success) throw new ValidationError(result.errors);
		return result.data;
	}

	/** Nested entry point used by object and discriminated union types. */
	run(input: unknown, pathPrefix: readonly PathSegment[], env: EvalEnv): TypeResult<SchemaOutput> {
		if (input === null || input === undefined) return this.evaluate(undefined, pathPrefix, env);
		if (!isKeyValue(input)) {
			return err([issue(pathPrefix, env.messages.render("not_object"), IssueCode.TypeError)]);
		}
		return this.evaluate(input, pathPrefix, env);
	}

	/**
	 * Parses, then serializes the output to JSON-safe values.
	 * @throws ValidationError when validation fails
	 */
	dump(input: unknown, options: ParseOptions = {}): JsonValue {
		return serializeValue(this.parse(input, options));
	}

	safeDump(input: unknown, options: ParseOptions = {}): ParseResult<JsonValue> {
		return mapSuccess(this.safeParse(input, options), serializeValue);
	}

	private evaluate(
		input: KeyValueInput | undefined,
		pathPrefix: readonly PathSegment[],
		env: EvalEnv,
	): TypeResult<SchemaOutput> {
		const normalized = input === undefined ? new Map<string, unknown>() : normalizeKeys(input);
		const data: SchemaOutput = Object.freeze(Object.fromEntries(normalized));
		const scope = { pathPrefix, data, env };

		const issues: ValidationIssue[] = [];
		const entries: [string, unknown][] = [];
		for (const field of this.fieldMap.values()) {
			const raw = normalized.has(field.name) ? present(normalized.get(field.name)) : ABSENT;
			const outcome = field.evaluate(raw, scope);
			switch (outcome.status) {
				case "value":
					entries.push([field.name, outcome.value]);
					break;
				case "invalid":
					issues.push(...outcome.issues);
					break;
				case "omitted":
					break;
			}
		}
		if (issues.length > 0) return err(issues);

		if (this.options.passthrough) {
			for (const [key, value] of normalized) {
				if (!this.fieldMap.has(key)) entries.push([key, value]);
			}
		}
		const output: SchemaOutput = Object.freeze(Object.fromEntries(entries));

		const validatorIssues = runValidators(this.validators, output, pathPrefix, env.context);
		return validatorIssues.length > 0 ? err(validatorIssues) : ok(output);
	}

	// ── Introspection ───────────────────────────────────────────────

	get fields(): ReadonlyMap<string, Field> {
		return this.fieldMap;
	}

	get validatorCount(): number {
		return this.validators.length;
	}

	fieldNames(): string[] {
		return [...this.fieldMap.keys()];
	}

	field(name: string): Field | null {
		return this.fieldMap.get(name) ?? null;
	}

	hasField(name: string): boolean {
		return this.fieldMap.has(name);
	}

	/** Fields that fail when absent: required, unconditional and without default. */
	requiredFields(): string[] {
		return this.namesWhere((f) => f.required && !f.conditional && !f.hasDefault);
	}

	optionalFields(): string[] {
		return this.namesWhere((f) => f.optional);
	}

	conditionalFields(): string[] {
		return this.namesWhere((f) => f.conditional);
	}

	fieldsWithDefaults(): string[] {
		return this.namesWhere((f) => f.hasDefault);
	}

	describe(): SchemaDescription {
		return describeSchema(this.fieldMap.values(), this.options);
	}

	private namesWhere(predicate: (field: Field) => boolean): string[] {
		return [...this.fieldMap.values()].filter(predicate).map((f) => f.name);
	}

	// ── Composition ─────────────────────────────────────────────────

	/**
	 * New schema with this schema's fields and validators plus whatever
	 * `build` declares. Redeclaring an existing field throws.
	 */
	extend(build: SchemaBuild, options: SchemaOptions = {}): Schema {
		const builder = SchemaBuilder.create(this.deps, {
			fields: this.fieldMap.values(),
			validators: this.validators,
		});
		build(builder);
		return builder.build({ ...this.options, ...definedOptions(options) });
	}

	/** Fields of both; on a name clash the other schema's field wins. Validators of both run. */
	merge(other: Schema): Schema {
		const fields = new Map(this.fieldMap);
		for (const [name, field] of other.fieldMap) fields.set(name, field);
		return Schema.fromParts(
			fields.values(),
			[...this.validators, ...other.validators],
			other.options,
			this.deps,
		);
	}

	/** Every field optional. */
	partial(): Schema {
		return Schema.fromParts(
			[...this.fieldMap.values()].map((f) => f.asOptional()),
			this.validators,
			this.options,
			this.deps,
		);
	}

	/**
	 * Only the named fields. Validators are dropped: they may read fields
	 * that are gone.
	 * @throws DefinitionError for an undeclared name
	 */
	pick(...names: string[]): Schema {
		this.assertDeclared(names);
		const keep = new Set(names);
		return this.subset((f) => keep.has(f.name));
	}

	/**
	 * All but the named fields. Validators are dropped.
	 * @throws DefinitionError for an undeclared name
	 */
	omit(...names: string[]): Schema {
		this.assertDeclared(names);
		const drop = new Set(names);
		return this.subset((f) => !drop.has(f.name));
	}

	private subset(predicate: (field: Field) => boolean): Schema {
		return Schema.fromParts(
			[...this.fieldMap.values()].filter(predicate),
			[],
			this.options,
			this.deps,
		);
	}

	private assertDeclared(names: readonly string[]): void {
		const unknown = names.filter((name) => !this.fieldMap.has(name));
		if (unknown.length > 0) {
			throw new DefinitionError(`Unknown field: ${unknown.join(", ")}`, {
				fields: unknown,
				known: this.fieldNames(),
			});
		}
	}
}

function definedOptions(options: SchemaOptions): SchemaOptions {
	const defined: SchemaOptions = {};
	if (options.strict !== undefined) defined.strict = options.strict;
	if (options.passthrough !== undefined) defined.passthrough = options.passthrough;
	return defined;
}
