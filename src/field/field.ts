import type { ConstraintRegistry } from "../constraints/registry.js";
import type { Constraint } from "../constraints/types.js";
import { IssueCode, issue, withMessage } from "../issues/issue.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import type { Context } from "../shared/context.js";
import { DefinitionError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { EvalEnv, SchemaType } from "../types/types.js";
import { buildRefinements } from "./refinement.js";
import type { Refinement } from "./refinement.js";
import type {
	ConditionWithContext,
	FieldData,
	FieldDefinitionOptions,
	FieldInput,
	FieldOutcome,
	FieldScope,
	ValueWithContextFn,
} from "./types.js";

const OMITTED: FieldOutcome = { status: "omitted" };

function valueOutcome(value: unknown): FieldOutcome {
	return { status: "value", value: value === undefined ? null : value };
}

function isNullish(value: unknown): value is null | undefined {
	return value === null || value === undefined;
}

/** Sibling shorthand: anything but null, undefined and false counts. */
function isTruthy(value: unknown): boolean {
	return !isNullish(value) && value !== false;
}

// ── Option normalisation ────────────────────────────────────────────

/**
 * Picks the plain or the context-aware form of a callback option.
 * @throws DefinitionError when both forms are given
 */
function eitherForm<V>(
	field: string,
	option: string,
	plain: ((value: V) => unknown) | undefined,
	withContext: ((value: V, context: Context) => unknown) | undefined,
): ((value: V, context: Context) => unknown) | undefined {
	if (plain !== undefined && withContext !== undefined) {
		throw new DefinitionError(
			`Field ${field} accepts only one of ${option} and ${option}WithContext`,
			{ field, option },
		);
	}
	if (plain !== undefined) return (value) => plain(value);
	return withContext;
}

function conditionOf(
	field: string,
	option: "when" | "unless",
	plain: string | ((data: FieldData) => boolean) | undefined,
	withContext: ConditionWithContext | undefined,
): ConditionWithContext | undefined {
	if (typeof plain === "string") {
		if (withContext !== undefined) {
			throw new DefinitionError(
				`Field ${field} accepts only one of ${option} and ${option}WithContext`,
				{ field, option },
			);
		}
		const sibling = plain;
		return (data) => isTruthy(Object.hasOwn(data, sibling) ? data[sibling] : undefined);
	}
	const resolved = eitherForm(field, option, plain, withContext);
	return resolved === undefined ? undefined : (data, context) => Boolean(resolved(data, context));
}

function buildConstraints(
	options: FieldDefinitionOptions,
	registry: ConstraintRegistry,
): readonly Constraint[] {
	const constraints: Constraint[] = [];
	if (options.min !== undefined) constraints.push(registry.build("min", options.min));
	if (options.max !== undefined) constraints.push(registry.build("max", options.max));
	if (options.length !== undefined) constraints.push(registry.build("length", options.length));
	if (options.format !== undefined) constraints.push(registry.build("format", options.format));
	if (options.enum !== undefined) constraints.push(registry.build("enum", options.enum));
	for (const [name, constraintOptions] of Object.entries(options.constraints ?? {})) {
		constraints.push(registry.build(name, constraintOptions));
	}
	return Object.freeze(constraints);
}

// ── Field ───────────────────────────────────────────────────────────

interface FieldParts {
	readonly name: string;
	readonly type: SchemaType;
	readonly constraints: readonly Constraint[];
	readonly refinements: readonly Refinement[];
	readonly optional: boolean;
	readonly nullable: boolean;
	readonly coerce: boolean;
	readonly defaultValue: { readonly thunk: () => unknown } | undefined;
	readonly preprocess: ValueWithContextFn | undefined;
	readonly transform: ValueWithContextFn | undefined;
	readonly when: ConditionWithContext | undefined;
	readonly unless: ConditionWithContext | undefined;
	readonly message: string | undefined;
}

/**
 * One named, typed slot of a schema with its evaluation policy.
 *
 * Evaluation runs a fixed pipeline: conditional gate, missing value
 * handling, preprocess, null handling, coercion, constraints, refinements,
 * transform. It stops at the first step that reports issues; constraints
 * and refinements each report all of theirs.
 */
export class Field {
	readonly name: string;
	readonly type: SchemaType;
	readonly constraints: readonly Constraint[];
	readonly refinements: readonly Refinement[];
	readonly optional: boolean;
	readonly nullable: boolean;
	readonly coerce: boolean;
	readonly message: string | undefined;
	private readonly parts: FieldParts;

	private constructor(parts: FieldParts) {
		this.parts = parts;
		this.name = parts.name;
		this.type = parts.type;
		this.constraints = parts.constraints;
		this.refinements = parts.refinements;
		this.optional = parts.optional;
		this.nullable = parts.nullable;
		this.coerce = parts.coerce;
		this.message = parts.message;
		Object.freeze(this);
	}

	/**
	 * Builds a field from an already resolved type and its options.
	 * @throws DefinitionError for conflicting or malformed options
	 * @throws UnknownConstraintError for an unregistered entry in `constraints`
	 */
	static create(
		name: string,
		type: SchemaType,
		options: FieldDefinitionOptions,
		constraints: ConstraintRegistry,
	): Field {
		if (name.length === 0) {
			throw new DefinitionError("Field name must not be empty");
		}
		if (options.default !== undefined && options.defaultFn !== undefined) {
			throw new DefinitionError(`Field ${name} accepts only one of default and defaultFn`, {
				field: name,
			});
		}
		const fixed = options.default;
		const defaultFn = options.defaultFn;
		const defaultValue =
			defaultFn !== undefined
				? { thunk: defaultFn }
				: fixed !== undefined
					? { thunk: () => fixed }
					: undefined;

		return new Field({
			name,
			type,
			constraints: buildConstraints(options, constraints),
			refinements: buildRefinements(options.refine, name),
			optional: options.optional === true,
			nullable: options.nullable === true,
			coerce: options.coerce !== false,
			defaultValue,
			preprocess: eitherForm(name, "preprocess", options.preprocess, options.preprocessWithContext),
			transform: eitherForm(name, "transform", options.transform, options.transformWithContext),
			when: conditionOf(name, "when", options.when, options.whenWithContext),
			unless: conditionOf(name, "unless", options.unless, options.unlessWithContext),
			message: options.message,
		});
	}

	// ── Flags ───────────────────────────────────────────────────────

	get required(): boolean {
		return !this.optional;
	}

	get hasDefault(): boolean {
		return this.parts.defaultValue !== undefined;
	}

	get conditional(): boolean {
		return this.parts.when !== undefined || this.parts.unless !== undefined;
	}

	/** Evaluates the default. Undefined when the field has none. */
	defaultValue(): unknown {
		return this.parts.defaultValue?.thunk();
	}

	/** Same field, optional. */
	asOptional(): Field {
		return this.optional ? this : new Field({ ...this.parts, optional: true });
	}

	/** Configured constraint options keyed by constraint name. */
	constraintValues(): Readonly<Record<string, unknown>> {
		const values: Record<string, unknown> = {};
		for (const constraint of this.constraints) {
			const spec = constraint.spec;
			switch (spec.kind) {
				case "min":
				case "max":
					values[spec.kind] = spec.value;
					break;
				case "length":
					values.length = spec.mode;
					break;
				case "format":
					values.format = spec.name ?? spec.pattern;
					break;
				case "enum":
					values.enum = spec.values;
					break;
				case "custom":
					values[spec.name] = spec.options;
					break;
			}
		}
		return Object.freeze(values);
	}

	// ── Evaluation ──────────────────────────────────────────────────

	/** Runs the pipeline for one input value. Issues are reported under `pathPrefix + [name]`. */
	evaluate(input: FieldInput, scope: FieldScope): FieldOutcome {
		const path = [...scope.pathPrefix, this.name];
		const { env } = scope;
		const context = env.context;

		if (this.conditional && !this.shouldValidate(scope.data, context)) {
			if (input.status === "absent" || isNullish(input.value)) return OMITTED;
			return this.settle(this.applyTransform(this.applyPreprocess(input.value, context), context));
		}

		if (input.status === "absent") return this.resolveMissing(path, env);

		const value = this.applyPreprocess(input.value, context);
		if (isNullish(value)) {
			return this.nullable ? valueOutcome(null) : this.resolveMissing(path, env);
		}

		const typed = this.coerceValue(value, path, env);
		if (!typed.ok) return this.invalid(typed.error);
		const coerced = typed.value;

		const constraintIssues = this.constraints.flatMap((constraint) =>
			constraint.evaluate(coerced, path, env.messages),
		);
		if (constraintIssues.length > 0) return this.invalid(constraintIssues);

		const refinementIssues = this.checkRefinements(coerced, path, env);
		if (refinementIssues.length > 0) return this.invalid(refinementIssues);

		return this.settle(this.applyTransform(coerced, context));
	}

	private shouldValidate(data: FieldData, context: Context): boolean {
		const { when, unless } = this.parts;
		if (when !== undefined && !when(data, context)) return false;
		if (unless !== undefined && unless(data, context)) return false;
		return true;
	}

	private resolveMissing(path: readonly PathSegment[], env: EvalEnv): FieldOutcome {
		const fallback = this.parts.defaultValue;
		if (fallback !== undefined) {
			const value = this.applyPreprocess(fallback.thunk(), env.context);
			return valueOutcome(this.applyTransform(value, env.context));
		}
		if (this.optional) return OMITTED;
		return this.invalid([issue(path, env.messages.render("required"), IssueCode.Required)]);
	}

	private coerceValue(
		value: unknown,
		path: readonly PathSegment[],
		env: EvalEnv,
	): Result<unknown, readonly ValidationIssue[]> {
		if (this.coerce) return this.type.evaluate(value, path, env);
		if (this.type.isValid(value)) return ok(value);
		return err([issue(path, this.type.invalidMessage(value, env.messages), IssueCode.TypeError)]);
	}

	private checkRefinements(
		value: unknown,
		path: readonly PathSegment[],
		env: EvalEnv,
	): ValidationIssue[] {
		const issues: ValidationIssue[] = [];
		for (const refinement of this.refinements) {
			if (refinement.test(value, env.context)) continue;
			const { message } = refinement;
			const text =
				message === undefined
					? env.messages.render("refinement")
					: typeof message === "string"
						? message
						: message(value);
			issues.push(issue(path, text, IssueCode.Refinement));
		}
		return issues;
	}

	private applyPreprocess(value: unknown, context: Context): unknown {
		const preprocess = this.parts.preprocess;
		return preprocess === undefined ? value : preprocess(value, context);
	}

	private applyTransform(value: unknown, context: Context): unknown {
		const transform = this.parts.transform;
		return transform === undefined ? value : transform(value, context);
	}

	/** Optional fields without a default drop a null result; others store it as null. */
	private settle(value: unknown): FieldOutcome {
		if (isNullish(value) && this.optional && !this.hasDefault) return OMITTED;
		return valueOutcome(value);
	}

	private invalid(issues: readonly ValidationIssue[]): FieldOutcome {
		const message = this.message;
		return {
			status: "invalid",
			issues: message === undefined ? issues : issues.map((found) => withMessage(found, message)),
		};
	}
}
