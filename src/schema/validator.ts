import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import type { Context } from "../shared/context.js";

/**
 * What a schema-level validator sees: the validated output of every field
 * and a way to report issues against it.
 */
export interface ValidatorScope {
	readonly data: Readonly<Record<string, unknown>>;
	readonly context: Context;
	get(key: string): unknown;
	/** Reports an issue at the named field. */
	error(field: string, message: string): void;
	/** Reports an issue at the schema itself. */
	baseError(message: string): void;
}

/** Cross-field check. Runs only after every field validated. */
export type SchemaValidator = (scope: ValidatorScope) => void;

/** Runs validators in order and returns everything they reported, with code `custom`. */
export function runValidators(
	validators: readonly SchemaValidator[],
	data: Readonly<Record<string, unknown>>,
	pathPrefix: readonly PathSegment[],
	context: Context,
): ValidationIssue[] {
	const issues: ValidationIssue[] = [];
	const scope: ValidatorScope = {
		data,
		context,
		get: (key) => (Object.hasOwn(data, key) ? data[key] : undefined),
		error: (field, message) => {
			issues.push(issue([...pathPrefix, field], message, IssueCode.Custom));
		},
		baseError: (message) => {
			issues.push(issue(pathPrefix, message, IssueCode.Custom));
		},
	};
	for (const validator of validators) {
		validator(scope);
	}
	return issues;
}
