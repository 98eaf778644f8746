import { issue } from "../issues/issue.js";
import type { IssueCodeLike, PathSegment, ValidationIssue } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import type { Constraint, ConstraintSpec } from "./types.js";

const NO_ISSUES: readonly ValidationIssue[] = Object.freeze([]);

/** Generic evaluation shared by every constraint. */
export abstract class BaseConstraint implements Constraint {
	abstract readonly spec: ConstraintSpec;
	abstract readonly code: IssueCodeLike;

	abstract isValid(value: unknown): boolean;

	abstract errorMessage(value: unknown, messages: MessageCatalog): string;

	evaluate(
		value: unknown,
		path: readonly PathSegment[],
		messages: MessageCatalog,
	): readonly ValidationIssue[] {
		if (this.isValid(value)) return NO_ISSUES;
		return [issue(path, this.errorMessage(value, messages), this.code)];
	}
}
