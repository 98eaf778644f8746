import { IssueCode } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { inspectValue, valuesEqual } from "../shared/values.js";
import { BaseConstraint } from "./base.js";
import type { ConstraintSpec } from "./types.js";

/** Membership in a frozen, non-empty allowed list. */
export class EnumConstraint extends BaseConstraint {
	readonly spec: ConstraintSpec;
	readonly code = IssueCode.Enum;
	private readonly allowed: readonly unknown[];

	constructor(values: unknown) {
		super();
		if (!Array.isArray(values) || values.length === 0) {
			throw new DefinitionError("Enum requires at least one allowed value", { constraint: "enum" });
		}
		this.allowed = Object.freeze([...values]);
		this.spec = { kind: "enum", values: this.allowed };
	}

	isValid(value: unknown): boolean {
		return this.allowed.some((allowed) => valuesEqual(allowed, value));
	}

	errorMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("enum", { values: this.allowed.map(inspectValue).join(", ") });
	}
}
