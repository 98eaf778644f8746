import { IssueCode } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { BaseConstraint } from "./base.js";
import { compareNumeric, formatThreshold, isNumeric, lengthOf } from "./measure.js";
import type { ConstraintSpec, Threshold } from "./types.js";

/**
 * Min and Max dispatch on the runtime value: numbers, bigints and Decimals
 * compare by value, anything with a length compares by length, and every
 * other value fails.
 */
abstract class BoundConstraint extends BaseConstraint {
	protected readonly threshold: Threshold;

	constructor(kind: "min" | "max", threshold: unknown) {
		super();
		if (!isNumeric(threshold) || (typeof threshold === "number" && Number.isNaN(threshold))) {
			throw new DefinitionError(`${kind} requires a numeric threshold`, {
				constraint: kind,
				threshold: String(threshold),
			});
		}
		this.threshold = threshold;
	}

	/** Whether `cmp(measured, threshold)` is acceptable. */
	protected abstract accepts(cmp: -1 | 0 | 1): boolean;

	isValid(value: unknown): boolean {
		const measured = isNumeric(value) ? value : lengthOf(value);
		if (measured === null) return false;
		const cmp = compareNumeric(measured, this.threshold);
		return cmp !== null && this.accepts(cmp);
	}

	protected render(
		value: unknown,
		messages: MessageCatalog,
		plain: "min" | "max",
		withLength: "min_length" | "max_length",
	): string {
		const threshold = formatThreshold(this.threshold);
		const length = isNumeric(value) ? null : lengthOf(value);
		return length === null
			? messages.render(plain, { value: threshold })
			: messages.render(withLength, { value: threshold, actual: length });
	}
}

export class MinConstraint extends BoundConstraint {
	readonly spec: ConstraintSpec;
	readonly code = IssueCode.Min;

	constructor(threshold: unknown) {
		super("min", threshold);
		this.spec = { kind: "min", value: this.threshold };
	}

	protected accepts(cmp: -1 | 0 | 1): boolean {
		return cmp >= 0;
	}

	errorMessage(value: unknown, messages: MessageCatalog): string {
		return this.render(value, messages, "min", "min_length");
	}
}

export class MaxConstraint extends BoundConstraint {
	readonly spec: ConstraintSpec;
	readonly code = IssueCode.Max;

	constructor(threshold: unknown) {
		super("max", threshold);
		this.spec = { kind: "max", value: this.threshold };
	}

	protected accepts(cmp: -1 | 0 | 1): boolean {
		return cmp <= 0;
	}

	errorMessage(value: unknown, messages: MessageCatalog): string {
		return this.render(value, messages, "max", "max_length");
	}
}
