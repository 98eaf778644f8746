import { IssueCode } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { isPlainRecord } from "../shared/records.js";
import { BaseConstraint } from "./base.js";
import { lengthOf } from "./measure.js";
import type { ConstraintSpec, LengthMode } from "./types.js";

/**
 * Field option for `length`: an exact count, an inclusive `[min, max]` range,
 * or an object naming exactly one mode.
 */
export type LengthOption =
	| number
	| readonly [number, number]
	| {
			readonly exact?: number;
			readonly min?: number;
			readonly max?: number;
			readonly range?: readonly [number, number];
	  };

function count(value: unknown, label: string): number {
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
		throw new DefinitionError(`length ${label} must be a non-negative integer`, {
			constraint: "length",
			[label]: String(value),
		});
	}
	return value;
}

function rangeOf(value: unknown): { min: number; max: number } {
	if (!Array.isArray(value) || value.length !== 2) {
		throw new DefinitionError("length range must be a [min, max] pair", { constraint: "length" });
	}
	const min = count(value[0], "range minimum");
	const max = count(value[1], "range maximum");
	if (min > max) {
		throw new DefinitionError(`length range is empty: [${min}, ${max}]`, { constraint: "length" });
	}
	return { min, max };
}

/**
 * Resolves a `length` option to exactly one mode.
 * @throws DefinitionError when no mode or conflicting modes are given
 */
export function parseLengthOption(option: unknown): LengthMode {
	if (typeof option === "number") return { kind: "exact", value: count(option, "exact") };
	if (Array.isArray(option)) return { kind: "range", ...rangeOf(option) };
	if (!isPlainRecord(option)) {
		throw new DefinitionError("length requires a count, a [min, max] range or an options object", {
			constraint: "length",
		});
	}

	const { exact, min, max, range } = option;
	const modes = [exact !== undefined, range !== undefined, min !== undefined || max !== undefined];
	const active = modes.filter(Boolean).length;
	if (active === 0) {
		throw new DefinitionError(
			"Length constraint requires at least one of: exact, min, max, or range",
			{ constraint: "length" },
		);
	}
	if (active > 1) {
		throw new DefinitionError("Length constraint accepts only one of: exact, range, or min/max", {
			constraint: "length",
		});
	}

	if (exact !== undefined) return { kind: "exact", value: count(exact, "exact") };
	if (range !== undefined) return { kind: "range", ...rangeOf(range) };
	if (min !== undefined && max !== undefined) {
		const bounds = rangeOf([min, max]);
		return { kind: "between", min: bounds.min, max: bounds.max };
	}
	if (min !== undefined) return { kind: "min", min: count(min, "min") };
	return { kind: "max", max: count(max, "max") };
}

export class LengthConstraint extends BaseConstraint {
	readonly spec: ConstraintSpec;
	readonly code = IssueCode.Length;
	private readonly mode: LengthMode;

	constructor(option: unknown) {
		super();
		this.mode = parseLengthOption(option);
		this.spec = { kind: "length", mode: this.mode };
	}

	isValid(value: unknown): boolean {
		const length = lengthOf(value);
		if (length === null) return false;
		const mode = this.mode;
		switch (mode.kind) {
			case "exact":
				return length === mode.value;
			case "min":
				return length >= mode.min;
			case "max":
				return length <= mode.max;
			case "between":
			case "range":
				return length >= mode.min && length <= mode.max;
		}
	}

	errorMessage(value: unknown, messages: MessageCatalog): string {
		const actual = lengthOf(value) ?? "N/A";
		const mode = this.mode;
		switch (mode.kind) {
			case "exact":
				return messages.render("length_exact", { value: mode.value, actual });
			case "min":
				return messages.render("length_min", { min: mode.min, actual });
			case "max":
				return messages.render("length_max", { max: mode.max, actual });
			case "between":
			case "range":
				return messages.render("length_range", { min: mode.min, max: mode.max, actual });
		}
	}
}
