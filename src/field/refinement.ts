import type { Context } from "../shared/context.js";
import { DefinitionError } from "../shared/errors.js";
import type { RefinementMessage, RefinementOption } from "./types.js";

/** A refinement with its check normalised to the context-aware form. */
export interface Refinement {
	readonly test: (value: unknown, context: Context) => boolean;
	/** Undefined means the catalog's `refinement` message */
	readonly message: RefinementMessage | undefined;
}

const NO_REFINEMENTS: readonly Refinement[] = Object.freeze([]);

function malformed(field: string, index: number, reason: string): DefinitionError {
	return new DefinitionError(`Invalid refinement #${index} on field ${field}: ${reason}`, {
		field,
		index,
	});
}

function messageOf(
	option: { readonly message?: RefinementMessage | undefined },
	field: string,
	index: number,
): RefinementMessage | undefined {
	const message = option.message;
	if (message === undefined || typeof message === "string" || typeof message === "function") {
		return message;
	}
	throw malformed(field, index, "message must be a string or a function");
}

function toRefinement(option: RefinementOption, field: string, index: number): Refinement {
	if (typeof option === "function") {
		return { test: (value) => option(value), message: undefined };
	}
	if (typeof option !== "object" || option === null) {
		throw malformed(field, index, "expected a function or a { check } object");
	}
	if ("check" in option && "checkWithContext" in option) {
		throw malformed(field, index, "give either check or checkWithContext, not both");
	}
	if ("checkWithContext" in option && typeof option.checkWithContext === "function") {
		const check = option.checkWithContext;
		return { test: (value, context) => check(value, context), message: messageOf(option, field, index) };
	}
	if ("check" in option && typeof option.check === "function") {
		const check = option.check;
		return { test: (value) => check(value), message: messageOf(option, field, index) };
	}
	throw malformed(field, index, "check must be a function");
}

/**
 * Normalises the `refine` option: one entry or a list, each a bare predicate,
 * `{ check, message? }` or `{ checkWithContext, message? }`.
 * @throws DefinitionError for a malformed entry
 */
export function buildRefinements(
	option: RefinementOption | readonly RefinementOption[] | undefined,
	field: string,
): readonly Refinement[] {
	if (option === undefined) return NO_REFINEMENTS;
	const list: readonly RefinementOption[] = isOptionList(option) ? option : [option];
	return Object.freeze(list.map((entry, index) => toRefinement(entry, field, index)));
}

function isOptionList(
	option: RefinementOption | readonly RefinementOption[],
): option is readonly RefinementOption[] {
	return Array.isArray(option);
}
