import { IssueCode } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { BaseConstraint } from "./base.js";
import { NAMED_FORMATS } from "./types.js";
import type { ConstraintSpec, NamedFormat } from "./types.js";

const FORMAT_PATTERNS: Readonly<Record<NamedFormat, RegExp>> = {
	email: /^[\w+\-.]+@[a-z\d-]+(\.[a-z\d-]+)*\.[a-z]+$/i,
	url: /^https?:\/\/[^\s/$.?#].[^\s]*$/i,
	uuid: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
	phone: /^\+?[\d\s\-().]{7,}$/,
	alphanumeric: /^[a-zA-Z0-9]+$/,
	alpha: /^[a-zA-Z]+$/,
	numeric: /^\d+$/,
	hex: /^[0-9a-fA-F]+$/,
	slug: /^[a-z0-9]+(?:-[a-z0-9]+)*$/,
};

/** Field option for `format`. */
export type FormatOption = RegExp | NamedFormat;

export function isNamedFormat(value: unknown): value is NamedFormat {
	return NAMED_FORMATS.some((name) => name === value);
}

/** `g` and `y` make `test` stateful; a copy without them is always safe to share. */
function statelessCopy(pattern: RegExp): RegExp {
	const flags = pattern.flags.replace(/[gy]/g, "");
	return new RegExp(pattern.source, flags);
}

/**
 * String pattern check. Non-strings always fail, whatever the pattern.
 * @throws DefinitionError for an unknown format name or a non-pattern option
 */
export class FormatConstraint extends BaseConstraint {
	readonly spec: ConstraintSpec;
	readonly code = IssueCode.Format;
	private readonly pattern: RegExp;
	private readonly formatName: NamedFormat | undefined;

	constructor(option: unknown) {
		super();
		if (option instanceof RegExp) {
			this.pattern = statelessCopy(option);
			this.formatName = undefined;
		} else if (typeof option === "string" || typeof option === "symbol") {
			const name = typeof option === "symbol" ? (option.description ?? "") : option;
			if (!isNamedFormat(name)) {
				throw new DefinitionError(
					`Unknown format: ${name}. Available: ${NAMED_FORMATS.join(", ")}`,
					{ constraint: "format", format: name },
				);
			}
			this.pattern = FORMAT_PATTERNS[name];
			this.formatName = name;
		} else {
			throw new DefinitionError("Format must be a RegExp or a named format", {
				constraint: "format",
			});
		}
		this.spec = { kind: "format", pattern: this.pattern, name: this.formatName };
	}

	isValid(value: unknown): boolean {
		return typeof value === "string" && this.pattern.test(value);
	}

	errorMessage(_value: unknown, messages: MessageCatalog): string {
		return this.formatName === undefined
			? messages.render("format", { pattern: String(this.pattern) })
			: messages.render("format_named", { name: this.formatName });
	}
}
