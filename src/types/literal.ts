import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { inspectValue, valuesEqual } from "../shared/values.js";
import { ScalarType } from "./base.js";
import { coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

/** Exact membership without conversion: `1` never matches `"1"`. */
export class LiteralType extends ScalarType<unknown> {
	readonly spec: TypeSpec;
	private readonly values: readonly unknown[];

	constructor(values: readonly unknown[]) {
		super();
		if (values.length === 0) {
			throw new DefinitionError("Literal type requires at least one value");
		}
		this.values = Object.freeze([...values]);
		this.spec = { kind: "literal", values: this.values };
	}

	typeName(): string {
		return this.values.map(inspectValue).join(" | ");
	}

	coerce(raw: unknown): Coerced<unknown> {
		return coerced(raw);
	}

	isValid(value: unknown): value is unknown {
		return this.values.some((allowed) => valuesEqual(allowed, value));
	}

	coercionMessage(raw: unknown, messages: MessageCatalog): string {
		return this.invalidMessage(raw, messages);
	}

	invalidMessage(value: unknown, messages: MessageCatalog): string {
		return messages.render("literal", { expected: this.typeName(), actual: inspectValue(value) });
	}
}
