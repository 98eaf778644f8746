import type { MessageCatalog } from "../issues/messages.js";
import { ScalarType } from "./base.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, CustomTypeDefinition, TypeSpec } from "./types.js";

/** A registry plug-in built from a {@link CustomTypeDefinition}. */
export class CustomType extends ScalarType<unknown> {
	readonly spec: TypeSpec;
	private readonly name: string;
	private readonly definition: CustomTypeDefinition;

	constructor(name: string, definition: CustomTypeDefinition) {
		super();
		this.name = name;
		this.definition = definition;
		this.spec = { kind: "custom", name };
	}

	typeName(): string {
		return this.definition.typeName ?? this.name;
	}

	coerce(raw: unknown): Coerced<unknown> {
		const coerce = this.definition.coerce;
		if (!coerce) return coerced(raw);
		try {
			return coerced(coerce(raw));
		} catch {
			return COERCION_FAILED;
		}
	}

	isValid(value: unknown): value is unknown {
		const validate = this.definition.validate;
		return validate ? validate(value) : true;
	}

	coercionMessage(raw: unknown, messages: MessageCatalog): string {
		const message = this.definition.message;
		return message ? message(raw) : super.coercionMessage(raw, messages);
	}

	invalidMessage(value: unknown, messages: MessageCatalog): string {
		const message = this.definition.message;
		return message ? message(value) : super.invalidMessage(value, messages);
	}
}
