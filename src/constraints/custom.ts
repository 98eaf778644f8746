import type { MessageCatalog } from "../issues/messages.js";
import { BaseConstraint } from "./base.js";
import type { ConstraintSpec, CustomConstraintDefinition } from "./types.js";

/** A registry plug-in bound to the options given on one field. */
export class CustomConstraint extends BaseConstraint {
	readonly spec: ConstraintSpec;
	readonly code: string;
	private readonly definition: CustomConstraintDefinition;
	private readonly options: unknown;

	constructor(name: string, definition: CustomConstraintDefinition, options: unknown) {
		super();
		this.definition = definition;
		this.options = options;
		this.code = definition.code ?? name;
		this.spec = { kind: "custom", name, options };
	}

	isValid(value: unknown): boolean {
		return this.definition.check(value, this.options);
	}

	errorMessage(value: unknown, messages: MessageCatalog): string {
		const message = this.definition.message;
		return message ? message(value, this.options) : messages.render("refinement");
	}
}
