import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { isKeyValue, normalizeKeys } from "../shared/records.js";
import { err } from "../shared/result.js";
import { inspectValue } from "../shared/values.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, EvalEnv, NestedSchema, SchemaType, TypeResult, TypeSpec } from "./types.js";

type Output = Readonly<Record<string, unknown>>;

/**
 * Picks a schema by the value of one field of the input.
 *
 * A missing discriminator reports `discriminator_missing` and an unmapped one
 * `invalid_discriminator`, both at `path + [discriminator]`. Otherwise the
 * mapped schema runs on the whole input.
 */
export class DiscriminatedUnionType implements SchemaType<Output> {
	readonly spec: TypeSpec;
	private readonly discriminator: string;
	private readonly mapping: ReadonlyMap<string, NestedSchema>;

	constructor(discriminator: string, mapping: ReadonlyMap<string, NestedSchema>) {
		if (discriminator.length === 0) {
			throw new DefinitionError("Discriminated union requires a discriminator field name");
		}
		if (mapping.size === 0) {
			throw new DefinitionError("Discriminated union requires a non-empty mapping", {
				discriminator,
			});
		}
		this.discriminator = discriminator;
		this.mapping = new Map(mapping);
		this.spec = { kind: "discriminated_union", discriminator, mapping: this.mapping };
	}

	typeName(): string {
		return `discriminated_union<${this.discriminator}: ${this.quotedKeys().join(" | ")}>`;
	}

	coerce(raw: unknown): Coerced<Output> {
		return isKeyValue(raw) ? coerced(Object.fromEntries(normalizeKeys(raw))) : COERCION_FAILED;
	}

	isValid(value: unknown): value is Output {
		return isKeyValue(value);
	}

	invalidMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("not_object");
	}

	evaluate(raw: unknown, path: readonly PathSegment[], env: EvalEnv): TypeResult<Output> {
		if (!isKeyValue(raw)) {
			return err([issue(path, this.invalidMessage(raw, env.messages), IssueCode.TypeError)]);
		}

		const discriminatorPath = [...path, this.discriminator];
		const value = normalizeKeys(raw).get(this.discriminator);
		if (value === undefined || value === null) {
			return err([
				issue(
					discriminatorPath,
					env.messages.render("discriminator_missing"),
					IssueCode.DiscriminatorMissing,
				),
			]);
		}

		const schema = this.lookup(value);
		if (!schema) {
			const message = env.messages.render("invalid_discriminator", {
				values: this.quotedKeys().join(", "),
			});
			return err([issue(discriminatorPath, message, IssueCode.InvalidDiscriminator)]);
		}

		return schema.run(raw, path, env);
	}

	private lookup(value: unknown): NestedSchema | undefined {
		if (typeof value === "string") return this.mapping.get(value);
		if (typeof value === "symbol") return this.mapping.get(value.description ?? "");
		return undefined;
	}

	private quotedKeys(): string[] {
		return [...this.mapping.keys()].map(inspectValue);
	}
}
