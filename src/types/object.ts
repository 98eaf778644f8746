import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { isKeyValue } from "../shared/records.js";
import type { KeyValueInput } from "../shared/records.js";
import { err, ok } from "../shared/result.js";
import { describeValue } from "../shared/values.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, EvalEnv, NestedSchema, SchemaType, TypeResult, TypeSpec } from "./types.js";

/**
 * Key-value input (plain object or Map). With a nested schema, the schema runs
 * with the current path as its prefix and its output replaces the input.
 */
export class ObjectType implements SchemaType<KeyValueInput> {
	readonly spec: TypeSpec;
	private readonly schema: NestedSchema | undefined;

	constructor(schema?: NestedSchema) {
		this.schema = schema;
		this.spec = { kind: "object", schema };
	}

	typeName(): string {
		return "object";
	}

	coerce(raw: unknown): Coerced<KeyValueInput> {
		return isKeyValue(raw) ? coerced(raw) : COERCION_FAILED;
	}

	isValid(value: unknown): value is KeyValueInput {
		return isKeyValue(value);
	}

	invalidMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("type_invalid", { type: this.typeName() });
	}

	evaluate(raw: unknown, path: readonly PathSegment[], env: EvalEnv): TypeResult<KeyValueInput> {
		if (!isKeyValue(raw)) {
			const message = env.messages.render("type_coercion", {
				actual: describeValue(raw),
				type: this.typeName(),
			});
			return err([issue(path, message, IssueCode.TypeError)]);
		}
		if (!this.schema) return ok(raw);
		return this.schema.run(raw, path, env);
	}
}
