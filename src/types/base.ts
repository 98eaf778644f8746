import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { err, ok } from "../shared/result.js";
import { describeValue } from "../shared/values.js";
import type { Coerced, EvalEnv, SchemaType, TypeResult, TypeSpec } from "./types.js";

/**
 * Base for types whose evaluation is coerce-then-validate with a single
 * `type_error` at the current path. Structural types override `evaluate`.
 */
export abstract class ScalarType<T> implements SchemaType<T> {
	abstract readonly spec: TypeSpec;

	abstract typeName(): string;

	abstract coerce(raw: unknown): Coerced<T>;

	abstract isValid(value: unknown): value is T;

	evaluate(raw: unknown, path: readonly PathSegment[], env: EvalEnv): TypeResult<T> {
		const result = this.coerce(raw);
		if (result.status === "failed") {
			return err([issue(path, this.coercionMessage(raw, env.messages), IssueCode.TypeError)]);
		}
		if (!this.isValid(result.value)) {
			return err([
				issue(path, this.invalidMessage(result.value, env.messages), IssueCode.TypeError),
			]);
		}
		return ok(result.value);
	}

	coercionMessage(raw: unknown, messages: MessageCatalog): string {
		return messages.render("type_coercion", { actual: describeValue(raw), type: this.typeName() });
	}

	invalidMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("type_invalid", { type: this.typeName() });
	}
}
