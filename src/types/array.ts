import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment, ValidationIssue } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { err, ok } from "../shared/result.js";
import { describeValue } from "../shared/values.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, EvalEnv, SchemaType, TypeResult, TypeSpec } from "./types.js";

/**
 * Array, optionally of an item type. Every item is evaluated at
 * `path + [index]` and all item issues are collected.
 */
export class ArrayType implements SchemaType<readonly unknown[]> {
	readonly spec: TypeSpec;
	private readonly itemType: SchemaType | undefined;

	constructor(itemType?: SchemaType) {
		this.itemType = itemType;
		this.spec = { kind: "array", of: itemType };
	}

	typeName(): string {
		return this.itemType ? `array<${this.itemType.typeName()}>` : "array";
	}

	coerce(raw: unknown): Coerced<readonly unknown[]> {
		return Array.isArray(raw) ? coerced(raw) : COERCION_FAILED;
	}

	isValid(value: unknown): value is readonly unknown[] {
		return Array.isArray(value);
	}

	invalidMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("type_invalid", { type: this.typeName() });
	}

	evaluate(
		raw: unknown,
		path: readonly PathSegment[],
		env: EvalEnv,
	): TypeResult<readonly unknown[]> {
		if (!Array.isArray(raw)) {
			const message = env.messages.render("type_coercion", {
				actual: describeValue(raw),
				type: this.typeName(),
			});
			return err([issue(path, message, IssueCode.TypeError)]);
		}

		const itemType = this.itemType;
		if (!itemType) return ok(raw);

		const items: unknown[] = [];
		const issues: ValidationIssue[] = [];
		// Holes read as undefined.
		for (let index = 0; index < raw.length; index++) {
			const item: unknown = raw[index];
			const result = itemType.evaluate(item, [...path, index], env);
			if (result.ok) {
				items.push(result.value);
			} else {
				issues.push(...result.error);
			}
		}

		return issues.length === 0 ? ok(Object.freeze(items)) : err(issues);
	}
}
