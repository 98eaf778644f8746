import { IssueCode, issue } from "../issues/issue.js";
import type { PathSegment } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import { DefinitionError } from "../shared/errors.js";
import { err } from "../shared/result.js";
import { COERCION_FAILED } from "./types.js";
import type { Coerced, EvalEnv, SchemaType, TypeResult, TypeSpec } from "./types.js";

/**
 * First member that evaluates successfully wins. When all fail, member
 * issues are discarded and one `union_type_error` lists the member names.
 */
export class UnionType implements SchemaType {
	readonly spec: TypeSpec;
	private readonly members: readonly SchemaType[];

	constructor(members: readonly SchemaType[]) {
		if (members.length === 0) {
			throw new DefinitionError("Union requires at least one member type");
		}
		this.members = Object.freeze([...members]);
		this.spec = { kind: "union", members: this.members };
	}

	typeName(): string {
		return `union<${this.memberNames().join(" | ")}>`;
	}

	coerce(raw: unknown): Coerced<unknown> {
		for (const member of this.members) {
			const result = member.coerce(raw);
			if (result.status === "coerced") return result;
		}
		return COERCION_FAILED;
	}

	isValid(value: unknown): value is unknown {
		return this.members.some((member) => member.isValid(value));
	}

	invalidMessage(_value: unknown, messages: MessageCatalog): string {
		return messages.render("union_type_error", { types: this.memberNames().join(", ") });
	}

	evaluate(raw: unknown, path: readonly PathSegment[], env: EvalEnv): TypeResult<unknown> {
		for (const member of this.members) {
			const result = member.evaluate(raw, path, env);
			if (result.ok) return result;
		}
		return err([
			issue(path, this.invalidMessage(raw, env.messages), IssueCode.UnionTypeError),
		]);
	}

	private memberNames(): string[] {
		return this.members.map((member) => member.typeName());
	}
}
