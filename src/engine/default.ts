import type { Schema } from "../schema/schema.js";
import type { SchemaBuild, SchemaOptions } from "../schema/types.js";
import { createEngine } from "./engine.js";
import type { Engine } from "./engine.js";

/** Engine behind the top-level `schema` function: built-ins only, silent logger. */
export const defaultEngine: Engine = createEngine();

/**
 * Builds a schema with the default engine.
 *
 * @example
 * ```ts
 * const signup = schema((s) => {
 *   s.field("email", "string", { format: "email" });
 *   s.field("age", "integer", { min: 13 });
 * });
 * signup.safeParse({ email: "ada@example.com", age: "36" });
 * ```
 */
export function schema(build: SchemaBuild, options?: SchemaOptions): Schema {
	return defaultEngine.schema(build, options);
}
