/**
 * Settings validation: thin wrapper over Zod returning Result.
 *
 * Used for the engine's own configuration, never for user schemas. Keeping
 * Zod behind this module means only one import path knows about it.
 */

import { z } from "zod";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** One rejected setting, addressed by its path in the settings object. */
export interface SettingIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Validate settings against a Zod schema, returning a Result instead of throwing. */
export function validateSettings<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, readonly SettingIssue[]> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	return err(
		result.error.issues.map((i) => ({
			path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
			message: i.message,
		})),
	);
}

/** Render issues as `path: message` joined by `; `. */
export function describeSettingIssues(issues: readonly SettingIssue[]): string {
	return issues
		.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
		.join("; ");
}
