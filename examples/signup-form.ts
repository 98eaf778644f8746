/**
 * Signup form: coercion, defaults, conditional fields and a cross-field check.
 *
 * Run: npx tsx examples/signup-form.ts
 */

import { createEngine, isFailure } from "../src/index.js";

const engine = createEngine({ config: { name: "signup", logLevel: "info" } });

// ── Schema ───────────────────────────────────────────────────────────

const signup = engine.schema((s) => {
	s.field("email", "string", {
		format: "email",
		preprocess: (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
	});
	s.field("password", "string", { length: { min: 12, max: 128 } });
	s.field("passwordConfirm", "string");
	s.optional("age", "integer", { min: 13, message: "you must be at least 13" });
	s.field("plan", "string", { enum: ["free", "pro"], default: "free" });
	s.field("company", "string", { when: (data) => data.plan === "pro" });
	s.optional("newsletter", "boolean", { default: false });

	s.validate(({ get, error }) => {
		if (get("password") !== get("passwordConfirm")) {
			error("passwordConfirm", "does not match password");
		}
	});
});

// ── Run ──────────────────────────────────────────────────────────────

const accepted = signup.safeParse({
	email: "  Ada@Example.COM ",
	password: "correct-horse-battery",
	passwordConfirm: "correct-horse-battery",
	age: "36",
	newsletter: "yes",
});

if (accepted.success) {
	engine.logger.info({ data: accepted.data }, "signup accepted");
}

const rejected = signup.safeParse({
	email: "ada",
	password: "short",
	passwordConfirm: "other",
	age: 9,
	plan: "pro",
});

if (isFailure(rejected)) {
	engine.logger.info({ errors: rejected.errors.toHash() }, "signup rejected");
}
