/**
 * Webhook events: discriminated unions, plug-in types and JSON output.
 *
 * Run: npx tsx examples/webhook-events.ts
 */

import { ValidationError, createEngine, dumpJson, serializeIssues } from "../src/index.js";

const engine = createEngine({ config: { name: "webhooks", logLevel: "info" } })
	.defineType("currency", {
		coerce: (raw) => (typeof raw === "string" ? raw.trim().toUpperCase() : raw),
		validate: (value) => typeof value === "string" && /^[A-Z]{3}$/.test(value),
		message: () => "must be a three-letter currency code",
	})
	.defineConstraint("positive", {
		check: (value) => typeof value === "number" && value > 0,
		message: () => "must be positive",
	});

// ── Event payloads ───────────────────────────────────────────────────

const paymentSucceeded = engine.schema((s) => {
	s.field("type", "string");
	s.field("amountCents", "integer", { constraints: { positive: true } });
	s.field("currency", "currency");
	s.field("paidAt", "datetime");
});

const refundIssued = engine.schema((s) => {
	s.field("type", "string");
	s.field("paymentId", "string", { format: "uuid" });
	s.optional("reason", "string", { length: { max: 200 } });
});

const envelope = engine.schema((s) => {
	s.field("id", "string", { format: "uuid" });
	s.field("event", "discriminated_union", {
		discriminator: "type",
		mapping: { "payment.succeeded": paymentSucceeded, "refund.issued": refundIssued },
	});
});

// ── Run ──────────────────────────────────────────────────────────────

const payload = {
	id: "5f1d7a3e-0c2b-4d6e-9a8f-1b2c3d4e5f6a",
	event: {
		type: "payment.succeeded",
		amountCents: "1999",
		currency: " eur ",
		paidAt: 1709287200,
	},
};

engine.logger.info({ json: dumpJson(envelope.dump(payload)) }, "event accepted");

try {
	envelope.parse({ id: payload.id, event: { type: "payout.created" } });
} catch (e) {
	if (!(e instanceof ValidationError)) throw e;
	engine.logger.info(serializeIssues(e.errors), "event rejected");
}
