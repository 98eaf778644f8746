import { bench, describe } from "vitest";
import { createEngine } from "../src/engine/engine.js";

const engine = createEngine();

const address = engine.schema((s) => {
	s.field("street", "string", { min: 1 });
	s.field("city", "string");
	s.optional("zip", "string", { format: "numeric" });
});

const customer = engine.schema((s) => {
	s.field("id", "integer", { min: 1 });
	s.field("email", "string", { format: "email" });
	s.field("balance", "decimal", { min: 0 });
	s.field("tier", "string", { enum: ["free", "pro", "team"], default: "free" });
	s.field("addresses", "array", { of: address });
	s.optional("tags", "array", { of: "string" });
});

const valid = {
	id: "42",
	email: "ada@example.com",
	balance: "1250.75",
	addresses: [
		{ street: "1 Main St", city: "Oslo", zip: "0150" },
		{ street: "2 Side Rd", city: "Bergen" },
	],
	tags: ["vip", "beta"],
};

const invalid = {
	id: "0",
	email: "nope",
	balance: "-1",
	addresses: [{ street: "", zip: "x" }],
};

describe("schema parsing", () => {
	bench("safeParse valid record 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			customer.safeParse(valid);
		}
	});

	bench("safeParse invalid record 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			customer.safeParse(invalid);
		}
	});

	bench("dump valid record 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			customer.dump(valid);
		}
	});
});

describe("schema building", () => {
	bench("define customer schema 100x", () => {
		for (let i = 0; i < 100; i++) {
			customer.extend((s) => s.optional("note", "string"));
		}
	});
});
