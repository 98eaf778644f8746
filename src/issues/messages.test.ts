import { describe, expect, it } from "vitest";
import {
	DEFAULT_MESSAGES,
	createMessageCatalog,
	defaultMessages,
	interpolate,
	isMessageKey,
} from "./messages.js";

describe("interpolate()", () => {
	it("replaces named placeholders", () => {
		expect(interpolate("must be at least %{value}", { value: 3 })).toBe("must be at least 3");
		expect(interpolate("%{a}-%{a}", { a: "x" })).toBe("x-x");
	});

	it("keeps unknown placeholders", () => {
		expect(interpolate("hello %{who}", {})).toBe("hello %{who}");
	});
});

describe("MessageCatalog", () => {
	it("renders the default texts", () => {
		expect(defaultMessages.render("required")).toBe("is required");
		expect(defaultMessages.render("type_coercion", { actual: "string", type: "integer" })).toBe(
			"cannot coerce string to integer",
		);
		expect(defaultMessages.render("length_range", { min: 2, max: 4, actual: 5 })).toBe(
			"length must be between 2 and 4 (got 5)",
		);
	});

	it("applies overrides and keeps the rest", () => {
		const catalog = createMessageCatalog({ required: "ne peut pas être vide" });
		expect(catalog.render("required")).toBe("ne peut pas être vide");
		expect(catalog.render("min", { value: 1 })).toBe("must be at least 1");
		expect(catalog.template("required")).toBe("ne peut pas être vide");
	});

	it("ignores overrides holding undefined", () => {
		const catalog = createMessageCatalog({ required: undefined });
		expect(catalog.render("required")).toBe(DEFAULT_MESSAGES.required);
	});

	it("recognises message keys", () => {
		expect(isMessageKey("enum")).toBe(true);
		expect(isMessageKey("toString")).toBe(false);
	});
});
