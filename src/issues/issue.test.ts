import { describe, expect, it } from "vitest";
import {
	IssueCode,
	formatIssue,
	fullPath,
	issue,
	issuesEqual,
	pathStartsWith,
	withMessage,
} from "./issue.js";

describe("ValidationIssue", () => {
	it("is frozen and copies its path", () => {
		const path = ["user", 0];
		const created = issue(path, "is required", IssueCode.Required);
		path.push("zip");
		expect(created.path).toEqual(["user", 0]);
		expect(Object.isFrozen(created)).toBe(true);
		expect(Object.isFrozen(created.path)).toBe(true);
	});

	it("renders the dotted path", () => {
		expect(fullPath(issue(["user", "addresses", 0, "zip"], "bad", "format"))).toBe(
			"user.addresses.0.zip",
		);
		expect(fullPath(issue([], "bad", "custom"))).toBe("");
	});

	it("formats with and without a path", () => {
		expect(formatIssue(issue(["name"], "is required", "required"))).toBe("name: is required");
		expect(formatIssue(issue([], "passwords differ", "custom"))).toBe("passwords differ");
	});

	it("compares structurally", () => {
		const a = issue(["a", 1], "m", "min");
		expect(issuesEqual(a, issue(["a", 1], "m", "min"))).toBe(true);
		expect(issuesEqual(a, issue(["a", "1"], "m", "min"))).toBe(false);
		expect(issuesEqual(a, issue(["a", 1], "m", "max"))).toBe(false);
		expect(issuesEqual(a, issue(["a", 1], "other", "min"))).toBe(false);
	});

	it("withMessage keeps code and path", () => {
		const rewritten = withMessage(issue(["age"], "must be at least 18", "min"), "too young");
		expect(rewritten).toEqual({ path: ["age"], message: "too young", code: "min" });
	});

	it("checks path prefixes", () => {
		expect(pathStartsWith(["a", 0, "b"], ["a", 0])).toBe(true);
		expect(pathStartsWith(["a"], [])).toBe(true);
		expect(pathStartsWith(["a"], ["a", 0])).toBe(false);
	});
});
