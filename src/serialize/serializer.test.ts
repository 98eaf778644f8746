import { describe, expect, it } from "vitest";
import { ErrorCollection } from "../issues/error-collection.js";
import { issue } from "../issues/issue.js";
import { Decimal } from "../lib/decimal/index.js";
import { CalendarDate } from "../lib/temporal/index.js";
import { dumpJson, serializeIssues, serializeValue } from "./serializer.js";

describe("serializeValue", () => {
	it("keeps JSON primitives", () => {
		expect(serializeValue("a")).toBe("a");
		expect(serializeValue(1.5)).toBe(1.5);
		expect(serializeValue(false)).toBe(false);
		expect(serializeValue(null)).toBeNull();
		expect(serializeValue(undefined)).toBeNull();
	});

	it("stringifies symbols, bigints and non-finite numbers", () => {
		expect(serializeValue(Symbol("active"))).toBe("active");
		expect(serializeValue(12345678901234567890n)).toBe("12345678901234567890");
		expect(serializeValue(Number.NaN)).toBeNull();
	});

	it("renders decimals as fixed-point strings", () => {
		expect(serializeValue(Decimal.from("19.90"))).toBe("19.9");
		expect(serializeValue(Decimal.from("0.0000001"))).toBe("0.0000001");
	});

	it("renders temporal values as ISO strings", () => {
		expect(serializeValue(CalendarDate.of(2024, 1, 5))).toBe("2024-01-05");
		expect(serializeValue(new Date(Date.UTC(2024, 0, 5, 10, 30)))).toBe("2024-01-05T10:30:00.000Z");
		expect(serializeValue(new Date(Number.NaN))).toBeNull();
	});

	it("recurses into sequences and key-value structures", () => {
		const value = {
			tags: new Set(["a", Symbol("b")]),
			meta: new Map<unknown, unknown>([
				[Symbol("kind"), "x"],
				[1, Decimal.from("2")],
			]),
			items: [{ at: CalendarDate.of(2020, 2, 29) }],
		};
		expect(serializeValue(value)).toEqual({
			tags: ["a", "b"],
			meta: { kind: "x", "1": "2" },
			items: [{ at: "2020-02-29" }],
		});
	});

	it("uses toJSON, then the key-value projection of other objects", () => {
		class Money {
			constructor(readonly cents: number) {}
			toJSON() {
				return { amount: this.cents / 100 };
			}
		}
		class Point {
			constructor(
				readonly x: number,
				readonly y: number,
			) {}
		}
		expect(serializeValue(new Money(250))).toEqual({ amount: 2.5 });
		expect(serializeValue(new Point(1, 2))).toEqual({ x: 1, y: 2 });
	});
});

describe("dumpJson", () => {
	it("writes the canonical form as JSON text", () => {
		expect(dumpJson({ total: Decimal.from("10.50"), day: CalendarDate.of(2024, 3, 1) })).toBe(
			'{"total":"10.5","day":"2024-03-01"}',
		);
	});
});

describe("serializeIssues", () => {
	it("stringifies paths", () => {
		const errors = ErrorCollection.of([issue(["items", 0, "qty"], "must be at least 1", "min")]);
		expect(serializeIssues(errors)).toEqual({
			errors: [{ path: ["items", "0", "qty"], message: "must be at least 1", code: "min" }],
		});
	});
});
