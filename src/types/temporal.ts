/**
 * Date, datetime and time types.
 *
 * `date` produces a CalendarDate; `datetime` and `time` produce JavaScript
 * Date instants. A Date is never a valid `date`, which keeps the calendar and
 * instant categories disjoint.
 */

import {
	CalendarDate,
	instantFromEpochSeconds,
	isValidInstant,
	parseCalendarDate,
	parseInstant,
} from "../lib/temporal/index.js";
import { ScalarType } from "./base.js";
import { safeBigIntToNumber } from "./number.js";
import { COERCION_FAILED, coerced } from "./types.js";
import type { Coerced, TypeSpec } from "./types.js";

function fromNullable<T>(value: T | null): Coerced<T> {
	return value === null ? COERCION_FAILED : coerced(value);
}

function epochSeconds(raw: unknown): number | null {
	if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
	if (typeof raw === "bigint") return safeBigIntToNumber(raw);
	return null;
}

export class DateType extends ScalarType<CalendarDate> {
	readonly spec: TypeSpec = { kind: "date" };

	typeName(): string {
		return "date";
	}

	coerce(raw: unknown): Coerced<CalendarDate> {
		if (raw instanceof CalendarDate) return coerced(raw);
		if (raw instanceof Date) return fromNullable(CalendarDate.fromInstant(raw));
		if (typeof raw === "string") return fromNullable(parseCalendarDate(raw));
		const seconds = epochSeconds(raw);
		return seconds === null ? COERCION_FAILED : fromNullable(CalendarDate.fromEpochSeconds(seconds));
	}

	isValid(value: unknown): value is CalendarDate {
		return value instanceof CalendarDate;
	}
}

/** Shared by `datetime` and `time`: both are instants. */
export class InstantType extends ScalarType<Date> {
	readonly spec: TypeSpec;

	constructor(kind: "datetime" | "time") {
		super();
		this.spec = { kind };
	}

	typeName(): string {
		return this.spec.kind;
	}

	coerce(raw: unknown): Coerced<Date> {
		if (raw instanceof Date) {
			return isValidInstant(raw) ? coerced(new Date(raw.getTime())) : COERCION_FAILED;
		}
		if (raw instanceof CalendarDate) return coerced(raw.toInstant());
		if (typeof raw === "string") return fromNullable(parseInstant(raw));
		const seconds = epochSeconds(raw);
		return seconds === null ? COERCION_FAILED : fromNullable(instantFromEpochSeconds(seconds));
	}

	isValid(value: unknown): value is Date {
		return isValidInstant(value);
	}
}
