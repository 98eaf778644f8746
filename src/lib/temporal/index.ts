/**
 * Temporal values: calendar dates and instant parsing.
 *
 * JavaScript has a single `Date` class for instants. CalendarDate is the
 * separate value type for a day without time-of-day, so the `date` and
 * `datetime` schema types stay disjoint categories. All derivations from
 * instants use UTC components; only the permissive parser falls back to the
 * host's local interpretation, as `Date.parse` does.
 */

const MS_PER_SECOND = 1000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/i;
const BASIC_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const SLASH_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

const ISO_INSTANT =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const RFC2822 =
	/^(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*)?(\d{1,2})\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{2}|\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s*([+-]\d{4}|UT|GMT|Z|[ECMP][SD]T)?$/i;

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

/** Offsets in minutes for the obsolete RFC 2822 zone names. */
const ZONE_OFFSETS: Readonly<Record<string, number>> = {
	UT: 0,
	GMT: 0,
	Z: 0,
	EST: -300,
	EDT: -240,
	CST: -360,
	CDT: -300,
	MST: -420,
	MDT: -360,
	PST: -480,
	PDT: -420,
};

export function daysInMonth(year: number, month: number): number {
	return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isCalendarTriple(year: number, month: number, day: number): boolean {
	return (
		Number.isInteger(year) &&
		Number.isInteger(month) &&
		Number.isInteger(day) &&
		year >= 0 &&
		year <= 9999 &&
		month >= 1 &&
		month <= 12 &&
		day >= 1 &&
		day <= daysInMonth(year, month)
	);
}

// ── CalendarDate ────────────────────────────────────────────────────

export class CalendarDate {
	readonly year: number;
	readonly month: number;
	readonly day: number;

	private constructor(year: number, month: number, day: number) {
		this.year = year;
		this.month = month;
		this.day = day;
	}

	/**
	 * Creates a date from its components (month is 1-based).
	 * @throws RangeError for impossible dates such as 2023-02-29
	 */
	static of(year: number, month: number, day: number): CalendarDate {
		const date = CalendarDate.tryOf(year, month, day);
		if (date === null) {
			throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
		}
		return date;
	}

	/** Like {@link CalendarDate.of} but returns null for impossible dates. */
	static tryOf(year: number, month: number, day: number): CalendarDate | null {
		return isCalendarTriple(year, month, day) ? new CalendarDate(year, month, day) : null;
	}

	/** The UTC calendar day of an instant. Null for an invalid Date. */
	static fromInstant(instant: Date): CalendarDate | null {
		if (Number.isNaN(instant.getTime())) return null;
		return CalendarDate.tryOf(
			instant.getUTCFullYear(),
			instant.getUTCMonth() + 1,
			instant.getUTCDate(),
		);
	}

	/** The UTC calendar day of a Unix timestamp in seconds. */
	static fromEpochSeconds(seconds: number): CalendarDate | null {
		if (!Number.isFinite(seconds)) return null;
		return CalendarDate.fromInstant(new Date(seconds * MS_PER_SECOND));
	}

	static isCalendarDate(value: unknown): value is CalendarDate {
		return value instanceof CalendarDate;
	}

	equals(other: CalendarDate): boolean {
		return this.year === other.year && this.month === other.month && this.day === other.day;
	}

	/** Midnight UTC of this day. */
	toInstant(): Date {
		const instant = new Date(0);
		instant.setUTCFullYear(this.year, this.month - 1, this.day);
		return instant;
	}

	/** ISO 8601 calendar form, e.g. `2024-01-15`. */
	toString(): string {
		return `${String(this.year).padStart(4, "0")}-${pad2(this.month)}-${pad2(this.day)}`;
	}

	toJSON(): string {
		return this.toString();
	}
}

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

// ── Parsing ─────────────────────────────────────────────────────────

/**
 * Parses a calendar date. Tries ISO 8601 (`YYYY-MM-DD` with an optional
 * time part, or `YYYYMMDD`), then `YYYY/MM/DD`, then the host's permissive
 * parser read in local time. Returns null when nothing matches or the
 * matched date does not exist.
 */
export function parseCalendarDate(text: string): CalendarDate | null {
	const trimmed = text.trim();
	if (trimmed.length === 0) return null;

	const iso = ISO_DATE.exec(trimmed) ?? BASIC_DATE.exec(trimmed) ?? SLASH_DATE.exec(trimmed);
	if (iso) {
		return CalendarDate.tryOf(Number(iso[1]), Number(iso[2]), Number(iso[3]));
	}

	const loose = new Date(trimmed);
	if (Number.isNaN(loose.getTime())) return null;
	return CalendarDate.tryOf(loose.getFullYear(), loose.getMonth() + 1, loose.getDate());
}

/**
 * Parses an instant. Tries ISO 8601 (a missing zone means UTC), then
 * RFC 2822, then the host's permissive parser. Returns null on failure.
 */
export function parseInstant(text: string): Date | null {
	const trimmed = text.trim();
	if (trimmed.length === 0) return null;

	const iso = ISO_INSTANT.exec(trimmed);
	if (iso) return instantFromIso(iso);

	const rfc = RFC2822.exec(trimmed);
	if (rfc) return instantFromRfc2822(rfc);

	const loose = new Date(trimmed);
	return Number.isNaN(loose.getTime()) ? null : loose;
}

/** A Unix timestamp in seconds (fractions allowed) as a Date. */
export function instantFromEpochSeconds(seconds: number): Date | null {
	if (!Number.isFinite(seconds)) return null;
	const instant = new Date(seconds * MS_PER_SECOND);
	return Number.isNaN(instant.getTime()) ? null : instant;
}

export function isValidInstant(value: unknown): value is Date {
	return value instanceof Date && !Number.isNaN(value.getTime());
}

function instantFromIso(match: RegExpExecArray): Date | null {
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const hour = Number(match[4] ?? "0");
	const minute = Number(match[5] ?? "0");
	const second = Number(match[6] ?? "0");
	const millis = Number((match[7] ?? "0").padEnd(3, "0").slice(0, 3));

	if (!isCalendarTriple(year, month, day)) return null;
	if (hour > 23 || minute > 59 || second > 59) return null;

	const offset = parseOffset(match[8]);
	if (offset === null) return null;
	return fromUtcComponents(year, month, day, hour, minute, second, millis, offset);
}

function instantFromRfc2822(match: RegExpExecArray): Date | null {
	const day = Number(match[1]);
	const month = MONTHS.indexOf((match[2] ?? "").toLowerCase()) + 1;
	const rawYear = match[3] ?? "";
	const shortYear = Number(rawYear);
	const year = rawYear.length === 2 ? (shortYear < 50 ? 2000 + shortYear : 1900 + shortYear) : shortYear;
	const hour = Number(match[4]);
	const minute = Number(match[5]);
	const second = Number(match[6] ?? "0");

	if (!isCalendarTriple(year, month, day)) return null;
	if (hour > 23 || minute > 59 || second > 59) return null;

	const offset = parseOffset(match[7]);
	if (offset === null) return null;
	return fromUtcComponents(year, month, day, hour, minute, second, 0, offset);
}

/** Offset in minutes east of UTC. Undefined zone means UTC. */
function parseOffset(zone: string | undefined): number | null {
	if (zone === undefined) return 0;
	const named = ZONE_OFFSETS[zone.toUpperCase()];
	if (named !== undefined) return named;

	const numeric = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
	if (!numeric) return null;
	const hours = Number(numeric[2]);
	const minutes = Number(numeric[3] ?? "0");
	if (hours > 23 || minutes > 59) return null;
	const sign = numeric[1] === "-" ? -1 : 1;
	return sign * (hours * 60 + minutes);
}

function fromUtcComponents(
	year: number,
	month: number,
	day: number,
	hour: number,
	minute: number,
	second: number,
	millis: number,
	offsetMinutes: number,
): Date {
	const instant = new Date(0);
	instant.setUTCFullYear(year, month - 1, day);
	instant.setUTCHours(hour, minute - offsetMinutes, second, millis);
	return instant;
}
