/**
 * Decimal: immutable arbitrary-precision value backed by decimal.js-light.
 *
 * The `decimal` schema type produces these. Strings are handed to
 * decimal.js-light untouched, so "0.1" stays exactly 0.1 and never passes
 * through binary floating point. Nothing else imports decimal.js-light.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

const DECIMAL_NUMERAL = /^-?\d+(\.\d+)?$/;

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a Decimal from a numeral string, a finite number or a bigint.
	 * @throws Error if the number is not finite or the string is not a plain numeral
	 * @example Decimal.from("19.99")
	 */
	static from(value: string | number | bigint): Decimal {
		if (typeof value === "bigint") {
			return new Decimal(new DecimalLight(value.toString()));
		}
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		if (!DECIMAL_NUMERAL.test(trimmed)) {
			throw new Error(`Decimal.from: not a decimal numeral "${trimmed}"`);
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	/** True for plain numerals such as "-12" or "3.50". */
	static isNumeral(value: string): boolean {
		return DECIMAL_NUMERAL.test(value);
	}

	static isDecimal(value: unknown): value is Decimal {
		return value instanceof Decimal;
	}

	// ── Comparison ─────────────────────────────────────────────────

	/**
	 * Compares this value to another Decimal.
	 * @returns -1 if this < other, 0 if equal, 1 if this > other
	 */
	cmp(other: Decimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	isInteger(): boolean {
		return this.raw.isInteger();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Fixed-point string without trailing fractional zeros.
	 * @example Decimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed === "-0" ? "0" : fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/**
	 * Fixed-point string with the given number of decimal places.
	 * @example Decimal.from("1.23456").toFixed(2) // "1.23"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Converts to a JavaScript number. May lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
