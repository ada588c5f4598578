/**
 * Decimal — immutable wrapper around decimal.js-light.
 *
 * Gas prices arrive as decimal strings ("12000.0") while bids are set in
 * wei-denominated integers far beyond 2^53, so comparisons between the two
 * go through this type rather than `number`.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error if value is not finite (for numbers), empty or not numeric (for strings)
	 * @example Decimal.from("12000.0")
	 * @example Decimal.from(14_500_000_000_000_000n)
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
		try {
			return new Decimal(new DecimalLight(trimmed));
		} catch {
			throw new Error(`Decimal.from: not a decimal number "${trimmed}"`);
		}
	}

	/** `10^exponent`, exact. */
	static pow10(exponent: number): Decimal {
		return new Decimal(new DecimalLight(10).pow(exponent));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error if dividing by zero */
	div(other: Decimal): Decimal {
		if (other.raw.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	// ── Comparison ─────────────────────────────────────────────────

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example Decimal.from("12000.50").toString() // "12000.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toJSON(): string {
		return this.toString();
	}
}
