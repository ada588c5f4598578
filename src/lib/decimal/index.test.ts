import { describe, expect, it } from "vitest";
import { Decimal } from "./index.js";

describe("Decimal", () => {
	describe("from", () => {
		it("parses decimal strings", () => {
			expect(Decimal.from("12000.0").toString()).toBe("12000");
			expect(Decimal.from(" 0.125 ").toString()).toBe("0.125");
		});

		it("keeps bigints exact beyond 2^53", () => {
			expect(Decimal.from(14_500_000_000_000_001n).toString()).toBe("14500000000000001");
		});

		it("accepts finite numbers", () => {
			expect(Decimal.from(12000.5).toString()).toBe("12000.5");
		});

		it("rejects non-finite numbers, empty and non-numeric strings", () => {
			expect(() => Decimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => Decimal.from("   ")).toThrow("empty string");
			expect(() => Decimal.from("12k")).toThrow('not a decimal number "12k"');
		});
	});

	it("pow10 is exact", () => {
		expect(Decimal.pow10(12).toString()).toBe("1000000000000");
	});

	it("divides wei into whole units without rounding", () => {
		const hype = Decimal.from(14_500_000_000_000_000n).div(Decimal.pow10(12));
		expect(hype.toString()).toBe("14500");
		expect(Decimal.from(1n).div(Decimal.pow10(12)).toString()).toBe("0.000000000001");
	});

	it("refuses to divide by zero", () => {
		expect(() => Decimal.from(1).div(Decimal.from(0))).toThrow("division by zero");
	});

	it("compares", () => {
		const a = Decimal.from("12000");
		const b = Decimal.from("14500.0");
		expect(a.lte(b)).toBe(true);
		expect(b.lte(b)).toBe(true);
		expect(b.lte(a)).toBe(false);
		expect(a.lte(Decimal.from("12000.000"))).toBe(true);
	});

	it("formats", () => {
		expect(Decimal.from("14500.00").toString()).toBe("14500");
		expect(JSON.stringify({ gas: Decimal.from("1.50") })).toBe('{"gas":"1.5"}');
	});
});
