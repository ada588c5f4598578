import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { encodeCanonical } from "./index.js";

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString("hex");
const ascii = (text: string): string => Buffer.from(text, "ascii").toString("hex");

const field = (n: bigint, bits: number): string =>
	(n < 0n ? (1n << BigInt(bits)) + n : n).toString(16).padStart(bits / 4, "0");

/** MessagePack's smallest-width integer rule, written out by range. */
function expectedInteger(n: bigint): string {
	if (n >= 0n) {
		if (n < 0x80n) return field(n, 8);
		if (n < 0x100n) return `cc${field(n, 8)}`;
		if (n < 0x1_0000n) return `cd${field(n, 16)}`;
		if (n < 0x1_0000_0000n) return `ce${field(n, 32)}`;
		return `cf${field(n, 64)}`;
	}
	if (n >= -32n) return field(n, 8);
	if (n >= -0x80n) return `d0${field(n, 8)}`;
	if (n >= -0x8000n) return `d1${field(n, 16)}`;
	if (n >= -0x8000_0000n) return `d2${field(n, 32)}`;
	return `d3${field(n, 64)}`;
}

describe("encodeCanonical", () => {
	it("writes map keys in insertion order", () => {
		const ab = encodeCanonical({ a: 1, b: 2 });
		const ba = encodeCanonical({ b: 2, a: 1 });

		expect(hex(ab)).toBe(`82a1${ascii("a")}01a1${ascii("b")}02`);
		expect(hex(ab)).not.toBe(hex(ba));
	});

	it("uses the narrowest integer width", () => {
		expect(hex(encodeCanonical(5))).toBe("05");
		expect(hex(encodeCanonical(200))).toBe("ccc8");
		expect(hex(encodeCanonical(70_000))).toBe("ce00011170");
		expect(hex(encodeCanonical(0xffff_ffff))).toBe("ceffffffff");
		expect(hex(encodeCanonical(-5))).toBe("fb");
		expect(hex(encodeCanonical(-0x8000_0000))).toBe("d280000000");
	});

	it("writes integers beyond 32 bits as uint64, never as a float", () => {
		expect(hex(encodeCanonical(2 ** 32))).toBe("cf0000000100000000");
		expect(hex(encodeCanonical(2n ** 32n))).toBe("cf0000000100000000");
		expect(hex(encodeCanonical(5_000_000_000_000_000n))).toBe("cf0011c37937e08000");
		expect(hex(encodeCanonical(14_500_000_000_000_000n))).toBe("cf003383ac553e4000");
		expect(hex(encodeCanonical(2n ** 64n - 1n))).toBe("cfffffffffffffffff");
	});

	it("writes negatives below 32 bits as int64", () => {
		expect(hex(encodeCanonical(-0x8000_0001))).toBe("d3ffffffff7fffffff");
	});

	it("writes small bigints like numbers", () => {
		expect(hex(encodeCanonical(5n))).toBe("05");
		expect(hex(encodeCanonical({ n: [1n, 2n] }))).toBe(`81a1${ascii("n")}920102`);
	});

	it("matches the width rule for every 64-bit integer", () => {
		fc.assert(
			fc.property(fc.bigInt({ min: -(2n ** 63n), max: 2n ** 64n - 1n }), (n) => {
				expect(hex(encodeCanonical(n))).toBe(expectedInteger(n));
				if (n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER)) {
					expect(hex(encodeCanonical(Number(n)))).toBe(expectedInteger(n));
				}
			}),
		);
	});

	it("rejects integers the wire cannot carry exactly", () => {
		expect(() => encodeCanonical(2n ** 64n)).toThrow(RangeError);
		expect(() => encodeCanonical(-(2n ** 63n) - 1n)).toThrow(RangeError);
		expect(() => encodeCanonical(2 ** 60)).toThrow("pass it as a bigint");
	});

	it("is deterministic", () => {
		const value = { type: "x", nested: { list: [1, "two", null, true] } };
		expect(encodeCanonical(value)).toEqual(encodeCanonical(value));
	});
});
