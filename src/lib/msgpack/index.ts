/**
 * MessagePack wrapper — canonical binary encoding of wire actions.
 *
 * Map keys are written in insertion order. Integers take the narrowest
 * width that holds them: fixint, 8, 16 or 32 bits, and uint64/int64
 * (0xcf/0xd3) beyond 32 bits, whether they arrive as number or bigint.
 * An integer is never written as a float.
 */

import { encode } from "@msgpack/msgpack";

/** JSON-like value that may carry bigint integers. */
export type WireValue =
	| string
	| number
	| bigint
	| boolean
	| null
	| readonly WireValue[]
	| { readonly [key: string]: WireValue };

const UINT32_MAX = 0xffff_ffffn;
const INT32_MIN = -0x8000_0000n;
const UINT64_MAX = 2n ** 64n - 1n;
const INT64_MIN = -(2n ** 63n);

/**
 * Integers inside 32 bits go to the encoder as numbers, everything wider as
 * bigint: the encoder writes 64-bit widths only for bigints.
 * @throws RangeError for integers outside 64 bits or unsafe integer numbers
 */
function integer(value: bigint): number | bigint {
	if (value > UINT64_MAX || value < INT64_MIN) {
		throw new RangeError(`Integer ${value} does not fit in 64 bits`);
	}
	return value <= UINT32_MAX && value >= INT32_MIN ? Number(value) : value;
}

function prepare(value: WireValue): unknown {
	if (typeof value === "bigint") {
		return integer(value);
	}
	if (typeof value === "number") {
		if (!Number.isInteger(value)) return value;
		if (!Number.isSafeInteger(value)) {
			throw new RangeError(`Integer ${value} is not exact; pass it as a bigint`);
		}
		return integer(BigInt(value));
	}
	if (Array.isArray(value)) {
		return value.map(prepare);
	}
	if (typeof value === "object" && value !== null) {
		const out: Record<string, unknown> = {};
		for (const [key, inner] of Object.entries(value)) {
			out[key] = prepare(inner);
		}
		return out;
	}
	return value;
}

/** @throws RangeError for an integer the wire cannot carry exactly */
export function encodeCanonical(value: WireValue): Uint8Array {
	return encode(prepare(value), { useBigInt64: true });
}
