/**
 * Byte, hash and signature helpers over viem.
 */

import {
	concat,
	hexToBytes,
	keccak256 as viemKeccak256,
	numberToBytes,
	parseSignature,
} from "viem";
import type { EthAddress } from "../../shared/identifiers.js";
import type { Hex, SignatureParts } from "./types.js";

export function keccak256(bytes: Uint8Array): Hex {
	return viemKeccak256(bytes);
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
	return concat([...parts]);
}

function isHex(value: string): value is Hex {
	return /^0x[0-9a-fA-F]*$/.test(value);
}

/** The 20 raw bytes of an address. */
export function addressToBytes(address: EthAddress): Uint8Array {
	if (!isHex(address)) {
		throw new Error(`Not a hex address: ${address}`);
	}
	return hexToBytes(address);
}

/** Big-endian unsigned 64-bit encoding. */
export function uint64BE(value: number | bigint): Uint8Array {
	return numberToBytes(value, { size: 8 });
}

/**
 * Split a 65-byte signature into `{ r, s, v }` with `v` in {27, 28}.
 * @throws Error if the hex is not a valid signature
 */
export function splitSignature(signature: Hex): SignatureParts {
	const { r, s, v, yParity } = parseSignature(signature);
	return { r, s, v: v !== undefined ? Number(v) : 27 + yParity };
}
