/**
 * L1 action hashing and the typed data the key actually signs.
 *
 * connectionId = keccak256(
 *   msgpack(action) ‖ u64be(nonce) ‖ (0x00 | 0x01 ‖ vault[20]) ‖ [0x00 ‖ u64be(expiresAfter)]
 * )
 *
 * The key signs an EIP-712 "Agent" struct carrying that hash, with
 * source "a" on mainnet and "b" on testnet.
 */

import {
	addressToBytes,
	concatBytes,
	keccak256,
	uint64BE,
} from "../lib/ethereum/index.js";
import type { Hex, SignTypedDataParams } from "../lib/ethereum/types.js";
import type { SignRequest } from "./types.js";

export const L1_DOMAIN = {
	name: "Exchange",
	version: "1",
	chainId: 1337,
	verifyingContract: "0x0000000000000000000000000000000000000000",
} as const;

const AGENT_TYPES = {
	Agent: [
		{ name: "source", type: "string" },
		{ name: "connectionId", type: "bytes32" },
	],
} as const;

export function actionHash(request: Omit<SignRequest, "isMainnet">): Hex {
	const parts: Uint8Array[] = [request.actionBytes, uint64BE(request.nonce)];
	if (request.vaultAddress === undefined) {
		parts.push(Uint8Array.of(0x00));
	} else {
		parts.push(Uint8Array.of(0x01), addressToBytes(request.vaultAddress));
	}
	if (request.expiresAfter !== undefined) {
		parts.push(Uint8Array.of(0x00), uint64BE(request.expiresAfter));
	}
	return keccak256(concatBytes(parts));
}

export function l1TypedData(connectionId: Hex, isMainnet: boolean): SignTypedDataParams {
	return {
		domain: L1_DOMAIN,
		types: AGENT_TYPES,
		primaryType: "Agent",
		message: { source: isMainnet ? "a" : "b", connectionId },
	};
}
