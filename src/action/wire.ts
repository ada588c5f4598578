/**
 * Wire form of actions — the exact structure the exchange hashes and parses.
 *
 * Key order is part of the contract: the signature covers the MessagePack
 * encoding of this object, and MessagePack keeps insertion order. These are
 * type aliases, not interfaces, so they stay assignable to WireValue.
 */

import { type WireValue, encodeCanonical } from "../lib/msgpack/index.js";
import { type Action, ActionType, StorageSlotKind, type StorageSlotSelector } from "./types.js";

export type WireStorageSlotInput =
	| typeof StorageSlotKind.FirstStorageSlot
	| typeof StorageSlotKind.CustomStorageSlot
	| { readonly create: { readonly nonce: number } };

export type WireFinalizeEvmContract = {
	readonly type: "finalizeEvmContract";
	readonly token: number;
	readonly input: WireStorageSlotInput;
};

export type WireRegisterToken = {
	readonly type: "spotDeploy";
	readonly registerToken2: {
		readonly spec: {
			readonly name: string;
			readonly szDecimals: number;
			readonly weiDecimals: number;
		};
		readonly maxGas: bigint;
		readonly fullName: string;
	};
};

export type WireAction = WireFinalizeEvmContract | WireRegisterToken;

function toWireInput(selector: StorageSlotSelector): WireStorageSlotInput {
	switch (selector.kind) {
		case StorageSlotKind.FirstStorageSlot:
		case StorageSlotKind.CustomStorageSlot:
			return selector.kind;
		case StorageSlotKind.CreateAtNonce:
			return { create: { nonce: selector.nonce } };
	}
}

export function toWireAction(action: Action): WireAction {
	switch (action.type) {
		case ActionType.FinalizeEvmContract:
			return {
				type: "finalizeEvmContract",
				token: action.token,
				input: toWireInput(action.input),
			};
		case ActionType.RegisterSpotToken:
			return {
				type: "spotDeploy",
				registerToken2: {
					spec: {
						name: action.tokenName,
						szDecimals: action.szDecimals,
						weiDecimals: action.weiDecimals,
					},
					maxGas: action.maxGas,
					fullName: action.fullName,
				},
			};
	}
}

/** MessagePack bytes of the wire action. Same action, same bytes. */
export function encodeAction(action: WireAction): Uint8Array {
	return encodeCanonical(action);
}

// ── JSON ─────────────────────────────────────────────────────────────

const BIGINT_MARK = "\u0000bigint:";
const BIGINT_RE = /"\\u0000bigint:(-?\d+)"/g;

/**
 * JSON.stringify that writes bigint values as bare integer literals, so
 * `maxGas: 14500000000000000n` goes out as `"maxGas":14500000000000000`.
 */
export function toWireJson(value: unknown, indent?: number): string {
	const json = JSON.stringify(
		value,
		(_key, inner: unknown) => (typeof inner === "bigint" ? `${BIGINT_MARK}${inner}` : inner),
		indent,
	);
	return json.replace(BIGINT_RE, "$1");
}

export type { WireValue };
