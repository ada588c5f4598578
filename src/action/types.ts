/**
 * Action model — the remote operations this client can request.
 *
 * Actions are plain frozen data. The wire shape the exchange hashes and
 * parses is derived from them in wire.ts; nothing else constructs it.
 */

import type { TokenIndex } from "../shared/identifiers.js";

// ── Storage slot selector ────────────────────────────────────────────

export const StorageSlotKind = {
	/** Deployer address is read from storage slot 0 */
	FirstStorageSlot: "firstStorageSlot",
	/** Deployer address is read from slot keccak256("HyperCore deployer") */
	CustomStorageSlot: "customStorageSlot",
	/** Contract was created by an EOA at the given nonce */
	CreateAtNonce: "createAtNonce",
} as const;

export type StorageSlotKind = (typeof StorageSlotKind)[keyof typeof StorageSlotKind];

/** How the linked contract proves who deployed it. */
export type StorageSlotSelector =
	| { readonly kind: typeof StorageSlotKind.FirstStorageSlot }
	| { readonly kind: typeof StorageSlotKind.CustomStorageSlot }
	| { readonly kind: typeof StorageSlotKind.CreateAtNonce; readonly nonce: number };

// ── Actions ──────────────────────────────────────────────────────────

export const ActionType = {
	FinalizeEvmContract: "finalizeEvmContract",
	RegisterSpotToken: "registerSpotToken",
} as const;

export type ActionType = (typeof ActionType)[keyof typeof ActionType];

/** Irreversibly link a spot token to its EVM contract. */
export interface FinalizeEvmContractAction {
	readonly type: typeof ActionType.FinalizeEvmContract;
	readonly token: TokenIndex;
	readonly input: StorageSlotSelector;
}

/** Bid in the spot-deploy gas auction for a token ticker. */
export interface RegisterSpotTokenAction {
	readonly type: typeof ActionType.RegisterSpotToken;
	readonly tokenName: string;
	readonly szDecimals: number;
	readonly weiDecimals: number;
	/** Highest gas the bid accepts, in wei (1 HYPE = 10^12 wei here) */
	readonly maxGas: bigint;
	readonly fullName: string;
}

export type Action = FinalizeEvmContractAction | RegisterSpotTokenAction;

// ── Builder inputs ───────────────────────────────────────────────────

/**
 * Raw finalize settings. Exactly one of `useFirstStorageSlot`,
 * `useCustomStorageSlot` or `deployNonce` must be set.
 */
export interface FinalizeEvmContractFields {
	readonly token: unknown;
	readonly useFirstStorageSlot?: boolean | undefined;
	readonly useCustomStorageSlot?: boolean | undefined;
	readonly deployNonce?: unknown;
}

export interface RegisterSpotTokenFields {
	readonly tokenName: unknown;
	readonly szDecimals: unknown;
	readonly weiDecimals: unknown;
	/** bigint, safe integer, or a string of digits */
	readonly maxGas: unknown;
	readonly fullName: unknown;
}
