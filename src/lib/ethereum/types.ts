/**
 * Ethereum library wrapper — type definitions.
 *
 * Signing and hashing go through these interfaces; only files under
 * lib/ethereum import viem.
 */

import type { EthAddress } from "../../shared/identifiers.js";

export type { EthAddress };

/** 0x-prefixed hex string. */
export type Hex = `0x${string}`;

/**
 * Parameters for signing typed data (EIP-712).
 */
export interface SignTypedDataParams {
	readonly domain: {
		readonly name?: string;
		readonly version?: string;
		readonly chainId?: number;
		readonly verifyingContract?: Hex;
	};
	readonly types: Record<string, readonly { readonly name: string; readonly type: string }[]>;
	readonly primaryType: string;
	readonly message: Record<string, unknown>;
}

/** ECDSA signature split into its components, as the exchange expects it. */
export interface SignatureParts {
	readonly r: Hex;
	readonly s: Hex;
	readonly v: number;
}

/**
 * Holds one private key and signs typed data with it.
 */
export interface EthSigner {
	readonly address: EthAddress;
	signTypedData(params: SignTypedDataParams): Promise<Hex>;
}
