/**
 * Signing types — the external sign capability and the payload it produces.
 */

import type { WireAction } from "../action/wire.js";
import type { Hex, SignatureParts } from "../lib/ethereum/types.js";
import type { EthAddress } from "../shared/identifiers.js";

/** `{ r, s, v }` as sent to the exchange. */
export type Signature = SignatureParts;

/** Everything the signature depends on besides the action and nonce. */
export interface SigningContext {
	readonly isMainnet: boolean;
	readonly vaultAddress?: EthAddress | undefined;
	readonly expiresAfter?: number | undefined;
}

/** What the capability is asked to sign. */
export interface SignRequest {
	/** MessagePack encoding of the wire action */
	readonly actionBytes: Uint8Array;
	readonly nonce: number;
	readonly expiresAfter?: number | undefined;
	readonly vaultAddress?: EthAddress | undefined;
	readonly isMainnet: boolean;
}

/**
 * Holds the key. Rejects when the key is unavailable or the request
 * cannot be encoded.
 */
export interface SignCapability {
	readonly address: EthAddress;
	sign(request: SignRequest): Promise<Signature>;
}

/** Exactly what crosses the wire. Frozen once built. */
export interface SubmissionPayload {
	readonly action: WireAction;
	readonly nonce: number;
	readonly signature: Signature;
	readonly vaultAddress: EthAddress | null;
	readonly expiresAfter?: number | undefined;
}

export type { Hex };
