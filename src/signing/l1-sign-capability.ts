/**
 * Key-backed SignCapability for exchange L1 actions.
 */

import { createSigner, splitSignature } from "../lib/ethereum/index.js";
import type { EthSigner } from "../lib/ethereum/types.js";
import { actionHash, l1TypedData } from "./l1-hash.js";
import type { SignCapability, SignRequest, Signature } from "./types.js";

export function createL1SignCapability(signer: EthSigner): SignCapability {
	const capability: SignCapability = {
		address: signer.address,

		async sign(request: SignRequest): Promise<Signature> {
			const connectionId = actionHash(request);
			const signature = await signer.signTypedData(l1TypedData(connectionId, request.isMainnet));
			return splitSignature(signature);
		},
	};

	Object.defineProperty(capability, "toString", {
		value: () => "[L1SignCapability]",
		enumerable: false,
	});
	Object.defineProperty(capability, "toJSON", {
		value: () => "[L1SignCapability]",
		enumerable: false,
	});

	return capability;
}

/**
 * @throws Error("Invalid private key format") without echoing the key
 */
export function signCapabilityFromKey(privateKey: string): SignCapability {
	return createL1SignCapability(createSigner(privateKey));
}
