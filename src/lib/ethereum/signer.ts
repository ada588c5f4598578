/**
 * Ethereum signer wrapper — abstracts viem's account signing behind
 * the EthSigner interface.
 */

import { privateKeyToAccount } from "viem/accounts";
import { ethAddress } from "../../shared/identifiers.js";
import type { EthSigner, Hex, SignTypedDataParams } from "./types.js";

const HEX_KEY_RE = /^0x[0-9a-fA-F]{64}$/;

function isPrivateKey(value: string): value is Hex {
	return HEX_KEY_RE.test(value);
}

/**
 * Creates an EthSigner from a private key hex string.
 * @param privateKey - 64-character hex string (with 0x prefix)
 * @throws Error if private key format is invalid; the message never contains the key
 */
export function createSigner(privateKey: string): EthSigner {
	const trimmed = privateKey.trim();
	if (!isPrivateKey(trimmed)) {
		throw new Error("Invalid private key format");
	}
	let account: ReturnType<typeof privateKeyToAccount>;
	try {
		account = privateKeyToAccount(trimmed);
	} catch {
		throw new Error("Invalid private key format");
	}

	const signer: EthSigner = {
		address: ethAddress(account.address),

		async signTypedData(params: SignTypedDataParams): Promise<Hex> {
			return account.signTypedData({
				domain: params.domain,
				types: params.types as Record<string, { name: string; type: string }[]>,
				primaryType: params.primaryType,
				message: params.message,
			});
		},
	};

	Object.defineProperty(signer, "toString", { value: () => "[EthSigner]", enumerable: false });
	Object.defineProperty(signer, "toJSON", { value: () => "[EthSigner]", enumerable: false });

	return signer;
}
