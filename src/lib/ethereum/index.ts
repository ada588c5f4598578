export type { EthAddress, EthSigner, Hex, SignTypedDataParams, SignatureParts } from "./types.js";
export { createSigner } from "./signer.js";
export {
	addressToBytes,
	concatBytes,
	keccak256,
	splitSignature,
	uint64BE,
} from "./bytes.js";
