export type {
	Signature,
	SignCapability,
	SignRequest,
	SigningContext,
	SubmissionPayload,
} from "./types.js";
export { NonceSource } from "./nonce-source.js";
export { L1_DOMAIN, actionHash, l1TypedData } from "./l1-hash.js";
export { createL1SignCapability, signCapabilityFromKey } from "./l1-sign-capability.js";
export { ActionSigner, type ActionSignerDeps } from "./action-signer.js";
export { redactPayload } from "./payload-display.js";
