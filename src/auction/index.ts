export {
	AuctionPhase,
	type AuctionDecision,
	type AuctionReady,
	type AuctionSource,
	type AuctionState,
	type AuctionTransition,
	type EvaluationContext,
} from "./types.js";
export { GAS_WEI_PER_HYPE, gasToHype, isWithinBid } from "./gas.js";
export { evaluateAuction } from "./evaluate.js";
export { AuctionStatusClient, type AuctionStatusClientConfig } from "./auction-client.js";
export {
	AuctionPoller,
	type AuctionPollerConfig,
	type AuctionPollerDeps,
} from "./auction-poller.js";
