export {
	PipelineStage,
	type AuctionGate,
	type PipelineOutcome,
	type PipelineRequest,
} from "./types.js";
export { ActionPipeline, type ActionPipelineDeps } from "./action-pipeline.js";
export { describeOutcome, exitCodeFor, registeredTokenIndex } from "./outcome.js";
