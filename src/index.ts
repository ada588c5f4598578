// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	type Clock,
	type Sleeper,
	SystemClock,
	SystemSleeper,
	Duration,
	type EthAddress,
	type TokenIndex,
	ethAddress,
	tokenIndex,
	type Network,
	type PipelineConfig,
	NETWORKS,
	DEFAULT_PIPELINE_CONFIG,
	apiUrlFor,
	resolveConfig,
	configFromEnv,
	ErrorCategory,
	PipelineError,
	ConfigurationError,
	SigningError,
	AuctionExpiredError,
	TimeoutError,
	NetworkError,
	HttpStatusError,
	UnexpectedResponseError,
	CancelledError,
	classifyError,
	isAuctionExpired,
	isCancelled,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { Decimal } from "./lib/decimal/index.js";
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError } from "./lib/validation/index.js";
export type { FetchFn } from "./lib/http/index.js";

// ── Actions ──────────────────────────────────────────────────────────
export {
	ActionType,
	StorageSlotKind,
	type Action,
	type ActionRequest,
	type FinalizeEvmContractAction,
	type FinalizeEvmContractFields,
	type RegisterSpotTokenAction,
	type RegisterSpotTokenFields,
	type StorageSlotSelector,
	type WireAction,
	MAX_TOKEN_DECIMALS,
	buildAction,
	buildFinalizeEvmContract,
	buildRegisterSpotToken,
	encodeAction,
	toWireAction,
	toWireJson,
} from "./action/index.js";

// ── Signing ──────────────────────────────────────────────────────────
export {
	type Signature,
	type SignCapability,
	type SignRequest,
	type SigningContext,
	type SubmissionPayload,
	ActionSigner,
	NonceSource,
	createL1SignCapability,
	signCapabilityFromKey,
	redactPayload,
} from "./signing/index.js";

// ── Auction ──────────────────────────────────────────────────────────
export {
	AuctionPhase,
	type AuctionReady,
	type AuctionSource,
	type AuctionState,
	type AuctionTransition,
	AuctionPoller,
	AuctionStatusClient,
	evaluateAuction,
	gasToHype,
} from "./auction/index.js";

// ── Submission ───────────────────────────────────────────────────────
export {
	ExchangeClient,
	TransportFailureKind,
	type SubmissionResult,
	type SubmitOutcome,
	type TransportFailure,
} from "./submission/index.js";

// ── Pipeline ─────────────────────────────────────────────────────────
export {
	ActionPipeline,
	PipelineStage,
	type PipelineOutcome,
	type PipelineRequest,
	describeOutcome,
	exitCodeFor,
} from "./pipeline/index.js";
