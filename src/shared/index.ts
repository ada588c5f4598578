export {
	type Result,
	ok,
	err,
	tryCatch,
} from "./result.js";
export {
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
	isTimeoutError,
	isCancelled,
} from "./errors.js";
export {
	type Clock,
	type Sleeper,
	SystemClock,
	SystemSleeper,
	Duration,
} from "./time.js";
export {
	type EthAddress,
	type TokenIndex,
	ethAddress,
	isEthAddress,
	tokenIndex,
} from "./identifiers.js";
export {
	type Network,
	type PipelineConfig,
	NETWORKS,
	DEFAULT_PIPELINE_CONFIG,
	apiUrlFor,
	isMainnet,
	resolveConfig,
	configFromEnv,
} from "./config.js";
