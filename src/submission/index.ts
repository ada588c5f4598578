export {
	TransportFailureKind,
	type SubmissionResult,
	type SubmitOptions,
	type SubmitOutcome,
	type TransportFailure,
} from "./types.js";
export {
	ExchangeClient,
	type ExchangeClientConfig,
	exchangeRequestBody,
} from "./exchange-client.js";
