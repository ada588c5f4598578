/**
 * Pipeline request and terminal outcomes.
 */

import type { ActionRequest } from "../action/action-builder.js";
import type { Action } from "../action/types.js";
import type { AuctionExpiredError, PipelineError } from "../shared/errors.js";
import type { SubmissionPayload } from "../signing/types.js";
import type { SubmissionResult } from "../submission/types.js";

/** Hold the action until the gas auction price is at or below `maxGas` (wei). */
export interface AuctionGate {
	/** Defaults to the action's own `maxGas` when it has one */
	readonly maxGas?: bigint | undefined;
}

export interface PipelineRequest {
	/** A built action or raw fields; both are validated before signing */
	readonly action: Action | ActionRequest;
	readonly gate?: AuctionGate | undefined;
}

export const PipelineStage = {
	Build: "build",
	Gate: "gate",
	Confirm: "confirm",
	Sign: "sign",
	Submit: "submit",
} as const;

export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

/** Exactly one per run. Every variant is distinguishable from every other. */
export type PipelineOutcome =
	| {
			readonly kind: "dryRun";
			readonly payload: SubmissionPayload;
			/** Pretty-printed wire action, as it would have been sent */
			readonly actionJson: string;
	  }
	| {
			readonly kind: "submitted";
			readonly result: SubmissionResult;
			readonly payload: SubmissionPayload;
	  }
	| { readonly kind: "expired"; readonly error: AuctionExpiredError }
	| { readonly kind: "cancelled"; readonly stage: PipelineStage }
	| {
			readonly kind: "failed";
			readonly stage: PipelineStage;
			/** ConfigurationError, SigningError, or the poll's transport error */
			readonly error: PipelineError;
	  };
