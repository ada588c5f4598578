/**
 * Submission outcomes.
 *
 * DryRun is not a SubmissionResult variant; only SubmitOutcome carries it.
 */

import type { SubmissionPayload } from "../signing/types.js";

export const TransportFailureKind = {
	Timeout: "timeout",
	HttpError: "httpError",
	NetworkError: "networkError",
	UnexpectedResponseShape: "unexpectedResponseShape",
} as const;

export type TransportFailureKind = (typeof TransportFailureKind)[keyof typeof TransportFailureKind];

export interface TransportFailure {
	readonly kind: TransportFailureKind;
	readonly message: string;
	/** HTTP status, when a response arrived */
	readonly status?: number | undefined;
	/** Parsed error body (or raw text) from the remote, verbatim */
	readonly detail?: unknown;
}

export type SubmissionResult =
	| { readonly kind: "accepted"; readonly responseData: unknown }
	| { readonly kind: "rejected"; readonly errorDetail: unknown }
	| { readonly kind: "transportFailure"; readonly failure: TransportFailure };

export type SubmitOutcome =
	| { readonly kind: "dryRun"; readonly payload: SubmissionPayload }
	| { readonly kind: "submitted"; readonly result: SubmissionResult };

export interface SubmitOptions {
	readonly dryRun: boolean;
}
