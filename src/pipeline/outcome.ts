/**
 * Outcome helpers for the process boundary: exit codes and one-line summaries.
 */

import type { SubmissionResult } from "../submission/types.js";
import type { PipelineOutcome } from "./types.js";

/** 0 for an accepted action or a completed dry run, 1 for everything else. */
export function exitCodeFor(outcome: PipelineOutcome): 0 | 1 {
	switch (outcome.kind) {
		case "dryRun":
			return 0;
		case "submitted":
			return outcome.result.kind === "accepted" ? 0 : 1;
		case "expired":
		case "cancelled":
		case "failed":
			return 1;
	}
}

/**
 * Token index assigned by an accepted spot-token registration, found at
 * `response.data` of the exchange reply.
 */
export function registeredTokenIndex(result: SubmissionResult): number | undefined {
	if (result.kind !== "accepted") return undefined;
	const data = result.responseData;
	if (typeof data !== "object" || data === null || !("data" in data)) return undefined;
	const index: unknown = data.data;
	return typeof index === "number" && Number.isSafeInteger(index) && index >= 0 ? index : undefined;
}

function detailText(detail: unknown): string {
	if (typeof detail === "string") return detail;
	const json = JSON.stringify(detail);
	return json === undefined ? String(detail) : json;
}

function describeResult(result: SubmissionResult, actionType: string): string {
	switch (result.kind) {
		case "accepted": {
			const index = actionType === "spotDeploy" ? registeredTokenIndex(result) : undefined;
			return index === undefined
				? `Accepted: ${detailText(result.responseData)}`
				: `Accepted: registered token index ${index}`;
		}
		case "rejected":
			return `Rejected: ${detailText(result.errorDetail)}`;
		case "transportFailure": {
			const { failure } = result;
			const suffix = failure.detail === undefined ? "" : ` (${detailText(failure.detail)})`;
			return `Transport failure [${failure.kind}]: ${failure.message}${suffix}`;
		}
	}
}

export function describeOutcome(outcome: PipelineOutcome): string {
	switch (outcome.kind) {
		case "dryRun": {
			const { action, nonce } = outcome.payload;
			return `Dry run: ${action.type} signed with nonce ${nonce}, not submitted`;
		}
		case "submitted":
			return describeResult(outcome.result, outcome.payload.action.type);
		case "expired":
			return outcome.error.message;
		case "cancelled":
			return `Cancelled before ${outcome.stage}`;
		case "failed":
			return `Failed at ${outcome.stage}: ${outcome.error.message}`;
	}
}
