/**
 * ExchangeClient — one POST of a signed payload to `<base>/exchange`.
 *
 * Exactly one attempt per call. The actions sent here are irreversible, and
 * a timed-out request may still have been executed by the exchange, so no
 * outcome is retried.
 */

import { toWireJson } from "../action/wire.js";
import { type FetchFn, postJson } from "../lib/http/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { type PipelineError, isTimeoutError } from "../shared/errors.js";
import type { SubmissionPayload } from "../signing/types.js";
import {
	type SubmissionResult,
	type SubmitOptions,
	type SubmitOutcome,
	type TransportFailure,
	TransportFailureKind,
} from "./types.js";

const envelopeSchema = z.discriminatedUnion("status", [
	z.object({ status: z.literal("ok"), response: z.unknown() }),
	z.object({ status: z.literal("err"), response: z.unknown() }),
]);

export interface ExchangeClientConfig {
	/** Base URL without trailing slash */
	readonly apiUrl: string;
	readonly timeoutMs: number;
	readonly fetchFn?: FetchFn | undefined;
	readonly logger?: Logger | undefined;
}

/** Request body, key order as the exchange documents it. */
export function exchangeRequestBody(payload: SubmissionPayload): string {
	return toWireJson({
		action: payload.action,
		nonce: payload.nonce,
		signature: payload.signature,
		vaultAddress: payload.vaultAddress,
		...(payload.expiresAfter !== undefined && { expiresAfter: payload.expiresAfter }),
	});
}

function transportFailure(failure: TransportFailure): SubmissionResult {
	return { kind: "transportFailure", failure };
}

function fromTransportError(error: PipelineError): TransportFailure {
	if (isTimeoutError(error)) {
		return { kind: TransportFailureKind.Timeout, message: error.message };
	}
	return { kind: TransportFailureKind.NetworkError, message: error.message };
}

export class ExchangeClient {
	private readonly url: string;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchFn;
	private readonly logger: Logger;

	constructor(config: ExchangeClientConfig) {
		this.url = `${config.apiUrl}/exchange`;
		this.timeoutMs = config.timeoutMs;
		this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
		this.logger = (config.logger ?? silentLogger).child({ component: "exchange-client" });
	}

	async submit(payload: SubmissionPayload, options: SubmitOptions): Promise<SubmitOutcome> {
		if (options.dryRun) {
			this.logger.info(
				{ actionType: payload.action.type, nonce: payload.nonce },
				"Dry run, not sending",
			);
			return { kind: "dryRun", payload };
		}

		const result = await this.post(payload);
		return { kind: "submitted", result };
	}

	private async post(payload: SubmissionPayload): Promise<SubmissionResult> {
		this.logger.info(
			{ url: this.url, actionType: payload.action.type, nonce: payload.nonce },
			"Submitting action",
		);

		const response = await postJson(this.url, exchangeRequestBody(payload), {
			fetchFn: this.fetchFn,
			timeoutMs: this.timeoutMs,
		});

		if (!response.ok) {
			const failure = fromTransportError(response.error);
			if (failure.kind === TransportFailureKind.Timeout) {
				this.logger.warn(
					{ nonce: payload.nonce, timeoutMs: this.timeoutMs },
					"Submission timed out; the action may still have been accepted. Check account state before resubmitting",
				);
			} else {
				this.logger.error({ err: response.error.message }, "Submission transport error");
			}
			return transportFailure(failure);
		}

		const { status, ok: is2xx, body, text } = response.value;
		if (!is2xx) {
			const detail = body ?? text;
			this.logger.error({ status, detail }, "Exchange returned an HTTP error");
			return transportFailure({
				kind: TransportFailureKind.HttpError,
				message: `HTTP ${status}`,
				status,
				detail,
			});
		}

		const envelope = envelopeSchema.safeParse(body);
		if (!envelope.success) {
			this.logger.error({ status, body: body ?? text }, "Unexpected exchange response");
			return transportFailure({
				kind: TransportFailureKind.UnexpectedResponseShape,
				message: "Response is not a { status, response } envelope",
				status,
				detail: body ?? text,
			});
		}

		if (envelope.data.status === "ok") {
			this.logger.info({ response: envelope.data.response }, "Action accepted");
			return { kind: "accepted", responseData: envelope.data.response };
		}
		this.logger.error({ response: envelope.data.response }, "Action rejected");
		return { kind: "rejected", errorDetail: envelope.data.response };
	}
}
