/**
 * AuctionStatusClient — reads the spot-deploy gas auction from the info endpoint.
 *
 * POST <base>/info  { "type": "spotDeployState", "user": <address> }
 *   → { gasAuction: { startTimeSeconds, durationSeconds, startGas, currentGas, endGas }, ... }
 *
 * Read-only; callers may retry it.
 */

import { Decimal } from "../lib/decimal/index.js";
import { type FetchFn, postJson } from "../lib/http/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { HttpStatusError, type PipelineError, UnexpectedResponseError } from "../shared/errors.js";
import type { EthAddress } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import type { AuctionSource, AuctionState } from "./types.js";

const gasValue = z.union([z.string(), z.number()]).nullish();
const seconds = z.number().nonnegative().nullish();

const spotDeployStateSchema = z.object({
	gasAuction: z
		.object({
			startTimeSeconds: seconds,
			durationSeconds: seconds,
			startGas: gasValue,
			currentGas: gasValue,
		})
		.nullish(),
});

export interface AuctionStatusClientConfig {
	/** Base URL without trailing slash */
	readonly apiUrl: string;
	readonly timeoutMs: number;
	readonly fetchFn?: FetchFn | undefined;
}

function toGas(value: string | number | null | undefined): Decimal | null {
	return value === null || value === undefined ? null : Decimal.from(value);
}

function toMs(value: number | null | undefined): number | null {
	return value === null || value === undefined ? null : Duration.seconds(value);
}

export class AuctionStatusClient implements AuctionSource {
	private readonly url: string;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchFn;

	constructor(config: AuctionStatusClientConfig) {
		this.url = `${config.apiUrl}/info`;
		this.timeoutMs = config.timeoutMs;
		this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
	}

	async fetch(user: EthAddress): Promise<Result<AuctionState, PipelineError>> {
		const response = await postJson(this.url, JSON.stringify({ type: "spotDeployState", user }), {
			fetchFn: this.fetchFn,
			timeoutMs: this.timeoutMs,
		});
		if (!response.ok) return response;

		const { status, body, text } = response.value;
		if (status < 200 || status >= 300) {
			return err(new HttpStatusError(status, body ?? text, { url: this.url }));
		}

		const parsed = validate(spotDeployStateSchema, body);
		if (!parsed.ok) {
			return err(
				new UnexpectedResponseError(
					`Unexpected spotDeployState response: ${formatIssues(parsed.error.issues)}`,
					body ?? text,
				),
			);
		}

		const auction = parsed.value.gasAuction;
		const state = tryCatch(
			(): AuctionState => ({
				startTimeMs: toMs(auction?.startTimeSeconds),
				durationMs: toMs(auction?.durationSeconds),
				startGas: toGas(auction?.startGas),
				currentGas: toGas(auction?.currentGas),
			}),
		);
		if (!state.ok) {
			return err(new UnexpectedResponseError(state.error.message, body, { cause: state.error }));
		}
		return ok(state.value);
	}
}
