/**
 * AuctionPoller — drives the auction gate until Ready, Expired or cancelled.
 *
 * Each iteration fetches one fresh snapshot and decides from that snapshot
 * alone; after a sleep it always re-polls before deciding again. The only
 * suspension point is the injected Sleeper. Cancellation is checked at
 * iteration boundaries, never while a fetch is in flight.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import {
	AuctionExpiredError,
	CancelledError,
	type PipelineError,
} from "../shared/errors.js";
import type { EthAddress } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock, Sleeper } from "../shared/time.js";
import { SystemClock, SystemSleeper } from "../shared/time.js";
import { evaluateAuction } from "./evaluate.js";
import { gasToHype } from "./gas.js";
import {
	type AuctionPhase as AuctionPhaseType,
	AuctionPhase,
	type AuctionReady,
	type AuctionSource,
	type AuctionTransition,
} from "./types.js";

export interface AuctionPollerConfig {
	readonly pollIntervalMs: number;
	/** Consecutive retryable fetch failures tolerated; the next one ends the wait */
	readonly maxPollFailures: number;
	readonly startSettleMs: number;
}

export interface AuctionPollerDeps {
	readonly source: AuctionSource;
	readonly config: AuctionPollerConfig;
	readonly clock?: Clock | undefined;
	readonly sleeper?: Sleeper | undefined;
	readonly logger?: Logger | undefined;
	readonly onTransition?: ((transition: AuctionTransition) => void) | undefined;
}

export class AuctionPoller {
	private readonly source: AuctionSource;
	private readonly config: AuctionPollerConfig;
	private readonly clock: Clock;
	private readonly sleeper: Sleeper;
	private readonly logger: Logger;
	private readonly onTransition: ((transition: AuctionTransition) => void) | undefined;

	constructor(deps: AuctionPollerDeps) {
		this.source = deps.source;
		this.config = deps.config;
		this.clock = deps.clock ?? SystemClock;
		this.sleeper = deps.sleeper ?? SystemSleeper;
		this.logger = (deps.logger ?? silentLogger).child({ component: "auction-poller" });
		this.onTransition = deps.onTransition;
	}

	/**
	 * Poll until the current gas price is at or below `maxGas` (wei).
	 *
	 * Errors: AuctionExpiredError when the auction concluded, CancelledError
	 * when `signal` aborted, or the fetch error once failures are exhausted.
	 */
	async waitUntilReady(
		user: EthAddress,
		maxGas: bigint,
		signal?: AbortSignal,
	): Promise<Result<AuctionReady, PipelineError>> {
		let phase: AuctionPhaseType = AuctionPhase.AwaitingStart;
		let polls = 0;
		let failures = 0;

		this.logger.info(
			{ user, maxGas, maxGasHype: gasToHype(maxGas).toString() },
			"Waiting for gas auction",
		);

		for (;;) {
			if (signal?.aborted) {
				this.logger.warn({ polls, phase }, "Auction wait cancelled");
				return err(new CancelledError("Auction wait cancelled", { polls, phase }));
			}

			const fetched = await this.source.fetch(user);
			polls++;

			if (!fetched.ok) {
				failures++;
				const error = fetched.error;
				if (!error.isRetryable || failures > this.config.maxPollFailures) {
					this.logger.error({ err: error.toJSON(), polls, failures }, "Auction poll failed");
					return err(error);
				}
				this.logger.warn(
					{ err: error.message, failures, maxPollFailures: this.config.maxPollFailures },
					"Auction poll failed, retrying",
				);
				await this.sleeper.sleep(this.config.pollIntervalMs, signal);
				continue;
			}
			failures = 0;

			const snapshot = fetched.value;
			const decision = evaluateAuction(snapshot, {
				now: this.clock.now(),
				maxGas,
				pollIntervalMs: this.config.pollIntervalMs,
				startSettleMs: this.config.startSettleMs,
			});

			if (decision.phase !== phase) {
				this.recordTransition(phase, decision.phase, decision.reason);
				phase = decision.phase;
			}

			switch (decision.phase) {
				case AuctionPhase.Ready:
					this.logger.info(
						{ currentGas: decision.currentGas.toString(), polls },
						"Gas price acceptable",
					);
					return ok({ snapshot, currentGas: decision.currentGas, polls });

				case AuctionPhase.Expired:
					this.logger.error({ reason: decision.reason, polls }, "Auction expired");
					return err(new AuctionExpiredError(`Auction expired: ${decision.reason}`, { polls }));

				case AuctionPhase.AwaitingStart:
				case AuctionPhase.AwaitingPrice:
					this.logger.info(
						{
							phase: decision.phase,
							reason: decision.reason,
							waitMs: decision.waitMs,
							currentGas: snapshot.currentGas?.toString() ?? null,
						},
						"Auction not ready",
					);
					await this.sleeper.sleep(decision.waitMs, signal);
					break;
			}
		}
	}

	private recordTransition(from: AuctionPhaseType, to: AuctionPhaseType, reason: string): void {
		const transition: AuctionTransition = { from, to, reason, timestamp: this.clock.now() };
		this.logger.debug({ from, to, reason }, "Auction phase changed");
		this.onTransition?.(transition);
	}
}
