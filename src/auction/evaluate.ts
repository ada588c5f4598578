/**
 * Pure transition function of the auction gate.
 *
 *   currentGas present      → Ready if within bid, else AwaitingPrice (wait one interval)
 *   start ahead             → AwaitingStart (wait until start, at most one interval)
 *   start passed, settling  → AwaitingPrice (price not yet observable, re-poll)
 *   otherwise               → Expired
 *
 * "Settling" means less than `startSettleMs` since the start and, when the
 * duration is known, before the scheduled end.
 */

import { gasToHype, isWithinBid } from "./gas.js";
import {
	type AuctionDecision,
	AuctionPhase,
	type AuctionState,
	type EvaluationContext,
} from "./types.js";

export function evaluateAuction(state: AuctionState, ctx: EvaluationContext): AuctionDecision {
	if (state.currentGas !== null) {
		const bid = gasToHype(ctx.maxGas);
		if (isWithinBid(state.currentGas, ctx.maxGas)) {
			return {
				phase: AuctionPhase.Ready,
				currentGas: state.currentGas,
				reason: `price ${state.currentGas.toString()} <= bid ${bid.toString()}`,
			};
		}
		return {
			phase: AuctionPhase.AwaitingPrice,
			waitMs: ctx.pollIntervalMs,
			reason: `price ${state.currentGas.toString()} > bid ${bid.toString()}`,
		};
	}

	if (state.startTimeMs === null) {
		return { phase: AuctionPhase.Expired, reason: "no gas price and no scheduled start" };
	}

	const untilStart = state.startTimeMs - ctx.now;
	if (untilStart > 0) {
		return {
			phase: AuctionPhase.AwaitingStart,
			waitMs: Math.min(ctx.pollIntervalMs, untilStart),
			reason: `starts in ${Math.ceil(untilStart / 1000)}s`,
		};
	}

	const sinceStart = -untilStart;
	const ended = state.durationMs !== null && sinceStart >= state.durationMs;
	if (!ended && sinceStart < ctx.startSettleMs) {
		return {
			phase: AuctionPhase.AwaitingPrice,
			waitMs: ctx.pollIntervalMs,
			reason: "started, gas price not yet observable",
		};
	}

	return { phase: AuctionPhase.Expired, reason: "auction has completed" };
}
