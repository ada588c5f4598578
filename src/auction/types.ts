/**
 * Gas auction types — observed snapshots and the gate's state machine.
 */

import type { Decimal } from "../lib/decimal/index.js";
import type { PipelineError } from "../shared/errors.js";
import type { EthAddress } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/** One fresh observation of the spot-deploy gas auction. Never cached. */
export interface AuctionState {
	readonly startTimeMs: number | null;
	readonly durationMs: number | null;
	/** HYPE */
	readonly startGas: Decimal | null;
	/** HYPE; null while no auction is running */
	readonly currentGas: Decimal | null;
}

export const AuctionPhase = {
	/** Start time is known and still ahead */
	AwaitingStart: "awaiting_start",
	/** Auction live (or just started) but the price is above the bid */
	AwaitingPrice: "awaiting_price",
	/** Current price is at or below the bid */
	Ready: "ready",
	/** Auction concluded; terminal for this run */
	Expired: "expired",
} as const;

export type AuctionPhase = (typeof AuctionPhase)[keyof typeof AuctionPhase];

export type AuctionDecision =
	| {
			readonly phase: typeof AuctionPhase.AwaitingStart;
			readonly waitMs: number;
			readonly reason: string;
	  }
	| {
			readonly phase: typeof AuctionPhase.AwaitingPrice;
			readonly waitMs: number;
			readonly reason: string;
	  }
	| {
			readonly phase: typeof AuctionPhase.Ready;
			readonly currentGas: Decimal;
			readonly reason: string;
	  }
	| { readonly phase: typeof AuctionPhase.Expired; readonly reason: string };

export interface EvaluationContext {
	readonly now: number;
	/** Bid ceiling in wei */
	readonly maxGas: bigint;
	readonly pollIntervalMs: number;
	readonly startSettleMs: number;
}

/** Read-only view of the auction for one account. */
export interface AuctionSource {
	fetch(user: EthAddress): Promise<Result<AuctionState, PipelineError>>;
}

export interface AuctionTransition {
	readonly from: AuctionPhase;
	readonly to: AuctionPhase;
	readonly reason: string;
	readonly timestamp: number;
}

/** The snapshot that opened the gate. */
export interface AuctionReady {
	readonly snapshot: AuctionState;
	readonly currentGas: Decimal;
	readonly polls: number;
}
