import { Decimal } from "../lib/decimal/index.js";

/**
 * Wei per HYPE for auction gas. Fixed by the exchange, not tunable.
 */
export const GAS_WEI_PER_HYPE = Decimal.pow10(12);

/** 14_500_000_000_000_000n → 14500 */
export function gasToHype(wei: bigint): Decimal {
	return Decimal.from(wei).div(GAS_WEI_PER_HYPE);
}

/**
 * True when `currentGas` (HYPE) is at or below `maxGas` (wei). Compared in
 * wei, exactly; equality opens the gate.
 */
export function isWithinBid(currentGas: Decimal, maxGas: bigint): boolean {
	return currentGas.mul(GAS_WEI_PER_HYPE).lte(Decimal.from(maxGas));
}
