/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * An EthAddress can only be produced by `ethAddress()`, which checks the
 * 20-byte hex format, so an unchecked string never reaches the action hash.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** 0x-prefixed 20-byte hex address, lower-cased. */
export type EthAddress = Brand<string, "EthAddress">;

/** Spot token index on the exchange. */
export type TokenIndex = Brand<number, "TokenIndex">;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

/** Create a validated EthAddress. Throws if empty or not a 20-byte hex string. */
export function ethAddress(value: string): EthAddress {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("EthAddress cannot be empty");
	}
	if (!ADDRESS_RE.test(trimmed)) {
		throw new Error(`EthAddress must be 0x followed by 40 hex characters, got: ${trimmed}`);
	}
	return trimmed.toLowerCase() as EthAddress;
}

export function isEthAddress(value: string): boolean {
	return ADDRESS_RE.test(value.trim());
}

/** Create a TokenIndex. Throws unless `value` is a non-negative safe integer. */
export function tokenIndex(value: number): TokenIndex {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new Error(`TokenIndex must be a non-negative integer, got: ${value}`);
	}
	return value as TokenIndex;
}
