/**
 * Action construction — validates raw settings into frozen Action values.
 *
 * Pure: no clock, no I/O. Every failure is a ConfigurationError carrying
 * the offending fields in its context.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigurationError } from "../shared/errors.js";
import { tokenIndex } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	type Action,
	ActionType,
	type FinalizeEvmContractAction,
	type FinalizeEvmContractFields,
	type RegisterSpotTokenAction,
	type RegisterSpotTokenFields,
	StorageSlotKind,
	type StorageSlotSelector,
} from "./types.js";

/** Upper bound for size/wei decimals; anything above is a misconfiguration. */
export const MAX_TOKEN_DECIMALS = 18;

const MAX_UINT64 = 2n ** 64n - 1n;

const nonNegativeInt = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
const decimals = z.number().int().min(0).max(MAX_TOKEN_DECIMALS);
const label = z.string().trim().min(1, "must not be empty");

const finalizeSchema = z.object({
	token: nonNegativeInt,
	deployNonce: nonNegativeInt.optional(),
});

const maxGasSchema = z
	.union([
		z.bigint(),
		z.number().int().max(Number.MAX_SAFE_INTEGER),
		z.string().trim().regex(/^\d+$/, "must be an integer amount of wei"),
	])
	.transform((value) => BigInt(value))
	.refine((value) => value > 0n, "must be positive")
	.refine((value) => value <= MAX_UINT64, "must fit in 64 bits");

const registerSchema = z.object({
	tokenName: label,
	szDecimals: decimals,
	weiDecimals: decimals,
	maxGas: maxGasSchema,
	fullName: label,
});

export type ActionRequest =
	| {
			readonly kind: typeof ActionType.FinalizeEvmContract;
			readonly fields: FinalizeEvmContractFields;
	  }
	| {
			readonly kind: typeof ActionType.RegisterSpotToken;
			readonly fields: RegisterSpotTokenFields;
	  };

/** Build any supported action from its kind and raw fields. */
export function buildAction(request: ActionRequest): Result<Action, ConfigurationError> {
	switch (request.kind) {
		case ActionType.FinalizeEvmContract:
			return buildFinalizeEvmContract(request.fields);
		case ActionType.RegisterSpotToken:
			return buildRegisterSpotToken(request.fields);
	}
}

/**
 * Re-run validation on an action that did not come from this module.
 * A valid action comes back equal to itself.
 */
export function rebuildAction(action: Action): Result<Action, ConfigurationError> {
	return buildAction(requestFor(action));
}

function requestFor(action: Action): ActionRequest {
	switch (action.type) {
		case ActionType.FinalizeEvmContract: {
			const { input } = action;
			return {
				kind: ActionType.FinalizeEvmContract,
				fields: {
					token: action.token,
					useFirstStorageSlot: input.kind === StorageSlotKind.FirstStorageSlot,
					useCustomStorageSlot: input.kind === StorageSlotKind.CustomStorageSlot,
					deployNonce: input.kind === StorageSlotKind.CreateAtNonce ? input.nonce : undefined,
				},
			};
		}
		case ActionType.RegisterSpotToken:
			return {
				kind: ActionType.RegisterSpotToken,
				fields: {
					tokenName: action.tokenName,
					szDecimals: action.szDecimals,
					weiDecimals: action.weiDecimals,
					maxGas: action.maxGas,
					fullName: action.fullName,
				},
			};
	}
}

/**
 * Exactly one storage-slot strategy must be chosen; none or several is
 * ambiguous and rejected before anything is signed.
 */
export function buildFinalizeEvmContract(
	fields: FinalizeEvmContractFields,
): Result<FinalizeEvmContractAction, ConfigurationError> {
	const selected: StorageSlotKind[] = [];
	if (fields.useFirstStorageSlot === true) selected.push(StorageSlotKind.FirstStorageSlot);
	if (fields.useCustomStorageSlot === true) selected.push(StorageSlotKind.CustomStorageSlot);
	if (fields.deployNonce !== undefined) selected.push(StorageSlotKind.CreateAtNonce);

	if (selected.length !== 1) {
		return err(
			new ConfigurationError(
				selected.length === 0
					? "No storage slot strategy selected"
					: `Ambiguous storage slot strategy: ${selected.join(", ")}`,
				{ selected },
				"Set exactly one of: first storage slot, custom storage slot, deploy nonce",
			),
		);
	}

	const parsed = validate(finalizeSchema, { token: fields.token, deployNonce: fields.deployNonce });
	if (!parsed.ok) {
		return err(
			new ConfigurationError(
				`Invalid ${ActionType.FinalizeEvmContract}: ${formatIssues(parsed.error.issues)}`,
				{ cause: parsed.error },
			),
		);
	}

	const { token, deployNonce } = parsed.value;
	let input: StorageSlotSelector;
	if (deployNonce !== undefined) {
		input = Object.freeze({ kind: StorageSlotKind.CreateAtNonce, nonce: deployNonce });
	} else if (fields.useFirstStorageSlot === true) {
		input = Object.freeze({ kind: StorageSlotKind.FirstStorageSlot });
	} else {
		input = Object.freeze({ kind: StorageSlotKind.CustomStorageSlot });
	}

	return ok(
		Object.freeze({
			type: ActionType.FinalizeEvmContract,
			token: tokenIndex(token),
			input,
		}),
	);
}

export function buildRegisterSpotToken(
	fields: RegisterSpotTokenFields,
): Result<RegisterSpotTokenAction, ConfigurationError> {
	const parsed = validate(registerSchema, fields);
	if (!parsed.ok) {
		return err(
			new ConfigurationError(
				`Invalid ${ActionType.RegisterSpotToken}: ${formatIssues(parsed.error.issues)}`,
				{ cause: parsed.error },
			),
		);
	}

	const v = parsed.value;
	return ok(
		Object.freeze({
			type: ActionType.RegisterSpotToken,
			tokenName: v.tokenName,
			szDecimals: v.szDecimals,
			weiDecimals: v.weiDecimals,
			maxGas: v.maxGas,
			fullName: v.fullName,
		}),
	);
}

/** One-line description of a selector for logs. */
export function describeStorageSlot(selector: StorageSlotSelector): string {
	switch (selector.kind) {
		case StorageSlotKind.FirstStorageSlot:
			return "first storage slot";
		case StorageSlotKind.CustomStorageSlot:
			return 'custom storage slot (keccak256("HyperCore deployer"))';
		case StorageSlotKind.CreateAtNonce:
			return `deploy nonce ${selector.nonce}`;
	}
}
