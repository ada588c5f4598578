/**
 * ActionSigner — turns a validated Action into a frozen SubmissionPayload.
 *
 * The nonce is drawn here, immediately before the capability is invoked,
 * never when the action was built: a slow build or a long auction wait must
 * not leave a stale nonce behind.
 */

import type { Action } from "../action/types.js";
import { encodeAction, toWireAction } from "../action/wire.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { SigningError } from "../shared/errors.js";
import type { EthAddress } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";
import type { NonceSource } from "./nonce-source.js";
import type { SignCapability, Signature, SigningContext, SubmissionPayload } from "./types.js";

const hexComponent = z
	.string()
	.regex(/^0x[0-9a-fA-F]{1,64}$/, "must be 0x-prefixed hex of at most 32 bytes")
	.transform((value): `0x${string}` => `0x${value.slice(2)}`);

const signatureSchema = z.object({
	r: hexComponent,
	s: hexComponent,
	v: z.union([z.literal(27), z.literal(28)]),
});

export interface ActionSignerDeps {
	readonly capability: SignCapability;
	/** One source per key, shared by every signer that uses that key */
	readonly nonces: NonceSource;
	readonly logger?: Logger | undefined;
}

export class ActionSigner {
	private readonly capability: SignCapability;
	private readonly nonces: NonceSource;
	private readonly logger: Logger;

	constructor(deps: ActionSignerDeps) {
		this.capability = deps.capability;
		this.nonces = deps.nonces;
		this.logger = (deps.logger ?? silentLogger).child({ component: "signer" });
	}

	get address(): EthAddress {
		return this.capability.address;
	}

	async sign(
		action: Action,
		context: SigningContext,
	): Promise<Result<SubmissionPayload, SigningError>> {
		const wire = toWireAction(action);
		const encoded = tryCatch(() => encodeAction(wire));
		if (!encoded.ok) {
			return err(
				new SigningError(`Failed to encode action: ${encoded.error.message}`, {
					cause: encoded.error,
					actionType: action.type,
				}),
			);
		}

		const nonce = this.nonces.next();

		let raw: unknown;
		try {
			raw = await this.capability.sign({
				actionBytes: encoded.value,
				nonce,
				expiresAfter: context.expiresAfter,
				vaultAddress: context.vaultAddress,
				isMainnet: context.isMainnet,
			});
		} catch (e) {
			const message = e instanceof Error ? e.message : String(e);
			return err(
				new SigningError(`Sign capability failed: ${message}`, {
					cause: e,
					actionType: action.type,
					nonce,
				}),
			);
		}

		const checked = validate(signatureSchema, raw);
		if (!checked.ok) {
			return err(
				new SigningError(`Malformed signature: ${formatIssues(checked.error.issues)}`, {
					cause: checked.error,
					nonce,
				}),
			);
		}

		const signature: Signature = Object.freeze(checked.value);
		const payload: SubmissionPayload = Object.freeze({
			action: wire,
			nonce,
			signature,
			vaultAddress: context.vaultAddress ?? null,
			...(context.expiresAfter !== undefined && { expiresAfter: context.expiresAfter }),
		});

		this.logger.info(
			{
				actionType: wire.type,
				nonce,
				isMainnet: context.isMainnet,
				vaultAddress: payload.vaultAddress,
			},
			"Action signed",
		);
		return ok(payload);
	}
}
