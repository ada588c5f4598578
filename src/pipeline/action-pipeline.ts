/**
 * ActionPipeline — build → (gate) → sign → submit, one terminal outcome per run.
 *
 * Every action is validated before it is signed, including one handed in
 * already built.
 *
 * Exactly one signature and at most one submission happen per run, however
 * many auction polls came before. Cancellation is checked between steps
 * only; a request already in flight is allowed to finish.
 */

import {
	type ActionRequest,
	buildAction,
	describeStorageSlot,
	rebuildAction,
} from "../action/action-builder.js";
import type {
	Action,
	FinalizeEvmContractFields,
	RegisterSpotTokenFields,
} from "../action/types.js";
import { ActionType } from "../action/types.js";
import { toWireJson } from "../action/wire.js";
import type { AuctionPoller } from "../auction/auction-poller.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { type PipelineConfig, isMainnet } from "../shared/config.js";
import {
	ConfigurationError,
	type PipelineError,
	isAuctionExpired,
	isCancelled,
} from "../shared/errors.js";
import type { Sleeper } from "../shared/time.js";
import { SystemSleeper } from "../shared/time.js";
import type { ActionSigner } from "../signing/action-signer.js";
import type { ExchangeClient } from "../submission/exchange-client.js";
import {
	type AuctionGate,
	type PipelineOutcome,
	type PipelineRequest,
	PipelineStage,
} from "./types.js";

export interface ActionPipelineDeps {
	readonly config: PipelineConfig;
	readonly signer: ActionSigner;
	readonly exchange: ExchangeClient;
	/** Required only for gated runs */
	readonly auction?: AuctionPoller | undefined;
	readonly sleeper?: Sleeper | undefined;
	readonly logger?: Logger | undefined;
}

function isActionRequest(value: Action | ActionRequest): value is ActionRequest {
	return "fields" in value;
}

function gateMaxGas(action: Action, gate: AuctionGate): bigint | undefined {
	if (gate.maxGas !== undefined) return gate.maxGas;
	return action.type === ActionType.RegisterSpotToken ? action.maxGas : undefined;
}

export class ActionPipeline {
	private readonly config: PipelineConfig;
	private readonly signer: ActionSigner;
	private readonly exchange: ExchangeClient;
	private readonly auction: AuctionPoller | undefined;
	private readonly sleeper: Sleeper;
	private readonly logger: Logger;

	constructor(deps: ActionPipelineDeps) {
		this.config = deps.config;
		this.signer = deps.signer;
		this.exchange = deps.exchange;
		this.auction = deps.auction;
		this.sleeper = deps.sleeper ?? SystemSleeper;
		this.logger = (deps.logger ?? silentLogger).child({ component: "pipeline" });
	}

	/** Unconditional submit: link a spot token to its EVM contract. */
	finalizeEvmContract(
		fields: FinalizeEvmContractFields,
		signal?: AbortSignal,
	): Promise<PipelineOutcome> {
		return this.run({ action: { kind: ActionType.FinalizeEvmContract, fields } }, signal);
	}

	/** Poll-then-submit: bid for a ticker once the auction price is within `maxGas`. */
	registerSpotToken(
		fields: RegisterSpotTokenFields,
		signal?: AbortSignal,
	): Promise<PipelineOutcome> {
		return this.run({ action: { kind: ActionType.RegisterSpotToken, fields }, gate: {} }, signal);
	}

	async run(request: PipelineRequest, signal?: AbortSignal): Promise<PipelineOutcome> {
		if (signal?.aborted) return this.cancelled(PipelineStage.Build);

		// ── Build ──
		const built = isActionRequest(request.action)
			? buildAction(request.action)
			: rebuildAction(request.action);
		if (!built.ok) return this.failed(PipelineStage.Build, built.error);
		const action = built.value;
		this.logger.info(
			{
				actionType: action.type,
				network: this.config.network,
				...(action.type === ActionType.FinalizeEvmContract && {
					token: action.token,
					storageSlot: describeStorageSlot(action.input),
				}),
			},
			"Action built",
		);

		// ── Gate ──
		if (request.gate !== undefined) {
			const maxGas = gateMaxGas(action, request.gate);
			if (maxGas === undefined) {
				return this.failed(
					PipelineStage.Gate,
					new ConfigurationError("Auction gate needs a maxGas", { actionType: action.type }),
				);
			}
			if (this.auction === undefined) {
				return this.failed(
					PipelineStage.Gate,
					new ConfigurationError(
						"Auction gate requested but no auction poller configured",
						{ actionType: action.type },
						"Pass an AuctionPoller to the pipeline",
					),
				);
			}

			const user = this.config.vaultAddress ?? this.signer.address;
			const ready = await this.auction.waitUntilReady(user, maxGas, signal);
			if (!ready.ok) {
				if (isAuctionExpired(ready.error)) return { kind: "expired", error: ready.error };
				if (isCancelled(ready.error)) return this.cancelled(PipelineStage.Gate);
				return this.failed(PipelineStage.Gate, ready.error);
			}

			// ── Confirm ──
			if (this.config.confirmDelayMs > 0) {
				this.logger.info(
					{ delayMs: this.config.confirmDelayMs },
					"Auction ready, pausing before signing",
				);
				await this.sleeper.sleep(this.config.confirmDelayMs, signal);
				if (signal?.aborted) return this.cancelled(PipelineStage.Confirm);
			}
		}

		// ── Sign ──
		if (signal?.aborted) return this.cancelled(PipelineStage.Sign);
		const signed = await this.signer.sign(action, {
			isMainnet: isMainnet(this.config),
			vaultAddress: this.config.vaultAddress,
			expiresAfter: this.config.expiresAfter,
		});
		if (!signed.ok) return this.failed(PipelineStage.Sign, signed.error);
		const payload = signed.value;

		// ── Submit ──
		if (signal?.aborted) return this.cancelled(PipelineStage.Submit);
		const outcome = await this.exchange.submit(payload, { dryRun: this.config.dryRun });
		if (outcome.kind === "dryRun") {
			return { kind: "dryRun", payload, actionJson: toWireJson(payload.action, 2) };
		}
		return { kind: "submitted", result: outcome.result, payload };
	}

	private cancelled(stage: PipelineStage): PipelineOutcome {
		this.logger.warn({ stage }, "Run cancelled");
		return { kind: "cancelled", stage };
	}

	private failed(stage: PipelineStage, error: PipelineError): PipelineOutcome {
		this.logger.error({ stage, err: error.toJSON() }, "Run failed");
		return { kind: "failed", stage, error };
	}
}
