import { type Mock, describe, expect, it, vi } from "vitest";
import { ActionType, StorageSlotKind } from "../action/types.js";
import { AuctionPoller } from "../auction/auction-poller.js";
import type { AuctionSource, AuctionState } from "../auction/types.js";
import { Decimal } from "../lib/decimal/index.js";
import type { FetchFn } from "../lib/http/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { type PipelineConfig, resolveConfig } from "../shared/config.js";
import { NetworkError, type PipelineError } from "../shared/errors.js";
import { ethAddress, tokenIndex } from "../shared/identifiers.js";
import { type Result, err, ok, unwrap } from "../shared/result.js";
import { FakeClock, FakeSleeper } from "../shared/time.js";
import { ActionSigner } from "../signing/action-signer.js";
import { signCapabilityFromKey } from "../signing/l1-sign-capability.js";
import { NonceSource } from "../signing/nonce-source.js";
import type { SignCapability } from "../signing/types.js";
import { ExchangeClient } from "../submission/exchange-client.js";
import { ActionPipeline } from "./action-pipeline.js";
import { exitCodeFor } from "./outcome.js";
import { PipelineStage } from "./types.js";

const TEST_PRIVATE_KEY = "0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80";
const ACCOUNT = "0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266";
const NOW = 1_700_000_000_000;
const MAX_GAS = 14_500_000_000_000_000n;

const REGISTER_FIELDS = {
	tokenName: "TESTA",
	szDecimals: 2,
	weiDecimals: 8,
	maxGas: MAX_GAS,
	fullName: "Test Token A",
};

type Snapshot = Result<AuctionState, PipelineError>;

function live(gas: string): Snapshot {
	return ok({ startTimeMs: null, durationMs: null, startGas: null, currentGas: Decimal.from(gas) });
}

const CONCLUDED: Snapshot = ok({
	startTimeMs: null,
	durationMs: null,
	startGas: null,
	currentGas: null,
});

interface Harness {
	readonly pipeline: ActionPipeline;
	readonly fetchFn: Mock<FetchFn>;
	readonly auctionFetch: Mock<AuctionSource["fetch"]>;
	readonly capability: SignCapability;
	readonly sleeper: FakeSleeper;
}

function harness(options: {
	config?: Partial<PipelineConfig>;
	exchangeBody?: string;
	snapshots?: readonly Snapshot[];
	onSleep?: (ms: number) => void;
	logger?: Logger;
}): Harness {
	const config = unwrap(resolveConfig(options.config ?? {}));
	const clock = new FakeClock(NOW);
	const sleeper = new FakeSleeper(clock, options.onSleep);

	const base = signCapabilityFromKey(TEST_PRIVATE_KEY);
	const capability: SignCapability = { address: base.address, sign: vi.fn(base.sign) };

	const body = options.exchangeBody ?? '{"status":"ok","response":{"type":"default"}}';
	const fetchFn = vi.fn<FetchFn>(async () => new Response(body, { status: 200 }));

	const snapshots = options.snapshots ?? [live("1")];
	let polls = 0;
	const auctionFetch = vi.fn<AuctionSource["fetch"]>(async () => {
		const snapshot = snapshots[Math.min(polls, snapshots.length - 1)] ?? CONCLUDED;
		polls++;
		return snapshot;
	});

	const pipeline = new ActionPipeline({
		config,
		signer: new ActionSigner({ capability, nonces: new NonceSource(clock) }),
		exchange: new ExchangeClient({ apiUrl: "http://exchange.test", timeoutMs: 30_000, fetchFn }),
		auction: new AuctionPoller({ source: { fetch: auctionFetch }, config, clock, sleeper }),
		sleeper,
		logger: options.logger,
	});
	return { pipeline, fetchFn, auctionFetch, capability, sleeper };
}

describe("ActionPipeline", () => {
	describe("finalize: token 5, custom slot, testnet, dry run", () => {
		it("returns dryRun with the printed action and makes no network call", async () => {
			const { pipeline, fetchFn, auctionFetch } = harness({
				config: { network: "testnet", dryRun: true },
			});

			const outcome = await pipeline.finalizeEvmContract({ token: 5, useCustomStorageSlot: true });

			expect(outcome.kind).toBe("dryRun");
			if (outcome.kind === "dryRun") {
				expect(JSON.parse(outcome.actionJson)).toEqual({
					type: "finalizeEvmContract",
					token: 5,
					input: "customStorageSlot",
				});
				expect(outcome.payload.nonce).toBe(NOW);
				expect(outcome.payload.vaultAddress).toBeNull();
			}
			expect(exitCodeFor(outcome)).toBe(0);
			expect(fetchFn).not.toHaveBeenCalled();
			expect(auctionFetch).not.toHaveBeenCalled();
		});
	});

	describe("register: currentGas 12000.0 against maxGas 14500000000000000", () => {
		it("opens the gate on the first poll, then signs and submits once", async () => {
			const { pipeline, fetchFn, auctionFetch, capability, sleeper } = harness({
				config: { dryRun: false },
				snapshots: [live("12000.0")],
				exchangeBody: '{"status":"ok","response":{"type":"default","data":1234}}',
			});

			const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

			expect(auctionFetch).toHaveBeenCalledTimes(1);
			expect(auctionFetch).toHaveBeenCalledWith(ACCOUNT);
			expect(sleeper.calls).toEqual([]);
			expect(capability.sign).toHaveBeenCalledTimes(1);
			expect(fetchFn).toHaveBeenCalledTimes(1);
			expect(outcome.kind === "submitted" && outcome.result).toEqual({
				kind: "accepted",
				responseData: { type: "default", data: 1234 },
			});
			expect(exitCodeFor(outcome)).toBe(0);
		});
	});

	describe("register: remote rejects the ticker", () => {
		it("returns rejected with the remote detail and a non-zero exit code", async () => {
			const { pipeline } = harness({
				config: { dryRun: false },
				exchangeBody: '{"status":"err","response":"token name already registered"}',
			});

			const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

			expect(outcome.kind === "submitted" && outcome.result).toEqual({
				kind: "rejected",
				errorDetail: "token name already registered",
			});
			expect(exitCodeFor(outcome)).toBe(1);
		});
	});

	it("polls until the price drops, then signs exactly once", async () => {
		const { pipeline, auctionFetch, capability, fetchFn } = harness({
			config: { dryRun: false },
			snapshots: [live("30000"), live("20000"), live("14000")],
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(outcome.kind).toBe("submitted");
		expect(auctionFetch).toHaveBeenCalledTimes(3);
		expect(capability.sign).toHaveBeenCalledTimes(1);
		expect(fetchFn).toHaveBeenCalledTimes(1);
	});

	it("signs with the nonce of the moment the gate opened", async () => {
		const { pipeline } = harness({ snapshots: [live("30000"), live("1")] });

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(outcome.kind === "dryRun" && outcome.payload.nonce).toBe(NOW + 5_000);
	});

	it("expires without signing or submitting", async () => {
		const { pipeline, capability, fetchFn } = harness({
			config: { dryRun: false },
			snapshots: [CONCLUDED],
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(outcome.kind).toBe("expired");
		expect(capability.sign).not.toHaveBeenCalled();
		expect(fetchFn).not.toHaveBeenCalled();
		expect(exitCodeFor(outcome)).toBe(1);
	});

	it("fails at build with a ConfigurationError and signs nothing", async () => {
		const { pipeline, capability } = harness({});

		const outcome = await pipeline.finalizeEvmContract({
			token: 5,
			useFirstStorageSlot: true,
			useCustomStorageSlot: true,
		});

		expect(outcome.kind).toBe("failed");
		if (outcome.kind === "failed") {
			expect(outcome.stage).toBe(PipelineStage.Build);
			expect(outcome.error.code).toBe("CONFIGURATION_ERROR");
		}
		expect(capability.sign).not.toHaveBeenCalled();
	});

	it("fails at the gate when polling keeps failing", async () => {
		const { pipeline, capability } = harness({
			config: { maxPollFailures: 0 },
			snapshots: [err(new NetworkError("reset"))],
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(outcome.kind === "failed" && outcome.stage).toBe(PipelineStage.Gate);
		expect(capability.sign).not.toHaveBeenCalled();
	});

	it("refuses a gate without a maxGas", async () => {
		const { pipeline } = harness({});

		const outcome = await pipeline.run({
			action: { kind: "finalizeEvmContract", fields: { token: 1, useFirstStorageSlot: true } },
			gate: {},
		});

		expect(outcome.kind === "failed" && outcome.error.message).toBe("Auction gate needs a maxGas");
	});

	it("gates a finalize action on an explicit maxGas", async () => {
		const { pipeline, auctionFetch } = harness({ snapshots: [live("1")] });

		const outcome = await pipeline.run({
			action: { kind: "finalizeEvmContract", fields: { token: 1, useFirstStorageSlot: true } },
			gate: { maxGas: 2_000_000_000_000n },
		});

		expect(outcome.kind).toBe("dryRun");
		expect(auctionFetch).toHaveBeenCalledTimes(1);
	});

	it("polls the vault's auction state when acting for a vault", async () => {
		const vault = ethAddress("0x6666666666666666666666666666666666666666");
		const { pipeline, auctionFetch } = harness({ config: { vaultAddress: vault } });

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(auctionFetch).toHaveBeenCalledWith(vault);
		expect(outcome.kind === "dryRun" && outcome.payload.vaultAddress).toBe(vault);
	});

	it("pauses for the confirm delay after the gate opens", async () => {
		const { pipeline, sleeper } = harness({ config: { confirmDelayMs: 3_000 } });

		await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(sleeper.calls).toEqual([3_000]);
	});

	it("can be cancelled during the confirm delay, before signing", async () => {
		const controller = new AbortController();
		const { pipeline, capability } = harness({
			config: { confirmDelayMs: 3_000 },
			onSleep: () => controller.abort(),
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS, controller.signal);

		expect(outcome).toEqual({ kind: "cancelled", stage: PipelineStage.Confirm });
		expect(capability.sign).not.toHaveBeenCalled();
		expect(exitCodeFor(outcome)).toBe(1);
	});

	it("can be cancelled between polls", async () => {
		const controller = new AbortController();
		const { pipeline, auctionFetch, capability } = harness({
			snapshots: [live("30000")],
			onSleep: () => controller.abort(),
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS, controller.signal);

		expect(outcome).toEqual({ kind: "cancelled", stage: PipelineStage.Gate });
		expect(auctionFetch).toHaveBeenCalledTimes(1);
		expect(capability.sign).not.toHaveBeenCalled();
	});

	it("does nothing when cancelled before it starts", async () => {
		const controller = new AbortController();
		controller.abort();
		const { pipeline, capability } = harness({});

		const outcome = await pipeline.finalizeEvmContract(
			{ token: 5, useCustomStorageSlot: true },
			controller.signal,
		);

		expect(outcome).toEqual({ kind: "cancelled", stage: PipelineStage.Build });
		expect(capability.sign).not.toHaveBeenCalled();
	});

	it("validates a prebuilt action and rejects it before polling or signing", async () => {
		const { pipeline, auctionFetch, capability, fetchFn } = harness({
			config: { dryRun: false },
		});

		const outcome = await pipeline.run({
			action: {
				type: ActionType.RegisterSpotToken,
				tokenName: "",
				szDecimals: 99,
				weiDecimals: -1,
				maxGas: 0n,
				fullName: "",
			},
			gate: {},
		});

		expect(outcome.kind).toBe("failed");
		if (outcome.kind === "failed") {
			expect(outcome.stage).toBe(PipelineStage.Build);
			expect(outcome.error.code).toBe("CONFIGURATION_ERROR");
			expect(outcome.error.message).toContain("maxGas: must be positive");
		}
		expect(auctionFetch).not.toHaveBeenCalled();
		expect(capability.sign).not.toHaveBeenCalled();
		expect(fetchFn).not.toHaveBeenCalled();
	});

	it("signs and submits a valid prebuilt action", async () => {
		const { pipeline, capability, fetchFn } = harness({ config: { dryRun: false } });

		const outcome = await pipeline.run({
			action: {
				type: ActionType.FinalizeEvmContract,
				token: tokenIndex(5),
				input: { kind: StorageSlotKind.CustomStorageSlot },
			},
		});

		expect(outcome.kind).toBe("submitted");
		expect(capability.sign).toHaveBeenCalledTimes(1);
		expect(fetchFn).toHaveBeenCalledTimes(1);
	});

	it("logs the built action with its storage slot", async () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "info", destination: { write: (m) => lines.push(m) } });
		const { pipeline } = harness({ config: { network: "testnet", dryRun: true }, logger });

		await pipeline.finalizeEvmContract({ token: 5, useCustomStorageSlot: true });

		const records: Record<string, unknown>[] = lines.map((line) => JSON.parse(line));
		const built = records.find((record) => record.msg === "Action built");
		expect(built).toMatchObject({
			component: "pipeline",
			actionType: "finalizeEvmContract",
			network: "testnet",
			token: 5,
			storageSlot: 'custom storage slot (keccak256("HyperCore deployer"))',
		});
	});

	it("reports a missing auction poller for gated runs", async () => {
		const config = unwrap(resolveConfig({}));
		const pipeline = new ActionPipeline({
			config,
			signer: new ActionSigner({
				capability: signCapabilityFromKey(TEST_PRIVATE_KEY),
				nonces: new NonceSource(),
			}),
			exchange: new ExchangeClient({ apiUrl: "http://exchange.test", timeoutMs: 1_000 }),
		});

		const outcome = await pipeline.registerSpotToken(REGISTER_FIELDS);

		expect(outcome.kind === "failed" && outcome.error.hint).toBe(
			"Pass an AuctionPoller to the pipeline",
		);
	});
});
