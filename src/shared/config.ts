/**
 * Pipeline configuration.
 *
 * One immutable PipelineConfig is handed to each pipeline at construction,
 * so independent pipelines (different networks, dry-run settings, vaults)
 * can run side by side in one process.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigurationError } from "./errors.js";
import { type EthAddress, ethAddress, isEthAddress } from "./identifiers.js";
import { type Result, err, ok } from "./result.js";
import { Duration } from "./time.js";

export type Network = "mainnet" | "testnet";

export const NETWORKS: Readonly<Record<Network, string>> = {
	mainnet: "https://api.hyperliquid.xyz",
	testnet: "https://api.hyperliquid-testnet.xyz",
};

export interface PipelineConfig {
	readonly network: Network;
	/** Overrides the base URL derived from `network` */
	readonly apiUrl?: string | undefined;
	/** Build, gate and sign, but never POST to the exchange */
	readonly dryRun: boolean;
	/** Delay between auction polls */
	readonly pollIntervalMs: number;
	/** Abort a single HTTP request after this long */
	readonly requestTimeoutMs: number;
	/** Consecutive retryable auction-poll failures tolerated before giving up */
	readonly maxPollFailures: number;
	/** How long after a known start time a missing gas price still counts as "not yet observable" */
	readonly startSettleMs: number;
	/** Interruptible pause between a Ready gate and signing */
	readonly confirmDelayMs: number;
	/** Act on behalf of this vault or sub-account */
	readonly vaultAddress?: EthAddress | undefined;
	/** Exchange rejects the action after this epoch-ms timestamp */
	readonly expiresAfter?: number | undefined;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	network: "testnet",
	dryRun: true,
	pollIntervalMs: Duration.seconds(5),
	requestTimeoutMs: Duration.seconds(30),
	maxPollFailures: 3,
	startSettleMs: Duration.seconds(30),
	confirmDelayMs: 0,
};

export function apiUrlFor(config: Pick<PipelineConfig, "network" | "apiUrl">): string {
	const base = config.apiUrl ?? NETWORKS[config.network];
	return base.replace(/\/+$/, "");
}

export function isMainnet(config: Pick<PipelineConfig, "network">): boolean {
	return config.network === "mainnet";
}

/**
 * Merge overrides onto the defaults and check the result.
 * Explicit `undefined` in `overrides` keeps the default.
 */
export function resolveConfig(
	overrides: Partial<PipelineConfig> = {},
): Result<PipelineConfig, ConfigurationError> {
	const config: PipelineConfig = {
		network: overrides.network ?? DEFAULT_PIPELINE_CONFIG.network,
		apiUrl: overrides.apiUrl,
		dryRun: overrides.dryRun ?? DEFAULT_PIPELINE_CONFIG.dryRun,
		pollIntervalMs: overrides.pollIntervalMs ?? DEFAULT_PIPELINE_CONFIG.pollIntervalMs,
		requestTimeoutMs: overrides.requestTimeoutMs ?? DEFAULT_PIPELINE_CONFIG.requestTimeoutMs,
		maxPollFailures: overrides.maxPollFailures ?? DEFAULT_PIPELINE_CONFIG.maxPollFailures,
		startSettleMs: overrides.startSettleMs ?? DEFAULT_PIPELINE_CONFIG.startSettleMs,
		confirmDelayMs: overrides.confirmDelayMs ?? DEFAULT_PIPELINE_CONFIG.confirmDelayMs,
		vaultAddress: overrides.vaultAddress,
		expiresAfter: overrides.expiresAfter,
	};

	if (!(config.pollIntervalMs > 0)) {
		return err(
			new ConfigurationError("pollIntervalMs must be positive", { value: config.pollIntervalMs }),
		);
	}
	if (!(config.requestTimeoutMs > 0)) {
		return err(
			new ConfigurationError("requestTimeoutMs must be positive", { value: config.requestTimeoutMs }),
		);
	}
	if (!Number.isInteger(config.maxPollFailures) || config.maxPollFailures < 0) {
		return err(
			new ConfigurationError("maxPollFailures must be a non-negative integer", {
				value: config.maxPollFailures,
			}),
		);
	}
	if (config.startSettleMs < 0 || config.confirmDelayMs < 0) {
		return err(new ConfigurationError("startSettleMs and confirmDelayMs must not be negative"));
	}
	if (config.expiresAfter !== undefined && !Number.isSafeInteger(config.expiresAfter)) {
		return err(
			new ConfigurationError("expiresAfter must be an integer timestamp in ms", {
				value: config.expiresAfter,
			}),
		);
	}
	return ok(config);
}

// ── Environment ──────────────────────────────────────────────────────

const seconds = z.coerce.number().positive().optional();

const envSchema = z.object({
	HL_NETWORK: z.enum(["mainnet", "testnet"]).optional(),
	HL_API_URL: z.string().url().optional(),
	HL_DRY_RUN: z.enum(["true", "false", "1", "0"]).optional(),
	HL_POLL_INTERVAL_SECONDS: seconds,
	HL_REQUEST_TIMEOUT_SECONDS: seconds,
	HL_MAX_POLL_FAILURES: z.coerce.number().int().nonnegative().optional(),
	HL_CONFIRM_DELAY_SECONDS: z.coerce.number().nonnegative().optional(),
	HL_VAULT_ADDRESS: z
		.string()
		.refine(isEthAddress, { message: "must be 0x followed by 40 hex characters" })
		.optional(),
});

/**
 * Reads pipeline settings from environment variables.
 * Supported: HL_NETWORK, HL_API_URL, HL_DRY_RUN, HL_POLL_INTERVAL_SECONDS,
 * HL_REQUEST_TIMEOUT_SECONDS, HL_MAX_POLL_FAILURES, HL_CONFIRM_DELAY_SECONDS,
 * HL_VAULT_ADDRESS. Empty values count as unset.
 */
export function configFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): Result<Partial<PipelineConfig>, ConfigurationError> {
	const present = Object.fromEntries(
		Object.entries(env).filter(
			([key, value]) => key.startsWith("HL_") && value !== undefined && value.trim() !== "",
		),
	);
	const parsed = validate(envSchema, present);
	if (!parsed.ok) {
		return err(
			new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error.issues)}`, {
				cause: parsed.error,
			}),
		);
	}

	const e = parsed.value;
	return ok({
		...(e.HL_NETWORK !== undefined && { network: e.HL_NETWORK }),
		...(e.HL_API_URL !== undefined && { apiUrl: e.HL_API_URL }),
		...(e.HL_DRY_RUN !== undefined && { dryRun: e.HL_DRY_RUN === "true" || e.HL_DRY_RUN === "1" }),
		...(e.HL_POLL_INTERVAL_SECONDS !== undefined && {
			pollIntervalMs: Duration.seconds(e.HL_POLL_INTERVAL_SECONDS),
		}),
		...(e.HL_REQUEST_TIMEOUT_SECONDS !== undefined && {
			requestTimeoutMs: Duration.seconds(e.HL_REQUEST_TIMEOUT_SECONDS),
		}),
		...(e.HL_MAX_POLL_FAILURES !== undefined && { maxPollFailures: e.HL_MAX_POLL_FAILURES }),
		...(e.HL_CONFIRM_DELAY_SECONDS !== undefined && {
			confirmDelayMs: Duration.seconds(e.HL_CONFIRM_DELAY_SECONDS),
		}),
		...(e.HL_VAULT_ADDRESS !== undefined && { vaultAddress: ethAddress(e.HL_VAULT_ADDRESS) }),
	});
}
