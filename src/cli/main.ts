#!/usr/bin/env node
/**
 * hl-pipeline — finalize an EVM contract link or bid for a spot token ticker.
 *
 * Reads `.env`, builds the pipeline from PRIVATE_KEY and HL_* settings, runs
 * one command and sets the exit code from its outcome. Ctrl-C cancels the
 * run at the next step boundary.
 */

import dotenv from "dotenv";
import { AuctionPoller } from "../auction/auction-poller.js";
import { AuctionStatusClient } from "../auction/auction-client.js";
import { type LogLevel, type Logger, createLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { ActionPipeline } from "../pipeline/action-pipeline.js";
import { describeOutcome, exitCodeFor } from "../pipeline/outcome.js";
import type { PipelineOutcome } from "../pipeline/types.js";
import { apiUrlFor, configFromEnv, resolveConfig } from "../shared/config.js";
import { ConfigurationError, type PipelineError } from "../shared/errors.js";
import { tryCatch } from "../shared/result.js";
import { ActionSigner } from "../signing/action-signer.js";
import { signCapabilityFromKey } from "../signing/l1-sign-capability.js";
import { NonceSource } from "../signing/nonce-source.js";
import { redactPayload } from "../signing/payload-display.js";
import { ExchangeClient } from "../submission/exchange-client.js";
import { USAGE, parseCliArgs } from "./args.js";

const logLevelSchema = z
	.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
	.catch("info");

function reportFailure(logger: Logger, error: PipelineError): 1 {
	logger.error({ err: error.toJSON() }, error.message);
	if (error.hint !== undefined) process.stderr.write(`${error.hint}\n`);
	return 1;
}

function printOutcome(logger: Logger, outcome: PipelineOutcome): void {
	if (outcome.kind === "dryRun") {
		process.stdout.write(`${outcome.actionJson}\n`);
		const { nonce, signature, vaultAddress } = redactPayload(outcome.payload);
		logger.info({ nonce, signature, vaultAddress }, describeOutcome(outcome));
		return;
	}
	if (exitCodeFor(outcome) === 0) {
		logger.info({ outcome: outcome.kind }, describeOutcome(outcome));
	} else {
		logger.error({ outcome: outcome.kind }, describeOutcome(outcome));
	}
}

async function main(argv: readonly string[]): Promise<0 | 1> {
	dotenv.config();
	const level: LogLevel = logLevelSchema.parse(process.env.LOG_LEVEL);
	const logger = createLogger({ level });

	const args = parseCliArgs(argv, process.env);
	if (!args.ok) return reportFailure(logger, args.error);
	if (args.value.command === "help") {
		process.stdout.write(`${USAGE}\n`);
		return 0;
	}
	const command = args.value;

	const fromEnv = configFromEnv(process.env);
	if (!fromEnv.ok) return reportFailure(logger, fromEnv.error);
	const config = resolveConfig({ ...fromEnv.value, ...command.overrides });
	if (!config.ok) return reportFailure(logger, config.error);

	const privateKey = process.env.PRIVATE_KEY;
	if (privateKey === undefined || privateKey.trim() === "") {
		return reportFailure(
			logger,
			new ConfigurationError("PRIVATE_KEY is not set", {}, "Add PRIVATE_KEY to .env"),
		);
	}
	const capability = tryCatch(() => signCapabilityFromKey(privateKey.trim()));
	if (!capability.ok) {
		return reportFailure(logger, new ConfigurationError(capability.error.message));
	}

	const apiUrl = apiUrlFor(config.value);
	const timeoutMs = config.value.requestTimeoutMs;
	const pipeline = new ActionPipeline({
		config: config.value,
		signer: new ActionSigner({ capability: capability.value, nonces: new NonceSource(), logger }),
		exchange: new ExchangeClient({ apiUrl, timeoutMs, logger }),
		auction: new AuctionPoller({
			source: new AuctionStatusClient({ apiUrl, timeoutMs }),
			config: config.value,
			logger,
		}),
		logger,
	});

	logger.info(
		{
			command: command.command,
			network: config.value.network,
			apiUrl,
			dryRun: config.value.dryRun,
			account: capability.value.address,
		},
		"Starting",
	);

	const controller = new AbortController();
	const onSigint = (): void => {
		logger.warn("Interrupted, stopping at the next step");
		controller.abort();
	};
	process.once("SIGINT", onSigint);

	try {
		const outcome =
			command.command === "finalize"
				? await pipeline.finalizeEvmContract(command.fields, controller.signal)
				: await pipeline.registerSpotToken(command.fields, controller.signal);
		printOutcome(logger, outcome);
		return exitCodeFor(outcome);
	} finally {
		process.off("SIGINT", onSigint);
	}
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(e: unknown) => {
		process.stderr.write(`Fatal: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
		process.exitCode = 1;
	},
);
