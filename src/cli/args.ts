/**
 * Command-line parsing for `hl-pipeline`. Pure: argv and env in, Result out.
 *
 * Numeric flags are converted only when they look like integers; anything
 * else is passed through untouched so the action builder reports it.
 */

import { parseArgs } from "node:util";
import type { FinalizeEvmContractFields, RegisterSpotTokenFields } from "../action/types.js";
import type { PipelineConfig } from "../shared/config.js";
import { ConfigurationError } from "../shared/errors.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";

export const USAGE = `Usage:
  hl-pipeline finalize --token <index> (--first-slot | --custom-slot | --deploy-nonce <n>) [--live] [--mainnet]
  hl-pipeline register --name <ticker> --full-name <name> --sz-decimals <n> --wei-decimals <n> --max-gas <wei> [--live] [--mainnet]

Without --live the action is built and signed but never submitted.
Env fallbacks: TOKEN_INDEX, TOKEN_SYMBOL, TOKEN_FULL_NAME, PRIVATE_KEY, HL_* settings.`;

export type CliCommand =
	| {
			readonly command: "finalize";
			readonly fields: FinalizeEvmContractFields;
			readonly overrides: Partial<PipelineConfig>;
	  }
	| {
			readonly command: "register";
			readonly fields: RegisterSpotTokenFields;
			readonly overrides: Partial<PipelineConfig>;
	  }
	| { readonly command: "help" };

const OPTIONS = {
	token: { type: "string" },
	"first-slot": { type: "boolean" },
	"custom-slot": { type: "boolean" },
	"deploy-nonce": { type: "string" },
	name: { type: "string" },
	"full-name": { type: "string" },
	"sz-decimals": { type: "string" },
	"wei-decimals": { type: "string" },
	"max-gas": { type: "string" },
	live: { type: "boolean" },
	mainnet: { type: "boolean" },
	help: { type: "boolean", short: "h" },
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function integerOrRaw(value: string | undefined): unknown {
	if (value === undefined) return undefined;
	const trimmed = value.trim();
	return /^-?\d+$/.test(trimmed) ? Number(trimmed) : value;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === "" ? undefined : value;
}

export function parseCliArgs(
	argv: readonly string[],
	env: Env = {},
): Result<CliCommand, ConfigurationError> {
	const parsed = tryCatch(() =>
		parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true }),
	);
	if (!parsed.ok) {
		return err(new ConfigurationError(parsed.error.message, { cause: parsed.error }, USAGE));
	}

	const { values, positionals } = parsed.value;
	if (values.help === true) return ok({ command: "help" });

	const overrides: Partial<PipelineConfig> = {
		...(values.live === true && { dryRun: false }),
		...(values.mainnet === true && { network: "mainnet" }),
	};

	const [command, ...extra] = positionals;
	if (extra.length > 0) {
		return err(
			new ConfigurationError(`Unexpected arguments: ${extra.join(" ")}`, { extra }, USAGE),
		);
	}

	switch (command) {
		case "finalize":
			return ok({
				command: "finalize",
				overrides,
				fields: {
					token: integerOrRaw(values.token ?? nonEmpty(env.TOKEN_INDEX)),
					useFirstStorageSlot: values["first-slot"],
					useCustomStorageSlot: values["custom-slot"],
					deployNonce: integerOrRaw(values["deploy-nonce"]),
				},
			});
		case "register":
			return ok({
				command: "register",
				overrides,
				fields: {
					tokenName: values.name ?? nonEmpty(env.TOKEN_SYMBOL),
					fullName: values["full-name"] ?? nonEmpty(env.TOKEN_FULL_NAME),
					szDecimals: integerOrRaw(values["sz-decimals"]),
					weiDecimals: integerOrRaw(values["wei-decimals"]),
					maxGas: values["max-gas"],
				},
			});
		case undefined:
			return err(new ConfigurationError("Missing command", {}, USAGE));
		default:
			return err(new ConfigurationError(`Unknown command: ${command}`, { command }, USAGE));
	}
}
