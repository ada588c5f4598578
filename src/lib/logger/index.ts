/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Always censors `privateKey` fields, supports extra path-based redaction
 * and writes bigint fields as decimal strings.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

const ALWAYS_REDACTED = ["privateKey", "*.privateKey"];

/** pino serialises bigint as a number it cannot represent; log them as strings. */
function stringifyBigInts(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const emit =
		(level: LogMethod) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[level](msgOrObj);
			} else {
				pinoLogger[level](stringifyBigInts(msgOrObj), msg ?? "");
			}
		};

	return {
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
		debug: emit("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with redaction and an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ nonce: 1700000000000 }, "Action signed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...ALWAYS_REDACTED, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}

/** Discards everything. Default for library classes constructed without a logger. */
export const silentLogger: Logger = createLogger({ level: "silent" });
