/**
 * PipelineError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). Only the
 * read-only auction poll ever acts on `isRetryable`; exchange submissions
 * are attempted once whatever the category says.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface PipelineErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & PipelineErrorOptions;

/** Base error class for every pipeline stage, with category-based retry semantics. */
export class PipelineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "PipelineError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fatal error for bad, missing or ambiguous input. Never retried. */
export class ConfigurationError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}, hint?: string) {
		const { cause, ...rest } = context;
		super(message, "CONFIGURATION_ERROR", ErrorCategory.Fatal, rest, hint);
		this.name = "ConfigurationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error when the key is unavailable, encoding fails, or the signature is malformed. */
export class SigningError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SIGNING_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SigningError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal for the current run: the gas auction has concluded. A new run may target the next one. */
export class AuctionExpiredError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"AUCTION_EXPIRED",
			ErrorCategory.Fatal,
			rest,
			"Wait for the next auction and start a new run",
		);
		this.name = "AuctionExpiredError";
		if (cause !== undefined) this.cause = cause;
	}
}

export class TimeoutError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Connection refused, DNS failure, reset socket. */
export class NetworkError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-2xx response. 429 and 5xx are retryable, everything else is not. */
export class HttpStatusError extends PipelineError {
	readonly status: number;
	readonly body: unknown;

	constructor(status: number, body: unknown, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			`HTTP ${status}`,
			"HTTP_ERROR",
			status === 429 || status >= 500 ? ErrorCategory.Retryable : ErrorCategory.NonRetryable,
			{ ...rest, status },
		);
		this.name = "HttpStatusError";
		this.status = status;
		this.body = body;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), body: this.body };
	}
}

/** A 2xx body that does not match the expected envelope. */
export class UnexpectedResponseError extends PipelineError {
	readonly body: unknown;

	constructor(message: string, body: unknown, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNEXPECTED_RESPONSE", ErrorCategory.NonRetryable, rest);
		this.name = "UnexpectedResponseError";
		this.body = body;
		if (cause !== undefined) this.cause = cause;
	}
}

/** The caller aborted the run between two steps. */
export class CancelledError extends PipelineError {
	constructor(message = "Run cancelled", context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CANCELLED", ErrorCategory.NonRetryable, rest);
		this.name = "CancelledError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
class SystemError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

const NETWORK_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EHOSTUNREACH",
	"ENETUNREACH",
	"EPIPE",
	"UND_ERR_SOCKET",
]);

const TIMEOUT_CODES = new Set([
	"ETIMEDOUT",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

function readString(value: unknown, key: "code" | "name"): string | undefined {
	if (typeof value !== "object" || value === null || !(key in value)) return undefined;
	const field: unknown = Reflect.get(value, key);
	return typeof field === "string" ? field : undefined;
}

/** undici wraps socket failures as `TypeError("fetch failed")` with the errno on `cause`. */
function errorCode(error: Error): string | undefined {
	return readString(error, "code") ?? readString(error.cause, "code");
}

/** Map anything thrown by fetch, timers or Node into the PipelineError hierarchy. */
export function classifyError(error: unknown): PipelineError {
	if (error instanceof PipelineError) return error;
	if (error instanceof Error) {
		const name = error.name;
		const code = errorCode(error);
		const msg = error.message.toLowerCase();

		if (name === "TimeoutError" || (code !== undefined && TIMEOUT_CODES.has(code))) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (name === "AbortError") {
			return new CancelledError(error.message, { cause: error });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new NetworkError(error.message, { cause: error, errno: code });
		}
		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("fetch failed") || msg.includes("socket hang up")) {
			return new NetworkError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isAuctionExpired(e: unknown): e is AuctionExpiredError {
	return e instanceof AuctionExpiredError;
}

export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}

export function isCancelled(e: unknown): e is CancelledError {
	return e instanceof CancelledError;
}
