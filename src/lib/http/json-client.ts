/**
 * JSON-over-HTTP POST with a hard timeout, returning Result instead of throwing.
 *
 * One call is one request: nothing here retries. Callers decide what a
 * non-2xx status means; only transport failures become errors.
 */

import { TimeoutError, classifyError } from "../../shared/errors.js";
import type { PipelineError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

/** Subset of the global `fetch` the clients need; injectable for tests. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface JsonResponse {
	readonly status: number;
	/** 2xx */
	readonly ok: boolean;
	/** Parsed body, or `undefined` when the body is not valid JSON */
	readonly body: unknown;
	readonly text: string;
}

export interface PostJsonOptions {
	readonly fetchFn: FetchFn;
	readonly timeoutMs: number;
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/**
 * POST `body` (already serialised JSON) to `url`.
 * The timeout covers connecting, the response head and reading the body.
 */
export async function postJson(
	url: string,
	body: string,
	options: PostJsonOptions,
): Promise<Result<JsonResponse, PipelineError>> {
	const controller = new AbortController();
	let timedOut = false;
	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort();
	}, options.timeoutMs);

	try {
		const response = await options.fetchFn(url, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body,
			signal: controller.signal,
		});
		const text = await response.text();
		return ok({ status: response.status, ok: response.ok, body: parseJson(text), text });
	} catch (e) {
		if (timedOut) {
			return err(
				new TimeoutError(`POST ${url} timed out after ${options.timeoutMs}ms`, {
					cause: e,
					timeoutMs: options.timeoutMs,
				}),
			);
		}
		return err(classifyError(e));
	} finally {
		clearTimeout(timer);
	}
}
