import { afterEach, describe, expect, it, vi } from "vitest";
import { NetworkError, TimeoutError } from "../../shared/errors.js";
import { type FetchFn, postJson } from "./json-client.js";

const URL = "http://exchange.test/info";

function respondWith(status: number, body: string): FetchFn {
	return vi.fn<FetchFn>(async () => new Response(body, { status }));
}

/** Never settles until aborted, like a server that accepted the socket and went quiet. */
function hangingFetch(): FetchFn {
	return vi.fn<FetchFn>(
		(_url, init) =>
			new Promise<Response>((_resolve, reject) => {
				init.signal?.addEventListener("abort", () => {
					const abort = new Error("This operation was aborted");
					abort.name = "AbortError";
					reject(abort);
				});
			}),
	);
}

describe("postJson", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("POSTs the body as JSON", async () => {
		const fetchFn = respondWith(200, "{}");

		await postJson(URL, '{"type":"meta"}', { fetchFn, timeoutMs: 1_000 });

		expect(fetchFn).toHaveBeenCalledTimes(1);
		const [url, init] = vi.mocked(fetchFn).mock.calls[0] ?? [];
		expect(url).toBe(URL);
		expect(init?.method).toBe("POST");
		expect(init?.body).toBe('{"type":"meta"}');
		expect(init?.headers).toEqual({ "Content-Type": "application/json" });
	});

	it("returns status and parsed body", async () => {
		const result = await postJson(URL, "{}", {
			fetchFn: respondWith(200, '{"status":"ok"}'),
			timeoutMs: 1_000,
		});

		expect(result).toEqual({
			ok: true,
			value: { status: 200, ok: true, body: { status: "ok" }, text: '{"status":"ok"}' },
		});
	});

	it("returns non-2xx responses as values, with undefined body for non-JSON", async () => {
		const result = await postJson(URL, "{}", {
			fetchFn: respondWith(502, "Bad Gateway"),
			timeoutMs: 1_000,
		});

		expect(result).toEqual({
			ok: true,
			value: { status: 502, ok: false, body: undefined, text: "Bad Gateway" },
		});
	});

	it("turns its own timeout into TimeoutError", async () => {
		vi.useFakeTimers();
		const pending = postJson(URL, "{}", { fetchFn: hangingFetch(), timeoutMs: 30_000 });

		await vi.advanceTimersByTimeAsync(30_000);
		const result = await pending;

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(TimeoutError);
			expect(result.error.message).toBe(`POST ${URL} timed out after 30000ms`);
		}
	});

	it("classifies socket failures as NetworkError", async () => {
		const fetchFn = vi.fn<FetchFn>(async () => {
			throw new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } });
		});

		const result = await postJson(URL, "{}", { fetchFn, timeoutMs: 1_000 });

		expect(!result.ok && result.error).toBeInstanceOf(NetworkError);
	});

	it("clears its timer once the response arrives", async () => {
		vi.useFakeTimers();

		await postJson(URL, "{}", { fetchFn: respondWith(200, "{}"), timeoutMs: 1_000 });

		expect(vi.getTimerCount()).toBe(0);
	});
});
