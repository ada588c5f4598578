/**
 * Time utilities — injectable clock and sleeper for deterministic testing.
 *
 * Nonce generation and auction polling read time through Clock.now() and
 * suspend through Sleeper.sleep(), so tests drive both without real delays
 * or monkey-patched timers.
 */

/** Injectable time source -- pipeline code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Sleeping ─────────────────────────────────────────────────────────

/**
 * Suspends the caller. Implementations resolve early (never reject) when
 * `signal` aborts; the caller checks the signal afterwards.
 */
export interface Sleeper {
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Timer-backed sleeper. */
export const SystemSleeper: Sleeper = {
	sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (ms <= 0 || signal?.aborted) return Promise.resolve();
		return new Promise((resolve) => {
			const onAbort = (): void => {
				clearTimeout(timer);
				resolve();
			};
			const timer = setTimeout(() => {
				signal?.removeEventListener("abort", onAbort);
				resolve();
			}, ms);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	},
};

/**
 * Test sleeper: advances a FakeClock by the requested duration and records
 * every call. `onSleep` runs after the clock moves, e.g. to abort a run.
 */
export class FakeSleeper implements Sleeper {
	readonly calls: number[] = [];
	private readonly clock: FakeClock;
	private readonly onSleep: ((ms: number) => void) | undefined;

	constructor(clock: FakeClock, onSleep?: (ms: number) => void) {
		this.clock = clock;
		this.onSleep = onSleep;
	}

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		this.calls.push(ms);
		if (signal?.aborted) return;
		this.clock.advance(Math.max(0, ms));
		this.onSleep?.(ms);
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	seconds: (n: number) => n * 1_000,
} as const;
