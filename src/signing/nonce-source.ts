/**
 * NonceSource — strictly increasing epoch-millisecond nonces for one key.
 *
 * Two signatures drawn in the same millisecond (or after the wall clock
 * stepped back) still get distinct, increasing nonces. Pipelines that sign
 * with the same key must share one instance.
 */

import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export class NonceSource {
	private last = 0;
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
	}

	/** `max(now, previous + 1)`. */
	next(): number {
		const now = Math.floor(this.clock.now());
		this.last = Math.max(now, this.last + 1);
		return this.last;
	}
}
