import type { SubmissionPayload } from "./types.js";

const SHOWN_CHARS = 20;

function truncate(value: string): string {
	return value.length > SHOWN_CHARS ? `${value.slice(0, SHOWN_CHARS)}...` : value;
}

/** Copy of the payload with `r` and `s` cut to 20 characters, for printing. */
export function redactPayload(payload: SubmissionPayload): SubmissionPayload {
	return {
		...payload,
		signature: {
			r: `0x${truncate(payload.signature.r).slice(2)}`,
			s: `0x${truncate(payload.signature.s).slice(2)}`,
			v: payload.signature.v,
		},
	};
}
