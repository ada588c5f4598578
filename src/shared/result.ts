/**
 * Result<T, E> — explicit success/failure values for every fallible step.
 *
 * Pipeline stages never throw across their boundary. Thrown values from
 * third-party code are caught at the wrapper that calls it and turned into
 * an `err(...)` here.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Unwrapping ───────────────────────────────────────────────────────

/** Extract the success value or throw the error. Test fixtures only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

// ── Boundary wrappers ────────────────────────────────────────────────

/** Run a throwing function and capture its outcome as a Result. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
	try {
		return ok(fn());
	} catch (e) {
		return err(e instanceof Error ? e : new Error(String(e)));
	}
}
