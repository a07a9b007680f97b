/**
 * Result<T, E> — explicit success/failure values for protocol operations.
 *
 * Domain code returns Result instead of throwing. A unit of work rolls back
 * every participant when the operation it wraps returns an error.
 */

/** `ok: true` carries a value, `ok: false` carries an error. */
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

/** Shorthand for operations that succeed without a value. */
export function done(): Result<void, never> {
	return { ok: true, value: undefined };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Chain a fallible operation on the success value; short-circuits on error. */
export function flatMap<T, U, E, F>(
	result: Result<T, E>,
	fn: (value: T) => Result<U, F>,
): Result<U, E | F> {
	return result.ok ? fn(result.value) : result;
}

/**
 * Collect a list of results into a result of a list.
 * Stops at the first error, so later items are never inspected.
 */
export function collect<T, E>(results: Iterable<Result<T, E>>): Result<T[], E> {
	const values: T[] = [];
	for (const r of results) {
		if (!r.ok) return r;
		values.push(r.value);
	}
	return ok(values);
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Extract the success value or return the provided fallback on error. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}
