/**
 * Result<T, E>: failure carried as a value.
 *
 * The estimator and the data types throw typed errors. The dataset parser and
 * the driver catch at their boundary and return one of these instead.
 */

export interface Ok<T> {
	readonly ok: true;
	readonly value: T;
}

export interface Err<E> {
	readonly ok: false;
	readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
	return { ok: false, error };
}

/**
 * Returns the value or throws the error. Meant for tests, examples and
 * top-level scripts where a failure should end the program.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/**
 * Runs `fn` and captures its return value, or passes whatever it throws
 * through `classify` into the error variant.
 */
export function tryCatch<T, E>(fn: () => T, classify: (thrown: unknown) => E): Result<T, E> {
	try {
		return ok(fn());
	} catch (thrown) {
		return err(classify(thrown));
	}
}
