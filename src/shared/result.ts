import type { SetupError } from "./errors.js";

/**
 * Tagged outcome of a provisioning stage. Stages never throw for expected
 * failures; the pipeline inspects `ok` and stops at the first failure.
 */
export type Result<T, E = SetupError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = SetupError>(error: E): Result<never, E> {
  return { ok: false, error };
}
