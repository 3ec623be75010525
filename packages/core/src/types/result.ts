/**
 * Explicit success/failure return for operations whose failures are part of
 * their contract. Unexpected faults are still thrown.
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
