export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure<E> {
  ok: false;
  error: E;
}

/**
 * Outcome of a best-effort fetch. A degraded outcome still carries a usable
 * (empty) value so callers can ignore the distinction when they want to.
 */
export type FetchOutcome<T> = Success<T> | Degraded<T>;

export interface Degraded<T> {
  ok: false;
  value: T;
  reason: string;
}

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });
export const err = <E>(error: E): Failure<E> => ({ ok: false, error });
export const degraded = <T>(value: T, reason: string): Degraded<T> => ({ ok: false, value, reason });
