/**
 * Result type for expected failures.
 *
 * Operations that can be refused for domain reasons (bad input, wrong state, missing record)
 * return a `Result` instead of throwing, so the failure codes show up in the signature.
 *
 * @example
 * ```ts
 * type LoadError = 'SESSION_NOT_FOUND';
 *
 * async function loadSession(id: string): Promise<Result<Session, LoadError>> {
 *   const session = await repository.getSession(id);
 *   return session ? ok(session) : err('SESSION_NOT_FOUND');
 * }
 * ```
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
