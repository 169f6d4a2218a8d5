/**
 * Tagged results
 *
 * Component boundaries (client, poller, orchestrator workers) return a
 * `Result` instead of throwing or returning null, so callers branch on
 * `ok` and then on `error.kind`.
 */

/**
 * Failure taxonomy shared by every package.
 *
 * - auth: credentials rejected or re-authentication exhausted
 * - transient: timeout / connection failure / unexpected server status
 * - rate_limited: server asked us to slow down (never terminal inside the client)
 * - job_failed: remote job reached FAILED or ERROR
 * - timeout: polling ran out of attempts
 * - validation: rejected locally before any network call
 */
export type FailureKind =
  | 'auth'
  | 'transient'
  | 'rate_limited'
  | 'job_failed'
  | 'timeout'
  | 'validation';

export interface Failure {
  kind: FailureKind;
  message: string;
  /** Last HTTP status observed, when there was one */
  status?: number;
  /** Last response body observed, when there was one */
  body?: unknown;
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = Failure> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function failure(
  kind: FailureKind,
  message: string,
  details: { status?: number; body?: unknown } = {}
): Failure {
  const result: Failure = { kind, message };
  if (details.status !== undefined) result.status = details.status;
  if (details.body !== undefined) result.body = details.body;
  return result;
}

/**
 * Unwrap a result or fall back to a default value
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
