/**
 * Explicit success/failure values for oracle attempts and parse steps.
 *
 * Retry loops branch on `result.ok` instead of catching exceptions, which keeps
 * the attempt counter and the failure kinds visible at the call site.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Retry settings shared by every oracle-backed stage. */
export interface RetryPolicy {
    /** Maximum number of attempts (values below 1 still make one attempt) */
    retries: number;
    /** Pause between two attempts, in milliseconds */
    retrySleep: number;
}
