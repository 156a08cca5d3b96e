/**
 * Simplified Result Pattern
 * Basic discriminated union for step outcomes that should be aggregated
 * instead of thrown (per-architecture build, tag and push steps).
 */

/**
 * Result type - simple discriminated union
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string; exitCode?: number };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result, optionally carrying the exit status of the failed command
 */
export const Failure = <T>(error: string, exitCode?: number): Result<T> =>
  exitCode === undefined ? { ok: false, error } : { ok: false, error, exitCode };

export const isOk = <T>(result: Result<T>): result is { ok: true; value: T } => result.ok;

export const isFail = <T>(
  result: Result<T>,
): result is { ok: false; error: string; exitCode?: number } => !result.ok;
