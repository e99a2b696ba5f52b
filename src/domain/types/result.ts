/**
 * Result Pattern
 * Discriminated union returned by tool handlers instead of throwing
 */

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

export const isOk = <T>(result: Result<T>): result is { ok: true; value: T } => result.ok;

export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

/**
 * Convert an unknown thrown value into a Failure carrying its message
 */
export const failureFrom = <T>(error: unknown): Result<T> =>
  Failure(error instanceof Error ? error.message : String(error));
