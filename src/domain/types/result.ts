/**
 * Result pattern for operations that report failure without throwing
 */

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

export const Success = <T, E = string>(value: T): Result<T, E> => ({ ok: true, value });

export const Failure = <T, E = string>(error: E): Result<T, E> => ({ ok: false, error });
