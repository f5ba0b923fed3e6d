/**
 * Value-or-error return type used by every fallible engine operation.
 * Same shape as the inline validation helpers: check `success`, then read `data` or `error`.
 */
export type Result<T, E> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
