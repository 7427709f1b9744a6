/**
 * @stackwright/shared - Error field readers
 *
 * Errors raised by Node (fs, fetch, child_process) may come from another
 * realm, where `instanceof Error` is false. Read their fields structurally.
 */

import { types } from 'node:util';

/** A string-valued field of an error-like value, if present. */
export function errorField(error: unknown, field: 'code' | 'name' | 'message'): string | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/** The `code` of a system error, e.g. `ENOENT`. */
export function errorCode(error: unknown): string | undefined {
  return errorField(error, 'code');
}

/** The `cause` attached to an error, if any. */
export function errorCause(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return error.cause;
  }
  return undefined;
}

export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value);
}

/** Normalize a thrown value into an Error without losing a foreign one. */
export function toError(value: unknown): Error {
  return isError(value) ? value : new Error(String(value));
}
