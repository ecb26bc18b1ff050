import type { PushError, PushErrorKind, PushResult } from './types';

export function ok<T>(value: T): PushResult<T> {
  return { success: true, value };
}

export function fail<T = never>(kind: PushErrorKind, message: string, cause?: unknown): PushResult<T> {
  const error: PushError = cause === undefined ? { kind, message } : { kind, message, cause };
  return { success: false, error };
}

/**
 * Convert a thrown value into a PushError, keeping the original as cause.
 */
export function toPushError(kind: PushErrorKind, error: unknown): PushError {
  const message = error instanceof Error ? error.message : String(error);
  return { kind, message, cause: error };
}
