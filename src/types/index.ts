/**
 * Shared types and type guards.
 *
 * Every core operation returns an {@link Outcome} instead of throwing, so
 * the tool layer can hand a structured `{ errorKind, message }` back to the
 * caller without an uncaught fault reaching the transport.
 */

export const ERROR_KINDS = [
  'InvalidPath',
  'NotFound',
  'NotAllowed',
  'FileTooLarge',
  'ExtensionNotAllowed',
  'IOError',
  'NotConfigured',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Read-policy rejections; listings report these instead of hiding the file. */
export type PolicyRestriction = Extract<ErrorKind, 'FileTooLarge' | 'ExtensionNotAllowed'>;

export interface AccessFailure {
  errorKind: ErrorKind;
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: AccessFailure };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(errorKind: ErrorKind, message: string): Outcome<T> {
  return { ok: false, failure: { errorKind, message } };
}

/** The one message every `NotAllowed` carries, whatever the path. */
export const ACCESS_DENIED_MESSAGE = 'Access denied: path is outside the allowed directories';

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Narrow to a Node.js system error, optionally with a specific `code`.
 */
export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!isError(error) || !('code' in error)) return false;
  return code === undefined || error.code === code;
}
