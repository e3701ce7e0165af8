import { status } from '@grpc/grpc-js';
import { RemoteApiError, type RemoteErrorCode } from '@newsletter/core';

const STATUS_CODES = new Map<number, RemoteErrorCode>([
  [status.ALREADY_EXISTS, 'already_exists'],
  [status.UNAUTHENTICATED, 'unauthenticated'],
  [status.PERMISSION_DENIED, 'permission_denied'],
  [status.UNAVAILABLE, 'unavailable'],
  [status.DEADLINE_EXCEEDED, 'deadline_exceeded'],
  [status.INVALID_ARGUMENT, 'invalid_argument'],
  [status.INTERNAL, 'internal'],
]);

export class ApiKeyFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingScopeError extends Error {
  constructor(readonly scope: string) {
    super(`API key does not have the required scope '${scope}'`);
    this.name = new.target.name;
  }
}

export class InvalidResponseError extends Error {
  constructor(method: string, options?: ErrorOptions) {
    super(`Unexpected response from ${method}`, options);
    this.name = new.target.name;
  }
}

/**
 * Normalize anything a remote call rejects with into a RemoteApiError
 */
export function toRemoteApiError(error: unknown): RemoteApiError {
  if (error instanceof RemoteApiError) {
    return error;
  }

  if (error instanceof MissingScopeError) {
    return new RemoteApiError('permission_denied', error.message, { cause: error });
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    const code = STATUS_CODES.get(error.code) ?? 'unknown';
    const details =
      'details' in error && typeof error.details === 'string' && error.details
        ? error.details
        : error.message;
    return new RemoteApiError(code, details, { cause: error });
  }

  if (error instanceof InvalidResponseError) {
    return new RemoteApiError('internal', error.message, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RemoteApiError('unknown', message, { cause: error });
}
