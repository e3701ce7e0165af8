/**
 * Subscription Domain Errors
 *
 * `RemoteApiError` is how a `SubscriptionApi` implementation reports a failed
 * remote call. Its code is transport-neutral; `already_exists` is the
 * application-level conflict signal.
 */

export type RemoteErrorCode =
  | 'already_exists'
  | 'unauthenticated'
  | 'permission_denied'
  | 'unavailable'
  | 'deadline_exceeded'
  | 'invalid_argument'
  | 'internal'
  | 'unknown';

export class RemoteApiError extends Error {
  readonly code: RemoteErrorCode;

  constructor(code: RemoteErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  get isConflict(): boolean {
    return this.code === 'already_exists';
  }
}

export function describeFailure(error: unknown): string {
  if (error instanceof RemoteApiError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
