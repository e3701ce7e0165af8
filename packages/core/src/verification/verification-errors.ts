/**
 * Verification Domain Errors
 *
 * Failure reasons returned by the verification registry. They are carried in
 * results rather than thrown; the orchestrator maps any of them to
 * `email_verification_failed`.
 */

export class VerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoPendingVerificationError extends VerificationError {
  constructor() {
    super('No pending verification found');
  }
}

export class VerificationCodeMismatchError extends VerificationError {
  constructor() {
    super('Verification code does not match');
  }
}

export class VerificationCodeExpiredError extends VerificationError {
  constructor() {
    super('Verification code has expired');
  }
}
