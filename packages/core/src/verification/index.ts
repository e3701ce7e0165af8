/**
 * Verification Domain
 *
 * Per-user pending verification codes
 */

export {
  VerificationRegistry,
  generateVerificationCode,
  VERIFICATION_TTL_MS,
  DEFAULT_MAX_PENDING,
} from './verification-registry.js';

export type {
  PendingVerification,
  VerifiedSubscription,
  VerificationResult,
  VerificationRegistryOptions,
} from './verification-types.js';

export {
  VerificationError,
  NoPendingVerificationError,
  VerificationCodeMismatchError,
  VerificationCodeExpiredError,
} from './verification-errors.js';
