/**
 * Subscription status vocabulary
 *
 * The five outcome tokens reported to a player's backend server after a
 * subscription attempt. Tokens are the exact bytes written on the wire.
 */

import { z } from 'zod';

export const Status = {
  EmailAdded: 'email_added',
  EmailNotAdded: 'email_not_added',
  EmailAlreadyExists: 'email_already_exists',
  EmailVerificationSent: 'email_verification_sent',
  EmailVerificationFailed: 'email_verification_failed',
} as const;

export const STATUS_TOKENS = [
  Status.EmailAdded,
  Status.EmailNotAdded,
  Status.EmailAlreadyExists,
  Status.EmailVerificationSent,
  Status.EmailVerificationFailed,
] as const;

export const SubscriptionStatusSchema = z.enum(STATUS_TOKENS);

export type SubscriptionStatus = z.infer<typeof SubscriptionStatusSchema>;
