import { Status, type SubscriptionStatus } from '@newsletter/types';
import type { InsertOutcome, SendOutcome } from './subscription-types.js';

export function statusForInsertOutcome(outcome: InsertOutcome): SubscriptionStatus {
  switch (outcome.type) {
    case 'added':
      return Status.EmailAdded;
    case 'conflict':
      return Status.EmailAlreadyExists;
    case 'failure':
      return Status.EmailNotAdded;
  }
}

/**
 * Only a delivery acknowledgement counts as sent; a failed send means the
 * subscription cannot go ahead.
 */
export function statusForSendOutcome(outcome: SendOutcome): SubscriptionStatus {
  return outcome.type === 'sent' ? Status.EmailVerificationSent : Status.EmailNotAdded;
}
