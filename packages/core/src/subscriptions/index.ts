/**
 * Subscription Domain
 *
 * Async access to the remote group-subscription service
 */

export { SubscriptionClient, DEFAULT_WORKER_CONCURRENCY } from './subscription-client.js';
export type { SubscriptionClientOptions } from './subscription-client.js';
export { statusForInsertOutcome, statusForSendOutcome } from './subscription-status.js';
export { RemoteApiError, describeFailure } from './subscription-errors.js';
export type { RemoteErrorCode } from './subscription-errors.js';
export type {
  SubscriptionApi,
  Substitutions,
  InsertEmailToGroupResult,
  SendEmailParams,
  SendEmailAck,
  InsertOutcome,
  SendOutcome,
  VerificationEmail,
} from './subscription-types.js';
