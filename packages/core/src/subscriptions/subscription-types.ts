/**
 * Subscription Domain Types
 *
 * `SubscriptionApi` is the remote group-subscription service as the core sees
 * it. Implementations reject with `RemoteApiError` on failure.
 */

export type Substitutions = Record<string, string>;

export interface InsertEmailToGroupResult {
  success: boolean;
  message: string;
  affectedRows: number;
}

export interface SendEmailParams {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface SendEmailAck {
  messageIds: string[];
}

export interface SubscriptionApi {
  insertEmailToGroup(
    groupId: string,
    email: string,
    substitutions: Substitutions
  ): Promise<InsertEmailToGroupResult>;
  sendEmail(params: SendEmailParams): Promise<SendEmailAck>;
}

export type InsertOutcome =
  | { type: 'added'; affectedRows: number }
  | { type: 'conflict' }
  | { type: 'failure'; reason: string };

export type SendOutcome = { type: 'sent' } | { type: 'failure'; reason: string };

export interface VerificationEmail {
  from: string;
  to: string;
  subject: string;
  html: string;
  text: string;
}
