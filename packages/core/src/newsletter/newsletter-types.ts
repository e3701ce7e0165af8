/**
 * Newsletter Domain Types
 *
 * Types at the seam between the orchestrator and its host: who issued a
 * command, what they are told, and how the attempt ended.
 */

import type { SubscriptionStatus } from '@newsletter/types';
import type { ParseErrorReason } from '../requests/index.js';

export const NEWSLETTER_PERMISSION = 'newsletter.add';
export const USERNAME_SUBSTITUTION = '{{mc_username}}';
export const VERIFICATION_SUBJECT = 'Newsletter Verification';

export type MessageTone = 'success' | 'info' | 'warning' | 'error';

export interface PlayerMessage {
  tone: MessageTone;
  title: string;
  text: string;
  /** Clickable link, e.g. the privacy policy */
  link?: { label: string; url: string };
  /** Command the player can run with one click */
  action?: { label: string; command: string };
}

/**
 * The player a command runs for. `id` keys cooldowns, verification codes and
 * destinations; `name` is the display name sent to the remote service.
 */
export interface CommandSender {
  readonly id: string;
  readonly name: string;
  hasPermission(permission: string): boolean;
  sendMessage(message: PlayerMessage): void;
}

export interface NewsletterSettings {
  groupId: string;
  privacyPolicyUrl?: string;
  emailValidationEnabled: boolean;
  emailFrom?: string;
}

export interface VerificationTemplate {
  html: string;
  text: string;
}

export type NewsletterOutcome =
  | { state: 'denied' }
  | { state: 'invalid_usage'; reason: ParseErrorReason }
  | { state: 'consent_required' }
  | { state: 'rate_limited'; remainingSeconds: number }
  | { state: 'invalid_email'; status: SubscriptionStatus }
  | { state: 'verification_sent'; status: SubscriptionStatus }
  | { state: 'verification_failed'; status: SubscriptionStatus }
  | { state: 'added'; status: SubscriptionStatus }
  | { state: 'already_exists'; status: SubscriptionStatus }
  | { state: 'failed'; status: SubscriptionStatus; reason: string };
