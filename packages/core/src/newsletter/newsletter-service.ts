/**
 * Newsletter Service
 *
 * Orchestrates a subscription attempt:
 *   parse → permission → privacy gate → email check → cooldown
 *     → insert (verification off)
 *     → issue code + send email (verification on) … verify → insert
 *
 * Everything before the remote call runs synchronously inside `dispatch`;
 * the returned promise settles once the remote call has completed and the
 * status has been emitted. It never rejects.
 */

import { Status } from '@newsletter/types';
import type { CooldownLimiter } from '@newsletter/rate-limit';
import { logger as defaultLogger, getRecipientLogId, type Logger } from '@newsletter/observability';
import {
  PRIVACY_FLAG,
  isValidEmail,
  parseNewsletterCommand,
  splitWireMessage,
} from '../requests/index.js';
import type { VerificationRegistry } from '../verification/index.js';
import {
  statusForInsertOutcome,
  statusForSendOutcome,
  type SubscriptionClient,
} from '../subscriptions/index.js';
import type { NotificationEmitter } from '../notifications/index.js';
import { SilentAwareMessenger, messages } from './newsletter-messages.js';
import {
  NEWSLETTER_PERMISSION,
  USERNAME_SUBSTITUTION,
  VERIFICATION_SUBJECT,
  type CommandSender,
  type NewsletterOutcome,
  type NewsletterSettings,
  type VerificationTemplate,
} from './newsletter-types.js';

export interface NewsletterServiceDeps {
  settings: NewsletterSettings;
  limiter: CooldownLimiter;
  verifications: VerificationRegistry;
  subscriptions: SubscriptionClient;
  notifications: NotificationEmitter;
  template: VerificationTemplate;
  logger?: Logger;
}

function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

/**
 * Substitute the code and player name into both template bodies. Values are
 * inserted literally; the name is HTML-escaped in the html body.
 */
export function fillVerificationTemplate(
  template: VerificationTemplate,
  values: { code: string; username: string }
): VerificationTemplate {
  const fill = (source: string, username: string) =>
    source
      .replaceAll('{{username}}', () => username)
      .replaceAll('{{code}}', () => values.code);
  return {
    html: fill(template.html, escapeHtml(values.username)),
    text: fill(template.text, values.username),
  };
}

export class NewsletterService {
  private readonly settings: NewsletterSettings;
  private readonly limiter: CooldownLimiter;
  private readonly verifications: VerificationRegistry;
  private readonly subscriptions: SubscriptionClient;
  private readonly notifications: NotificationEmitter;
  private readonly template: VerificationTemplate;
  private readonly logger: Logger;

  constructor(deps: NewsletterServiceDeps) {
    if (deps.settings.emailValidationEnabled && !deps.settings.emailFrom) {
      throw new Error('emailFrom is required when email validation is enabled');
    }
    this.settings = deps.settings;
    this.limiter = deps.limiter;
    this.verifications = deps.verifications;
    this.subscriptions = deps.subscriptions;
    this.notifications = deps.notifications;
    this.template = deps.template;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Run a newsletter command for the sender
   */
  dispatch(sender: CommandSender, tokens: readonly string[]): Promise<NewsletterOutcome> {
    if (!sender.hasPermission(NEWSLETTER_PERMISSION)) {
      sender.sendMessage(messages.accessDenied());
      return Promise.resolve({ state: 'denied' });
    }

    const request = parseNewsletterCommand(tokens);

    if (request.kind === 'invalid') {
      sender.sendMessage(messages.usage());
      return Promise.resolve({ state: 'invalid_usage', reason: request.reason });
    }

    if (request.kind === 'verify') {
      return this.verify(sender, request.code);
    }

    const policyUrl = this.settings.privacyPolicyUrl;
    if (policyUrl && !request.agreePrivacy) {
      const command = ['/newsletter', ...tokens, PRIVACY_FLAG].join(' ');
      sender.sendMessage(messages.privacyRequired(policyUrl, command));
      return Promise.resolve({ state: 'consent_required' });
    }

    const messenger = new SilentAwareMessenger(sender, request.silent);

    // Invalid input never consumes the cooldown
    if (!isValidEmail(request.email)) {
      messenger.send(messages.invalidEmail());
      this.notifications.emit(sender.id, Status.EmailNotAdded);
      return Promise.resolve({ state: 'invalid_email', status: Status.EmailNotAdded });
    }

    if (!this.limiter.canProceed(sender.id)) {
      const remainingSeconds = this.limiter.remainingSeconds(sender.id);
      messenger.send(messages.pleaseWait(remainingSeconds));
      return Promise.resolve({ state: 'rate_limited', remainingSeconds });
    }

    messenger.send(messages.processing());

    // Charge the cooldown before the call starts so a rapid duplicate is turned away
    this.limiter.record(sender.id);

    if (this.settings.emailValidationEnabled) {
      return this.requestVerification(sender, request.email, messenger);
    }
    return this.insert(sender, request.email, messenger);
  }

  /**
   * Run a command received as a raw wire message
   */
  dispatchWireMessage(sender: CommandSender, payload: Uint8Array): Promise<NewsletterOutcome> {
    return this.dispatch(sender, splitWireMessage(payload));
  }

  /**
   * Fire-and-forget entry point for hosts
   */
  submit(sender: CommandSender, tokens: readonly string[]): void {
    this.settle(sender, this.dispatch(sender, tokens));
  }

  submitWireMessage(sender: CommandSender, payload: Uint8Array): void {
    this.settle(sender, this.dispatchWireMessage(sender, payload));
  }

  private settle(sender: CommandSender, pending: Promise<NewsletterOutcome>): void {
    pending.catch((error: unknown) => {
      this.logger.error({ userId: sender.id, err: error }, 'Newsletter command failed');
    });
  }

  private verify(sender: CommandSender, code: string): Promise<NewsletterOutcome> {
    const result = this.verifications.validate(sender.id, code);

    if (!result.ok) {
      this.logger.info({ userId: sender.id, reason: result.error.name }, 'Verification rejected');
      sender.sendMessage(messages.verificationFailed());
      this.notifications.emit(sender.id, Status.EmailVerificationFailed);
      return Promise.resolve({
        state: 'verification_failed',
        status: Status.EmailVerificationFailed,
      });
    }

    const { email, silent } = result.subscription;
    const messenger = new SilentAwareMessenger(sender, silent);
    messenger.send(messages.processing());
    this.limiter.record(sender.id);

    return this.insert(sender, email, messenger);
  }

  private async insert(
    sender: CommandSender,
    email: string,
    messenger: SilentAwareMessenger
  ): Promise<NewsletterOutcome> {
    const outcome = await this.subscriptions.insertEmail(this.settings.groupId, email, {
      [USERNAME_SUBSTITUTION]: sender.name,
    });
    const status = statusForInsertOutcome(outcome);
    this.notifications.emit(sender.id, status);

    switch (outcome.type) {
      case 'added':
        messenger.send(messages.subscribed());
        return { state: 'added', status };
      case 'conflict':
        messenger.send(messages.alreadySubscribed());
        return { state: 'already_exists', status };
      case 'failure':
        messenger.send(messages.subscriptionFailed());
        return { state: 'failed', status, reason: outcome.reason };
    }
  }

  private async requestVerification(
    sender: CommandSender,
    email: string,
    messenger: SilentAwareMessenger
  ): Promise<NewsletterOutcome> {
    const code = this.verifications.issue(sender.id, email, messenger.silent);
    const content = fillVerificationTemplate(this.template, { code, username: sender.name });

    this.logger.info(
      { userId: sender.id, recipient: getRecipientLogId(email) },
      'Verification code issued'
    );

    const outcome = await this.subscriptions.sendVerificationEmail({
      from: this.settings.emailFrom ?? '',
      to: email,
      subject: VERIFICATION_SUBJECT,
      html: content.html,
      text: content.text,
    });
    const status = statusForSendOutcome(outcome);

    if (outcome.type === 'failure') {
      this.verifications.revoke(sender.id);
      this.notifications.emit(sender.id, status);
      messenger.send(messages.verificationSendFailed());
      return { state: 'failed', status, reason: outcome.reason };
    }

    this.notifications.emit(sender.id, status);
    messenger.send(messages.verificationSent());
    return { state: 'verification_sent', status };
  }
}
