/**
 * Fixed player-facing messages. Raw error text never reaches a player.
 */

import type { CommandSender, PlayerMessage } from './newsletter-types.js';

export const messages = {
  accessDenied: (): PlayerMessage => ({
    tone: 'error',
    title: 'Access Denied',
    text: "You don't have permission to use this command.",
  }),

  usage: (): PlayerMessage => ({
    tone: 'error',
    title: 'Invalid Usage',
    text: 'Please use: /newsletter <email> [--agree-privacy] [--silent] or /newsletter -c <code>',
  }),

  privacyRequired: (policyUrl: string, command: string): PlayerMessage => ({
    tone: 'warning',
    title: 'Privacy Agreement Required',
    text: 'To subscribe to our newsletter, you must agree to our Privacy Policy.',
    link: { label: 'Privacy Policy', url: policyUrl },
    action: { label: 'AGREE & SUBSCRIBE', command },
  }),

  invalidEmail: (): PlayerMessage => ({
    tone: 'error',
    title: 'Invalid Email',
    text: 'Please provide a valid email address (e.g., user@example.com).',
  }),

  pleaseWait: (seconds: number): PlayerMessage => ({
    tone: 'warning',
    title: 'Please Wait',
    text: `You're subscribing too quickly. Please wait ${seconds} seconds and try again.`,
  }),

  processing: (): PlayerMessage => ({
    tone: 'info',
    title: 'Newsletter Subscription',
    text: 'Processing your subscription...',
  }),

  subscribed: (): PlayerMessage => ({
    tone: 'success',
    title: 'Subscription Successful!',
    text: 'You have successfully subscribed to our newsletter.',
  }),

  alreadySubscribed: (): PlayerMessage => ({
    tone: 'info',
    title: 'Already Subscribed',
    text: "You're already subscribed to our newsletter!",
  }),

  subscriptionFailed: (): PlayerMessage => ({
    tone: 'error',
    title: 'Subscription Failed',
    text: 'Unable to subscribe to the newsletter. Please try again later.',
  }),

  verificationSent: (): PlayerMessage => ({
    tone: 'success',
    title: 'Check Your Inbox',
    text: 'A verification email has been sent to your address. Enter the code with /newsletter -c <code>.',
  }),

  verificationSendFailed: (): PlayerMessage => ({
    tone: 'error',
    title: 'Verification Failed',
    text: 'We could not send the verification email. Please try again later.',
  }),

  verificationFailed: (): PlayerMessage => ({
    tone: 'error',
    title: 'Verification Failed',
    text: 'That code is invalid or has expired. Check your email or request a new code.',
  }),
};

/**
 * Messages that respect --silent. Permission, usage and consent messages
 * bypass this and go to the sender directly.
 */
export class SilentAwareMessenger {
  constructor(
    private readonly sender: CommandSender,
    readonly silent: boolean
  ) {}

  send(message: PlayerMessage): void {
    if (!this.silent) {
      this.sender.sendMessage(message);
    }
  }
}
