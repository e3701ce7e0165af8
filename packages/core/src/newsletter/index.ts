/**
 * Newsletter Domain
 *
 * End-to-end subscription flow for player commands and wire messages
 */

export { NewsletterService, fillVerificationTemplate } from './newsletter-service.js';
export type { NewsletterServiceDeps } from './newsletter-service.js';
export { messages, SilentAwareMessenger } from './newsletter-messages.js';
export {
  NEWSLETTER_PERMISSION,
  USERNAME_SUBSTITUTION,
  VERIFICATION_SUBJECT,
} from './newsletter-types.js';
export type {
  CommandSender,
  MessageTone,
  PlayerMessage,
  NewsletterOutcome,
  NewsletterSettings,
  VerificationTemplate,
} from './newsletter-types.js';
