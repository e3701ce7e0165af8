/**
 * Newsletter command parser
 *
 * Grammar:
 *   newsletter <email> [--agree-privacy] [--silent]
 *   newsletter -c <code>
 *
 * Local commands arrive as tokens; wire messages arrive as raw UTF-8 bytes
 * holding the same tokens separated by spaces.
 */

import {
  NewsletterRequestSchema,
  SubscriberEmailSchema,
  VerifyRequestSchema,
} from '@newsletter/types';
import type { ParsedCommand } from './request-types.js';

export const SILENT_FLAG = '--silent';
export const PRIVACY_FLAG = '--agree-privacy';
export const VERIFY_MARKER = '-c';

const decoder = new TextDecoder('utf-8');

export function parseNewsletterCommand(tokens: readonly string[]): ParsedCommand {
  const args = tokens.filter((token) => token.length > 0);
  const [first, second] = args;

  if (first === undefined) {
    return { kind: 'invalid', reason: 'missing_arguments' };
  }

  if (first.toLowerCase() === VERIFY_MARKER) {
    if (second === undefined) {
      return { kind: 'invalid', reason: 'missing_code' };
    }
    return VerifyRequestSchema.parse({ kind: 'verify', code: second });
  }

  let silent = false;
  let agreePrivacy = false;
  for (const arg of args) {
    const flag = arg.toLowerCase();
    if (flag === SILENT_FLAG) {
      silent = true;
    } else if (flag === PRIVACY_FLAG) {
      agreePrivacy = true;
    }
  }

  return NewsletterRequestSchema.parse({ kind: 'subscribe', email: first, agreePrivacy, silent });
}

export function splitWireMessage(payload: Uint8Array): string[] {
  return decoder.decode(payload).trim().split(/\s+/);
}

export function isValidEmail(email: string): boolean {
  return SubscriberEmailSchema.safeParse(email).success;
}
