/**
 * Request Domain Types
 *
 * Output of the command parser. `NewsletterRequest` and `VerifyRequest` come
 * from @newsletter/types; `ParseError` is the parser's own failure shape.
 */

import type { NewsletterRequest, VerifyRequest } from '@newsletter/types';

export type ParseErrorReason = 'missing_arguments' | 'missing_code';

export interface ParseError {
  kind: 'invalid';
  reason: ParseErrorReason;
}

export type ParsedCommand = NewsletterRequest | VerifyRequest | ParseError;
