/**
 * Request Domain
 *
 * Parsing of local newsletter commands and inbound wire messages
 */

export {
  parseNewsletterCommand,
  splitWireMessage,
  isValidEmail,
  SILENT_FLAG,
  PRIVACY_FLAG,
  VERIFY_MARKER,
} from './request-parser.js';

export type { ParsedCommand, ParseError, ParseErrorReason } from './request-types.js';
