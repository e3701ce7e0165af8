/**
 * @newsletter/observability
 *
 * Structured logging for the newsletter bridge.
 */

export { createLogger, logger, getRecipientLogId } from './logger.js';
export type { Logger } from './logger.js';
