import { createHash } from 'node:crypto';
import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Redact credentials and one-time codes from logs
 */
const REDACTION_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'apiKey',
  'secret',
  'token',
  'accessToken',
  'code',
  'config.apiKey',
];

const BEARER_PATTERN = /Bearer\s+[A-Za-z0-9._~+/=-]+/g;

function redactBearer(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(BEARER_PATTERN, 'Bearer [REDACTED]');
  }
  if (Array.isArray(value)) {
    return value.map(redactBearer);
  }
  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return redactRecord(value);
  }
  return value;
}

function redactRecord(object: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(object)) {
    result[key] = redactBearer(entry);
  }
  return result;
}

/**
 * Short, stable identifier for an email address so log lines can be
 * correlated without writing the address itself.
 */
export function getRecipientLogId(email: string): string {
  return createHash('sha256').update(email.trim().toLowerCase()).digest('hex').slice(0, 12);
}

/**
 * Create a structured logger instance with Pino
 *
 * Level comes from LOG_LEVEL (default info). Bearer tokens are scrubbed from
 * every string in the merge object before the redaction paths apply.
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        return redactRecord(object);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
