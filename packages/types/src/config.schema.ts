/**
 * Runtime configuration schema
 *
 * Values are read once at startup and are read-only afterwards.
 */

import { z } from 'zod';

export const DEFAULT_API_KEY = 'your_api_key_here';
export const DEFAULT_GROUP_ID = 'your_group_id_here';
export const DEFAULT_RATE_LIMIT_SECONDS = 5;
export const DEFAULT_API_ENDPOINT = 'api.sendlix.com:443';
export const DEFAULT_CHANNEL = 'sendlix:newsletter';

const API_KEY_PATTERN = /^[^.]+\.\d+$/;

const booleanFlag = z
  .union([
    z.boolean(),
    z.string().trim().toLowerCase().pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no'])),
  ])
  .transform((value) =>
    typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value)
  );

export const NewsletterConfigSchema = z
  .object({
    apiKey: z
      .string()
      .trim()
      .min(1, 'API key is required')
      .refine((value) => value !== DEFAULT_API_KEY, 'API key still has its placeholder value')
      .refine((value) => API_KEY_PATTERN.test(value), 'API key must have the form <secret>.<keyId>'),
    groupId: z
      .string()
      .trim()
      .min(1, 'Group ID is required')
      .refine((value) => value !== DEFAULT_GROUP_ID, 'Group ID still has its placeholder value'),
    rateLimitSeconds: z.coerce
      .number()
      .int('Rate limit must be a whole number of seconds')
      .min(0, 'Rate limit seconds cannot be negative')
      .default(DEFAULT_RATE_LIMIT_SECONDS),
    privacyPolicyUrl: z.string().url().optional(),
    emailValidationEnabled: booleanFlag.default(false),
    emailFrom: z.string().email().optional(),
    apiEndpoint: z.string().min(1).default(DEFAULT_API_ENDPOINT),
    channel: z.string().min(1).default(DEFAULT_CHANNEL),
    workerConcurrency: z.coerce.number().int().min(1).max(64).default(8),
    templateDirectory: z.string().min(1).optional(),
  })
  .refine((config) => !config.emailValidationEnabled || config.emailFrom !== undefined, {
    message: 'emailFrom is required when email validation is enabled',
    path: ['emailFrom'],
  });

export type NewsletterConfig = z.infer<typeof NewsletterConfigSchema>;
export type NewsletterConfigInput = z.input<typeof NewsletterConfigSchema>;
