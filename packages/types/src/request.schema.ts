/**
 * Newsletter request schemas
 *
 * Canonical shapes produced by the command parser, whether the tokens came
 * from a local command or from an inbound wire message.
 */

import { z } from 'zod';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const SubscriberEmailSchema = z
  .string()
  .refine((value) => value.trim().length > 0, 'Email is required')
  .refine((value) => EMAIL_PATTERN.test(value), 'Invalid email format');

export const NewsletterRequestSchema = z.object({
  kind: z.literal('subscribe'),
  email: z.string(),
  agreePrivacy: z.boolean(),
  silent: z.boolean(),
});

export type NewsletterRequest = z.infer<typeof NewsletterRequestSchema>;

export const VerifyRequestSchema = z.object({
  kind: z.literal('verify'),
  code: z.string().min(1),
});

export type VerifyRequest = z.infer<typeof VerifyRequestSchema>;

export const PlayerCommandSchema = z.object({
  args: z.array(z.string()).max(16),
});

export type PlayerCommand = z.infer<typeof PlayerCommandSchema>;
