/**
 * Environment configuration
 *
 * Maps NEWSLETTER_* variables onto the config schema. Empty values count as
 * unset so defaults still apply.
 */

import { NewsletterConfigSchema, type NewsletterConfig } from '@newsletter/types';

export const DEFAULT_PORT = 3000;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = new.target.name;
  }
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NewsletterConfig {
  const result = NewsletterConfigSchema.safeParse({
    apiKey: read(env, 'NEWSLETTER_API_KEY'),
    groupId: read(env, 'NEWSLETTER_GROUP_ID'),
    rateLimitSeconds: read(env, 'NEWSLETTER_RATE_LIMIT_SECONDS'),
    privacyPolicyUrl: read(env, 'NEWSLETTER_PRIVACY_POLICY_URL'),
    emailValidationEnabled: read(env, 'NEWSLETTER_EMAIL_VALIDATION'),
    emailFrom: read(env, 'NEWSLETTER_EMAIL_FROM'),
    apiEndpoint: read(env, 'NEWSLETTER_API_ENDPOINT'),
    channel: read(env, 'NEWSLETTER_CHANNEL'),
    workerConcurrency: read(env, 'NEWSLETTER_WORKER_CONCURRENCY'),
    templateDirectory: read(env, 'NEWSLETTER_TEMPLATE_DIR'),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function readPort(env: NodeJS.ProcessEnv = process.env): number {
  return Number(read(env, 'PORT')) || DEFAULT_PORT;
}
