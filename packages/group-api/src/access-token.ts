/**
 * Access Token Provider
 *
 * Exchanges the configured API key for a short-lived JWT and keeps it until
 * it is about to expire. Concurrent callers share one in-flight refresh.
 */

import { decodeJwt, type JWTPayload } from 'jose';
import { logger as defaultLogger, type Logger } from '@newsletter/observability';
import { ApiKeyFormatError, MissingScopeError } from './errors.js';

export const REQUIRED_SCOPE = 'group.insert';
export const REFRESH_BUFFER_MS = 30_000;

export interface ApiKeyCredentials {
  secret: string;
  keyId: string;
}

export interface IssuedToken {
  token: string;
  /** Expiry as epoch milliseconds */
  expiresAt: number;
}

export type TokenSource = (credentials: ApiKeyCredentials) => Promise<IssuedToken>;

export interface AccessTokenProviderOptions {
  apiKey: string;
  fetchToken: TokenSource;
  requiredScope?: string;
  refreshBufferMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Split an API key of the form `<secret>.<numeric key id>`
 */
export function parseApiKey(apiKey: string): ApiKeyCredentials {
  const parts = apiKey.trim().split('.');
  if (parts.length !== 2) {
    throw new ApiKeyFormatError('Invalid API key format. Expected format: secret.keyId');
  }

  const [secret = '', keyId = ''] = parts;
  if (!secret) {
    throw new ApiKeyFormatError('API key secret cannot be empty');
  }
  if (!/^\d+$/.test(keyId)) {
    throw new ApiKeyFormatError('Invalid key ID format. Must be a valid number');
  }

  return { secret, keyId };
}

function grantedScopes(payload: JWTPayload): string[] {
  const scopes: string[] = [];
  for (const claim of [payload['scope'], payload['scopes'], payload['scp']]) {
    if (typeof claim === 'string') {
      scopes.push(...claim.split(/\s+/));
    } else if (Array.isArray(claim)) {
      scopes.push(...claim.filter((value): value is string => typeof value === 'string'));
    }
  }
  return scopes;
}

export class AccessTokenProvider {
  private readonly credentials: ApiKeyCredentials;
  private readonly fetchToken: TokenSource;
  private readonly requiredScope: string;
  private readonly refreshBufferMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private current: IssuedToken | null = null;
  private refreshing: Promise<string> | null = null;

  constructor(options: AccessTokenProviderOptions) {
    this.credentials = parseApiKey(options.apiKey);
    this.fetchToken = options.fetchToken;
    this.requiredScope = options.requiredScope ?? REQUIRED_SCOPE;
    this.refreshBufferMs = options.refreshBufferMs ?? REFRESH_BUFFER_MS;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? defaultLogger;
  }

  getToken(): Promise<string> {
    if (this.current && this.current.expiresAt - this.now() > this.refreshBufferMs) {
      return Promise.resolve(this.current.token);
    }

    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  /** Drop the cached token so the next call fetches a new one */
  invalidate(): void {
    this.current = null;
  }

  private async refresh(): Promise<string> {
    const issued = await this.fetchToken(this.credentials);

    if (!grantedScopes(decodeJwt(issued.token)).includes(this.requiredScope)) {
      throw new MissingScopeError(this.requiredScope);
    }

    this.current = issued;
    this.logger.info({ expiresAt: new Date(issued.expiresAt).toISOString() }, 'Access token refreshed');
    return issued.token;
  }
}
