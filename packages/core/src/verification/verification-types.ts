/**
 * Verification Domain Types
 */

import type { VerificationError } from './verification-errors.js';

export interface PendingVerification {
  userId: string;
  /** 5-digit numeric code, "10000"–"99999" */
  code: string;
  email: string;
  silent: boolean;
  issuedAt: number;
}

export interface VerifiedSubscription {
  email: string;
  silent: boolean;
}

export type VerificationResult =
  | { ok: true; subscription: VerifiedSubscription }
  | { ok: false; error: VerificationError };

export interface VerificationRegistryOptions {
  /** Lifetime of an issued code (default 60 minutes) */
  ttlMs?: number;
  /** Table size above which `issue` sweeps expired entries (default 10000) */
  maxEntries?: number;
  now?: () => number;
  generateCode?: () => string;
}
