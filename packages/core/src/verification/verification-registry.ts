/**
 * Verification Registry
 *
 * Holds at most one pending verification code per user. Codes are
 * single-use, expire lazily at validation time, and are overwritten when a
 * new code is issued for the same user.
 */

import { randomInt } from 'node:crypto';
import {
  NoPendingVerificationError,
  VerificationCodeExpiredError,
  VerificationCodeMismatchError,
} from './verification-errors.js';
import type {
  PendingVerification,
  VerificationRegistryOptions,
  VerificationResult,
} from './verification-types.js';

export const VERIFICATION_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_PENDING = 10_000;
const MAX_DRAW_ATTEMPTS = 10;

export function generateVerificationCode(): string {
  return String(randomInt(10_000, 100_000));
}

export class VerificationRegistry {
  private readonly pending = new Map<string, PendingVerification>();
  private readonly codeOwners = new Map<string, string>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly generateCode: () => string;

  constructor(options: VerificationRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? VERIFICATION_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_PENDING;
    this.now = options.now ?? (() => Date.now());
    this.generateCode = options.generateCode ?? generateVerificationCode;
  }

  /**
   * Issue a fresh code for the user, replacing any code still pending for them
   */
  issue(userId: string, email: string, silent: boolean): string {
    this.sweepIfOversized();
    this.remove(userId);

    const code = this.drawCode();
    this.pending.set(userId, { userId, code, email, silent, issuedAt: this.now() });
    this.codeOwners.set(code, userId);

    return code;
  }

  /**
   * Check a submitted code. A match consumes the entry; a wrong code leaves it
   * in place for another try; an expired entry is evicted.
   */
  validate(userId: string, code: string): VerificationResult {
    const entry = this.pending.get(userId);

    if (!entry) {
      return { ok: false, error: new NoPendingVerificationError() };
    }

    if (this.isExpired(entry)) {
      this.remove(userId);
      return { ok: false, error: new VerificationCodeExpiredError() };
    }

    if (entry.code !== code.trim()) {
      return { ok: false, error: new VerificationCodeMismatchError() };
    }

    this.remove(userId);
    return { ok: true, subscription: { email: entry.email, silent: entry.silent } };
  }

  /**
   * Drop the user's pending code, if any
   */
  revoke(userId: string): boolean {
    return this.remove(userId);
  }

  /**
   * Remove expired entries once the table grows past `maxEntries`
   *
   * @returns Number of entries removed
   */
  sweepIfOversized(maxEntries = this.maxEntries): number {
    if (this.pending.size <= maxEntries) {
      return 0;
    }
    return this.sweepExpired();
  }

  sweepExpired(): number {
    let removed = 0;
    for (const entry of this.pending.values()) {
      if (this.isExpired(entry)) {
        this.remove(entry.userId);
        removed++;
      }
    }
    return removed;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  clear(): void {
    this.pending.clear();
    this.codeOwners.clear();
  }

  private isExpired(entry: PendingVerification): boolean {
    return this.now() - entry.issuedAt > this.ttlMs;
  }

  private remove(userId: string): boolean {
    const entry = this.pending.get(userId);
    if (!entry) {
      return false;
    }

    this.pending.delete(userId);
    if (this.codeOwners.get(entry.code) === userId) {
      this.codeOwners.delete(entry.code);
    }
    return true;
  }

  /**
   * Best effort: prefer a code no other live entry holds. An expired holder
   * is evicted; after MAX_DRAW_ATTEMPTS the last draw is used regardless.
   */
  private drawCode(): string {
    let code = this.generateCode();

    for (let attempt = 1; attempt < MAX_DRAW_ATTEMPTS; attempt++) {
      const owner = this.codeOwners.get(code);
      if (owner === undefined) {
        return code;
      }

      const holder = this.pending.get(owner);
      if (!holder || this.isExpired(holder)) {
        this.remove(owner);
        this.codeOwners.delete(code);
        return code;
      }

      code = this.generateCode();
    }

    return code;
  }
}
