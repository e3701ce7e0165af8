import { describe, it, expect, beforeEach } from 'vitest';
import { VerificationRegistry, VERIFICATION_TTL_MS } from '../verification-registry.js';
import {
  NoPendingVerificationError,
  VerificationCodeExpiredError,
  VerificationCodeMismatchError,
} from '../verification-errors.js';

describe('VerificationRegistry', () => {
  let clock: number;
  let registry: VerificationRegistry;

  beforeEach(() => {
    clock = Date.parse('2024-01-01T00:00:00.000Z');
    registry = new VerificationRegistry({ now: () => clock });
  });

  describe('issue', () => {
    it('issues 5-digit codes within range', () => {
      for (let i = 0; i < 200; i++) {
        const code = registry.issue(`player-${i}`, 'player@example.com', false);
        expect(code).toMatch(/^\d{5}$/);
        expect(Number(code)).toBeGreaterThanOrEqual(10000);
        expect(Number(code)).toBeLessThanOrEqual(99999);
      }
    });

    it('keeps one entry per user and invalidates the previous code', () => {
      const codes = ['11111', '22222'];
      registry = new VerificationRegistry({
        now: () => clock,
        generateCode: () => codes.shift() ?? '99999',
      });

      const first = registry.issue('player-1', 'first@example.com', false);
      const second = registry.issue('player-1', 'second@example.com', true);

      expect(registry.pendingCount()).toBe(1);
      const stale = registry.validate('player-1', first);
      expect(stale.ok).toBe(false);

      const fresh = registry.validate('player-1', second);
      expect(fresh).toEqual({
        ok: true,
        subscription: { email: 'second@example.com', silent: true },
      });
    });

    it('redraws a code that another user still holds', () => {
      const codes = ['12345', '12345', '54321'];
      registry = new VerificationRegistry({
        now: () => clock,
        generateCode: () => codes.shift() ?? '99999',
      });

      expect(registry.issue('player-1', 'a@example.com', false)).toBe('12345');
      expect(registry.issue('player-2', 'b@example.com', false)).toBe('54321');
    });

    it('takes over a code held by an expired entry', () => {
      const codes = ['12345', '12345'];
      registry = new VerificationRegistry({
        now: () => clock,
        generateCode: () => codes.shift() ?? '99999',
      });

      registry.issue('player-1', 'a@example.com', false);
      clock += VERIFICATION_TTL_MS + 1;

      expect(registry.issue('player-2', 'b@example.com', false)).toBe('12345');
      expect(registry.pendingCount()).toBe(1);
    });
  });

  describe('validate', () => {
    it('succeeds once and consumes the code', () => {
      const code = registry.issue('player-1', 'player@example.com', false);

      expect(registry.validate('player-1', code)).toEqual({
        ok: true,
        subscription: { email: 'player@example.com', silent: false },
      });

      const again = registry.validate('player-1', code);
      expect(again.ok).toBe(false);
      if (!again.ok) {
        expect(again.error).toBeInstanceOf(NoPendingVerificationError);
      }
      expect(registry.pendingCount()).toBe(0);
    });

    it('fails without a pending entry', () => {
      const result = registry.validate('player-1', '00000');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NoPendingVerificationError);
      }
    });

    it('leaves the entry in place after a wrong code', () => {
      registry = new VerificationRegistry({ now: () => clock, generateCode: () => '12345' });
      registry.issue('player-1', 'player@example.com', false);

      const wrong = registry.validate('player-1', '54321');
      expect(wrong.ok).toBe(false);
      if (!wrong.ok) {
        expect(wrong.error).toBeInstanceOf(VerificationCodeMismatchError);
      }

      expect(registry.validate('player-1', '12345').ok).toBe(true);
    });

    it('does not accept a code issued to another user', () => {
      registry = new VerificationRegistry({ now: () => clock, generateCode: () => '12345' });
      registry.issue('player-1', 'player@example.com', false);

      expect(registry.validate('player-2', '12345').ok).toBe(false);
      expect(registry.pendingCount()).toBe(1);
    });

    it('accepts a code at exactly sixty minutes', () => {
      const code = registry.issue('player-1', 'player@example.com', false);
      clock += VERIFICATION_TTL_MS;

      expect(registry.validate('player-1', code).ok).toBe(true);
    });

    it('rejects and evicts a code older than sixty minutes', () => {
      const code = registry.issue('player-1', 'player@example.com', false);
      clock += VERIFICATION_TTL_MS + 1;

      const result = registry.validate('player-1', code);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(VerificationCodeExpiredError);
      }
      expect(registry.pendingCount()).toBe(0);
    });
  });

  describe('revoke', () => {
    it('drops the pending code', () => {
      const code = registry.issue('player-1', 'player@example.com', false);

      expect(registry.revoke('player-1')).toBe(true);
      expect(registry.revoke('player-1')).toBe(false);
      expect(registry.validate('player-1', code).ok).toBe(false);
    });
  });

  describe('sweepIfOversized', () => {
    it('does nothing while the table is within bounds', () => {
      registry.issue('player-1', 'a@example.com', false);
      clock += VERIFICATION_TTL_MS + 1;

      expect(registry.sweepIfOversized(1)).toBe(0);
      expect(registry.pendingCount()).toBe(1);
    });

    it('removes only expired entries once oversized', () => {
      registry.issue('player-1', 'a@example.com', false);
      registry.issue('player-2', 'b@example.com', false);
      clock += VERIFICATION_TTL_MS + 1;
      registry.issue('player-3', 'c@example.com', false);

      expect(registry.sweepIfOversized(2)).toBe(2);
      expect(registry.pendingCount()).toBe(1);
    });

    it('runs from issue when the table exceeds its limit', () => {
      registry = new VerificationRegistry({ now: () => clock, maxEntries: 2 });
      registry.issue('player-1', 'a@example.com', false);
      registry.issue('player-2', 'b@example.com', false);
      registry.issue('player-3', 'c@example.com', false);
      clock += VERIFICATION_TTL_MS + 1;

      registry.issue('player-4', 'd@example.com', false);

      expect(registry.pendingCount()).toBe(1);
    });
  });
});
