/**
 * Cooldown limiter configuration options
 */
export interface CooldownLimiterConfig {
  /**
   * Minimum number of seconds between two recorded calls by the same user
   */
  cooldownSeconds: number;
  /**
   * How often stale entries are swept, in milliseconds (default 60s)
   */
  sweepIntervalMs?: number;
  /**
   * Clock used for every comparison; defaults to Date.now
   */
  now?: () => number;
}

export interface CooldownLimiter {
  canProceed(userId: string): boolean;
  record(userId: string): void;
  remainingSeconds(userId: string): number;
  clear(userId: string): void;
  trackedCount(): number;
  sweep(): number;
  shutdown(): void;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

function isBlank(userId: string): boolean {
  return userId.trim().length === 0;
}

/**
 * Create an in-memory per-user cooldown limiter
 *
 * Each user id maps to the time of its last recorded call. Map operations
 * never span an await, so concurrent dispatches for different users never
 * contend and no global lock is involved.
 *
 * @example
 * ```ts
 * const limiter = createCooldownLimiter({ cooldownSeconds: 5 });
 * if (limiter.canProceed(playerId)) {
 *   limiter.record(playerId);
 *   await callRemote();
 * }
 * ```
 */
export function createCooldownLimiter(config: CooldownLimiterConfig): CooldownLimiter {
  if (!Number.isFinite(config.cooldownSeconds) || config.cooldownSeconds < 0) {
    throw new RangeError('cooldownSeconds must be a non-negative number');
  }

  const cooldownMs = config.cooldownSeconds * 1000;
  const now = config.now ?? (() => Date.now());
  const lastCallAt = new Map<string, number>();

  /**
   * True when the user has no recorded call or the cooldown has elapsed.
   * Never mutates state.
   */
  function canProceed(userId: string): boolean {
    if (isBlank(userId)) {
      return false;
    }

    const last = lastCallAt.get(userId);
    if (last === undefined) {
      return true;
    }

    return now() - last >= cooldownMs;
  }

  /**
   * Record that a remote call is about to be made for this user.
   * Only call this when the call actually proceeds.
   */
  function record(userId: string): void {
    if (isBlank(userId)) {
      return;
    }
    lastCallAt.set(userId, now());
  }

  /**
   * Whole seconds left before the user may call again, rounded up so a
   * non-zero wait is never reported as 0.
   */
  function remainingSeconds(userId: string): number {
    const last = lastCallAt.get(userId);
    if (last === undefined) {
      return 0;
    }

    const remainingMs = cooldownMs - (now() - last);
    return Math.max(0, Math.ceil(remainingMs / 1000));
  }

  function clear(userId: string): void {
    lastCallAt.delete(userId);
  }

  function trackedCount(): number {
    return lastCallAt.size;
  }

  /**
   * Remove entries older than twice the cooldown. With a zero cooldown
   * every entry older than the current tick is removed.
   *
   * @returns Number of entries removed
   */
  function sweep(): number {
    const threshold = cooldownMs * 2;
    const current = now();
    let removed = 0;

    for (const [userId, last] of lastCallAt) {
      if (current - last > threshold) {
        lastCallAt.delete(userId);
        removed++;
      }
    }

    return removed;
  }

  const timer = setInterval(sweep, config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
  timer.unref();

  function shutdown(): void {
    clearInterval(timer);
    lastCallAt.clear();
  }

  return {
    canProceed,
    record,
    remainingSeconds,
    clear,
    trackedCount,
    sweep,
    shutdown,
  };
}
