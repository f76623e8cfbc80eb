import type { CustomerTier } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

const WINDOW_MS = 60_000;

export type AcquireResult =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

/**
 * Per-tier request budget over a sliding one-minute window. Each tier has
 * its own limit; one tier exhausting its budget does not affect the others.
 */
export class TierRateLimiter {
  private windows = new Map<CustomerTier, number[]>(); // tier -> request timestamps, oldest first

  constructor(
    private readonly requestsPerMinute: Record<CustomerTier, number>,
    private readonly enabled = true,
  ) {}

  tryAcquire(tier: CustomerTier, now = Date.now()): AcquireResult {
    if (!this.enabled) return { allowed: true };

    const stamps = this.prune(tier, now);
    const limit = this.requestsPerMinute[tier];

    if (stamps.length >= limit) {
      const oldest = stamps[0] ?? now;
      const retryAfterMs = Math.max(0, oldest + WINDOW_MS - now);
      log.debug(`Rate-limited: ${tier} (${stamps.length}/${limit} in window, retry in ${retryAfterMs}ms)`);
      return { allowed: false, retryAfterMs };
    }

    stamps.push(now);
    return { allowed: true };
  }

  private prune(tier: CustomerTier, now: number): number[] {
    const stamps = this.windows.get(tier) ?? [];
    let drop = 0;
    while (drop < stamps.length && now - (stamps[drop] ?? now) >= WINDOW_MS) {
      drop++;
    }
    const kept = drop > 0 ? stamps.slice(drop) : stamps;
    this.windows.set(tier, kept);
    return kept;
  }
}
