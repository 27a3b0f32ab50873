import { readBudgets } from './config/budgets.js';

export type BreakerState = 'ok' | 'open' | 'half-open';

export type BreakerOptions = { threshold?: number; cooldownMs?: number; closeAfter?: number };

/**
 * Per-source breaker. Opens after `threshold` consecutive failures, rejects
 * calls for `cooldownMs`, then needs `closeAfter` successes to report ok again.
 */
export class Breaker {
  private fails = 0;
  private openedUntil = 0;
  private successStreak = 0;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly closeAfter: number;

  constructor(readonly name: string, opts: BreakerOptions = {}) {
    const b = readBudgets();
    this.threshold = Math.max(1, opts.threshold ?? b.BREAKER_THRESHOLD);
    this.cooldownMs = Math.max(0, opts.cooldownMs ?? b.BREAKER_COOLDOWN_MS);
    this.closeAfter = Math.max(1, opts.closeAfter ?? b.BREAKER_CLOSE_AFTER);
  }

  allow(now = Date.now()) { return now >= this.openedUntil; }

  success(now = Date.now()) {
    if (!this.allow(now)) { this.successStreak = 0; return; }
    this.fails = 0;
    if (this.successStreak < this.closeAfter) {
      this.successStreak++;
      if (this.successStreak >= this.closeAfter) this.openedUntil = 0;
    }
  }

  fail(now = Date.now()) {
    this.fails += 1;
    if (this.fails >= this.threshold) {
      this.openedUntil = now + this.cooldownMs;
      this.successStreak = 0;
    }
  }

  state(now = Date.now()): BreakerState {
    if (!this.allow(now)) return 'open';
    return this.openedUntil !== 0 && this.successStreak < this.closeAfter ? 'half-open' : 'ok';
  }
}
