/**
 * UserRateLimiter: one command per user per window, checked before a
 * command reaches the engine.
 */

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

export class UserRateLimiter {
  private lastUse = new Map<string, number>();

  constructor(private readonly windowMs: number) {}

  hit(userId: string, now: number): RateLimitDecision {
    if (this.windowMs <= 0) return { allowed: true };

    const last = this.lastUse.get(userId);
    if (last !== undefined && now - last < this.windowMs) {
      return { allowed: false, retryAfterMs: this.windowMs - (now - last) };
    }

    this.lastUse.set(userId, now);
    this.prune(now);
    return { allowed: true };
  }

  private prune(now: number): void {
    for (const [userId, last] of this.lastUse) {
      if (now - last >= this.windowMs) this.lastUse.delete(userId);
    }
  }
}
