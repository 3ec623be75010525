import { describe, it, expect } from 'vitest';
import { UserRateLimiter } from './rate-limiter.js';

describe('UserRateLimiter', () => {
  it('allows the first command and limits repeats inside the window', () => {
    const limiter = new UserRateLimiter(10_000);

    expect(limiter.hit('u1', 1_000)).toEqual({ allowed: true });
    expect(limiter.hit('u1', 4_000)).toEqual({ allowed: false, retryAfterMs: 7_000 });
    expect(limiter.hit('u1', 11_000)).toEqual({ allowed: true });
  });

  it('tracks users independently', () => {
    const limiter = new UserRateLimiter(10_000);

    limiter.hit('u1', 1_000);
    expect(limiter.hit('u2', 1_500)).toEqual({ allowed: true });
  });

  it('does not extend the window on a rejected hit', () => {
    const limiter = new UserRateLimiter(10_000);

    limiter.hit('u1', 0);
    limiter.hit('u1', 9_000);
    expect(limiter.hit('u1', 10_000)).toEqual({ allowed: true });
  });

  it('never limits with a zero window', () => {
    const limiter = new UserRateLimiter(0);

    expect(limiter.hit('u1', 0)).toEqual({ allowed: true });
    expect(limiter.hit('u1', 0)).toEqual({ allowed: true });
  });
});
