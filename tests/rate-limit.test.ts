import { describe, expect, it } from 'vitest';
import { createRequestRateLimiter } from '../src/rate-limit.js';

describe('RequestRateLimiter', () => {
  it('allows everything when the interval is zero', () => {
    const limiter = createRequestRateLimiter(0, () => 0);

    expect(limiter.check('u1')).toEqual({ allowed: true });
    expect(limiter.check('u1')).toEqual({ allowed: true });
  });

  it('spaces requests per owner and reports the remaining wait', () => {
    let now = 10_000;
    const limiter = createRequestRateLimiter(3_000, () => now);

    expect(limiter.check('u1')).toEqual({ allowed: true });
    now = 11_000;
    expect(limiter.check('u1')).toEqual({ allowed: false, retryAfterMs: 2_000 });
    expect(limiter.check('u2')).toEqual({ allowed: true });
    now = 13_000;
    expect(limiter.check('u1')).toEqual({ allowed: true });
  });

  it('does not extend the wait when a request is refused', () => {
    let now = 0;
    const limiter = createRequestRateLimiter(3_000, () => now);
    limiter.check('u1');

    now = 2_000;
    limiter.check('u1');
    now = 3_000;

    expect(limiter.check('u1')).toEqual({ allowed: true });
  });

  it('forgets owners once their interval has passed', () => {
    let now = 0;
    const limiter = createRequestRateLimiter(3_000, () => now);
    limiter.check('u1');

    now = 3_000;
    limiter.prune();
    now = 3_500;

    expect(limiter.check('u1')).toEqual({ allowed: true });
  });
});
