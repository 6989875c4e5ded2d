export type RateLimitResult = { readonly allowed: true } | { readonly allowed: false; readonly retryAfterMs: number };

export interface RequestRateLimiter {
  check(ownerId: string): RateLimitResult;
  /** Forgets owners whose last request is older than the interval. */
  prune(): void;
}

/**
 * Per-owner minimum spacing between new requests. An interval of 0 turns the
 * limiter into a no-op that keeps no state.
 */
export const createRequestRateLimiter = (
  minIntervalMs: number,
  now: () => number = Date.now,
): RequestRateLimiter => {
  const lastRequestAt = new Map<string, number>();

  return {
    check: (ownerId) => {
      if (minIntervalMs <= 0) {
        return { allowed: true };
      }
      const current = now();
      const last = lastRequestAt.get(ownerId);
      if (last !== undefined && current - last < minIntervalMs) {
        return { allowed: false, retryAfterMs: minIntervalMs - (current - last) };
      }
      lastRequestAt.set(ownerId, current);
      return { allowed: true };
    },
    prune: () => {
      const current = now();
      for (const [ownerId, last] of lastRequestAt) {
        if (current - last >= minIntervalMs) {
          lastRequestAt.delete(ownerId);
        }
      }
    },
  };
};
