/**
 * Sliding-window rate limiter keyed by client (usually the IP address).
 *
 * One instance per router: limits are never shared between apps.
 */

export interface RateLimitRule {
  /** Bucket name, so different routes keep separate windows */
  name: string;
  maxRequests: number;
  windowMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Seconds until the oldest request leaves the window (0 when allowed) */
  retryAfterSec: number;
}

export const RATE_LIMIT_RULES = {
  signup: { name: 'signup', maxRequests: 5, windowMs: 5 * 60 * 1000 },
  payment: { name: 'payment', maxRequests: 3, windowMs: 5 * 60 * 1000 },
  processing: { name: 'processing', maxRequests: 10, windowMs: 60 * 60 * 1000 },
  adminLogin: { name: 'admin-login', maxRequests: 5, windowMs: 15 * 60 * 1000 },
} as const satisfies Record<string, RateLimitRule>;

export class SlidingWindowRateLimiter {
  private requests: Map<string, number[]> = new Map();

  constructor(private readonly clock: () => number = Date.now) {}

  check(key: string, rule: RateLimitRule): RateLimitDecision {
    const now = this.clock();
    const bucketKey = `${rule.name}:${key}`;
    const recent = (this.requests.get(bucketKey) || []).filter(t => now - t < rule.windowMs);

    if (recent.length >= rule.maxRequests) {
      this.requests.set(bucketKey, recent);
      const retryAfterMs = rule.windowMs - (now - recent[0]);
      return { allowed: false, remaining: 0, retryAfterSec: Math.max(1, Math.ceil(retryAfterMs / 1000)) };
    }

    recent.push(now);
    this.requests.set(bucketKey, recent);
    return { allowed: true, remaining: rule.maxRequests - recent.length, retryAfterSec: 0 };
  }

  /** Drop keys whose requests are all older than the window */
  prune(maxWindowMs: number): void {
    const now = this.clock();
    for (const [key, times] of this.requests) {
      if (times.every(t => now - t >= maxWindowMs)) this.requests.delete(key);
    }
  }

  get trackedKeys(): number {
    return this.requests.size;
  }
}

/**
 * Client key from a request: first X-Forwarded-For hop, else the socket address.
 */
export function clientKey(forwardedFor: string | string[] | undefined, remoteAddress: string | undefined): string {
  const header = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  const first = header?.split(',')[0]?.trim();
  return first || remoteAddress || 'unknown';
}
