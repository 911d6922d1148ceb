export interface RateLimitOptions {
  max: number;
  windowMs: number;
}

export interface RateLimitResult {
  limited: boolean;
  retryAfterMs: number;
}

interface Bucket {
  n: number;
  reset: number;
}

/**
 * Fixed-window request counter per key (client IP). Expired buckets are
 * swept at most once per window, so the map only holds keys seen within
 * the last window.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private nextSweep = 0;

  constructor(private readonly options: RateLimitOptions) {}

  get size(): number {
    return this.buckets.size;
  }

  hit(key: string, now: number = Date.now()): RateLimitResult {
    this.sweep(now);
    let b = this.buckets.get(key);
    if (!b || now > b.reset) {
      b = { n: 0, reset: now + this.options.windowMs };
      this.buckets.set(key, b);
    }
    b.n++;
    if (b.n > this.options.max) return { limited: true, retryAfterMs: Math.max(0, b.reset - now) };
    return { limited: false, retryAfterMs: 0 };
  }

  private sweep(now: number) {
    if (now < this.nextSweep) return;
    for (const [key, b] of this.buckets) {
      if (now > b.reset) this.buckets.delete(key);
    }
    this.nextSweep = now + this.options.windowMs;
  }
}
