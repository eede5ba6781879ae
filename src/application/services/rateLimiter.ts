import type { RateLimiterPort } from "../ports";

interface TokenBucket {
  tokens: number;
  lastRefill: number;
  maxTokens: number;
  refillRate: number; // tokens per second
}

/** Token bucket por clave (host). Una instancia por trabajo, sin estado global. */
export class TokenBucketRateLimiter implements RateLimiterPort {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly maxRps: number,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = (ms) => new Promise((r) => setTimeout(r, ms))
  ) {
    if (!(maxRps > 0)) throw new RangeError(`maxRps debe ser > 0 (${maxRps})`);
  }

  private bucketFor(key: string): TokenBucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: this.maxRps, lastRefill: this.now(), maxTokens: this.maxRps, refillRate: this.maxRps };
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  tryAcquire(key: string): boolean {
    const bucket = this.bucketFor(key);

    // Refill tokens based on time elapsed
    const now = this.now();
    const elapsed = (now - bucket.lastRefill) / 1000;
    const refill = Math.floor(elapsed * bucket.refillRate);

    if (refill > 0) {
      bucket.tokens = Math.min(bucket.maxTokens, bucket.tokens + refill);
      bucket.lastRefill = now;
    }

    if (bucket.tokens > 0) {
      bucket.tokens--;
      return true;
    }

    return false;
  }

  getWaitTime(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket || bucket.tokens > 0) return 0;
    return Math.ceil(1000 / bucket.refillRate);
  }

  async acquire(key: string): Promise<void> {
    while (!this.tryAcquire(key)) {
      await this.wait(this.getWaitTime(key));
    }
  }
}

export function rateLimitKey(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "invalid-url";
  }
}
