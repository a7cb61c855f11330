/**
 * Token Bucket Rate Limiter
 *
 * Bounds how often the engine calls out to a lyrics source.
 * Defaults: 10 calls per 60 seconds, bucket starts full.
 */

import { logger } from '../config/index.js';

interface TokenBucket {
  tokens: number;           // Current token count
  lastRefill: number;       // Last refill timestamp (ms)
}

export interface RateLimitConfig {
  maxCalls: number;         // Bucket capacity
  periodMs: number;         // Time to refill a full bucket
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs?: number;    // Wait until the next token, when denied
}

export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private config: RateLimitConfig;
  private sleep: (ms: number) => Promise<void>;

  constructor(config?: Partial<RateLimitConfig>, sleep?: (ms: number) => Promise<void>) {
    this.config = {
      maxCalls: 10,
      periodMs: 60 * 1000,
      ...config
    };
    this.sleep = sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));

    logger.debug({
      maxCalls: this.config.maxCalls,
      periodMs: this.config.periodMs
    }, 'Rate limiter initialized');
  }

  private get refillPerMs(): number {
    return this.config.maxCalls / this.config.periodMs;
  }

  /**
   * Consume a token for `key` if one is available
   */
  checkLimit(key: string = 'default'): RateLimitResult {
    const bucket = this.getBucket(key);
    this.refillBucket(bucket, Date.now());

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return {
        allowed: true,
        remaining: Math.floor(bucket.tokens)
      };
    }

    const retryAfterMs = Math.ceil((1 - bucket.tokens) / this.refillPerMs);
    logger.debug({ key, tokens: bucket.tokens, retryAfterMs }, 'Rate limit check: denied');

    return {
      allowed: false,
      remaining: 0,
      retryAfterMs
    };
  }

  /**
   * Wait until a token is available for `key`, then consume it
   */
  async acquire(key: string = 'default'): Promise<void> {
    for (;;) {
      const result = this.checkLimit(key);
      if (result.allowed) {
        return;
      }
      await this.sleep(result.retryAfterMs ?? this.config.periodMs);
    }
  }

  /**
   * Get rate limit status without consuming a token
   */
  getStatus(key: string = 'default'): RateLimitResult {
    const bucket = this.getBucket(key);
    this.refillBucket(bucket, Date.now());

    return {
      allowed: bucket.tokens >= 1,
      remaining: Math.floor(bucket.tokens),
      retryAfterMs: bucket.tokens < 1 ? Math.ceil((1 - bucket.tokens) / this.refillPerMs) : undefined
    };
  }

  resetLimit(key: string = 'default'): void {
    this.buckets.delete(key);
  }

  private getBucket(key: string): TokenBucket {
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = {
        tokens: this.config.maxCalls,
        lastRefill: Date.now()
      };
      this.buckets.set(key, bucket);
    }

    return bucket;
  }

  private refillBucket(bucket: TokenBucket, now: number): void {
    const tokensToAdd = (now - bucket.lastRefill) * this.refillPerMs;

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.config.maxCalls, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }
  }
}
