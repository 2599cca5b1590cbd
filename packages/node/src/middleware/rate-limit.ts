/**
 * Submission budget — token bucket per submitting address.
 *
 * A bucket belongs to the address a credential submits as, so several
 * API keys or tokens bound to one relayer address draw from a single
 * budget. Credentials without an address fall back to their identity.
 * Buckets that have refilled to capacity carry no state worth keeping
 * and are dropped by sweep(), which consume() runs once per refill period.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export interface RateLimitConfig {
  /** Tokens regained per minute */
  readonly rpm: number;
  /** Bucket capacity */
  readonly burst: number;
  /** Millisecond clock, Date.now by default */
  readonly now?: (() => number) | undefined;
}

export interface RateDecision {
  readonly allowed: boolean;
  readonly remaining: number;
  readonly retryAfterMs: number;
}

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * Bucket key for an authenticated caller.
 */
export function rateLimitKey(auth: AuthContext): string {
  return auth.address !== undefined
    ? `address:${auth.address.toLowerCase()}`
    : `identity:${auth.identity}`;
}

export class TokenBucketStore {
  private readonly _buckets = new Map<string, Bucket>();
  private readonly _burst: number;
  private readonly _msPerToken: number;
  private readonly _now: () => number;
  private _lastSweep: number;

  constructor(config: RateLimitConfig) {
    if (config.rpm <= 0 || config.burst < 1) {
      throw new RangeError(`Invalid rate limit: rpm=${config.rpm} burst=${config.burst}`);
    }
    this._burst = config.burst;
    this._msPerToken = 60_000 / config.rpm;
    this._now = config.now ?? Date.now;
    this._lastSweep = this._now();
  }

  /** Capacity of every bucket */
  get burst(): number {
    return this._burst;
  }

  get size(): number {
    return this._buckets.size;
  }

  consume(key: string): RateDecision {
    const now = this._now();
    if (now - this._lastSweep >= this._msPerToken * this._burst) {
      this.sweep();
    }

    const bucket = this._buckets.get(key) ?? { tokens: this._burst, updatedAt: now };
    bucket.tokens = this._level(bucket, now);
    bucket.updatedAt = now;
    this._buckets.set(key, bucket);

    if (bucket.tokens < 1) {
      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: Math.ceil((1 - bucket.tokens) * this._msPerToken),
      };
    }

    bucket.tokens -= 1;
    return { allowed: true, remaining: Math.floor(bucket.tokens), retryAfterMs: 0 };
  }

  /**
   * Drop every bucket that is back at capacity.
   *
   * @returns Number of buckets removed
   */
  sweep(): number {
    const now = this._now();
    this._lastSweep = now;
    let removed = 0;
    for (const [key, bucket] of this._buckets) {
      if (this._level(bucket, now) >= this._burst) {
        this._buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private _level(bucket: Bucket, now: number): number {
    return Math.min(this._burst, bucket.tokens + (now - bucket.updatedAt) / this._msPerToken);
  }
}

/**
 * Refuse requests over budget with 429 and Retry-After.
 *
 * Runs after auth; the bucket comes from rateLimitKey().
 */
export function rateLimitMiddleware(store: TokenBucketStore): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const decision = store.consume(rateLimitKey(c.get("auth")));

    c.header("X-RateLimit-Limit", String(store.burst));
    c.header("X-RateLimit-Remaining", String(decision.remaining));

    if (decision.allowed) {
      return next();
    }

    const seconds = Math.ceil(decision.retryAfterMs / 1000);
    c.header("Retry-After", String(seconds));
    return c.json(
      createErrorEnvelope("RATE_LIMITED", `Submission budget exhausted; retry in ${seconds}s`),
      429,
    );
  };
}
