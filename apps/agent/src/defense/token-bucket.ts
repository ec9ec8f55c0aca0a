/**
 * Token-Bucket Limiter
 *
 * Sustained rate `rateBase` tokens/s with a burst of `rateBurst`. Buckets
 * start full. Refill and consumption happen in one store update.
 */

import { MemoryStateStore, evictWhere, type StateStore } from './store.js';
import { reportCorruption } from './errors.js';
import type { Address, BucketState, RateDecision } from './types.js';
import type { RateLimiter } from './rate-limiter.js';

export interface TokenBucketConfig {
    rateBase: number;
    rateBurst: number;
}

export class TokenBucketLimiter implements RateLimiter {
    readonly strategy = 'token_bucket' as const;
    private config: TokenBucketConfig;
    private buckets: StateStore<BucketState>;

    constructor(config: TokenBucketConfig, store: StateStore<BucketState> = new MemoryStateStore()) {
        this.config = { ...config };
        this.buckets = store;
    }

    /** Boolean form: true when a token was taken. */
    tryConsume(address: Address, now: number): boolean {
        return this.check(address, now).allowed;
    }

    check(address: Address, now: number): RateDecision {
        const { rateBase, rateBurst } = this.config;
        let decision: RateDecision = { allowed: false };

        this.buckets.update(address, (current) => {
            const bucket = current ?? { tokens: rateBurst, lastRefill: now };

            let tokens = bucket.tokens;
            if (!Number.isFinite(tokens) || tokens < 0 || tokens > rateBurst) {
                reportCorruption('TokenBucket', `${address} held ${tokens} tokens`);
                tokens = Number.isFinite(tokens) ? Math.min(rateBurst, Math.max(0, tokens)) : 0;
            }

            // a clock step backwards refills nothing
            const elapsedSec = Math.max(0, now - bucket.lastRefill) / 1000;
            tokens = Math.min(rateBurst, tokens + elapsedSec * rateBase);
            const lastRefill = Math.max(now, bucket.lastRefill);

            if (tokens >= 1) {
                decision = { allowed: true };
                return { tokens: tokens - 1, lastRefill };
            }

            decision = { allowed: false, retryAfterSeconds: (1 - tokens) / rateBase };
            return { tokens, lastRefill };
        });

        return decision;
    }

    /** Current token count without consuming (refill applied). */
    peek(address: Address, now: number): number {
        const bucket = this.buckets.get(address);
        if (!bucket) return this.config.rateBurst;
        const elapsedSec = Math.max(0, now - bucket.lastRefill) / 1000;
        return Math.min(this.config.rateBurst, bucket.tokens + elapsedSec * this.config.rateBase);
    }

    reset(address: Address): void {
        this.buckets.delete(address);
    }

    /**
     * Buckets idle for at least `rateBurst / rateBase` seconds are full again,
     * so evicting them is lossless. Shorter TTLs refill early.
     */
    evictIdle(now: number, idleMs: number): number {
        return evictWhere(this.buckets, (bucket) => now - bucket.lastRefill > idleMs);
    }

    get size(): number {
        return this.buckets.size;
    }
}
