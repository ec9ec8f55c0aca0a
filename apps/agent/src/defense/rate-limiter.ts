/**
 * Rate Limiter capability
 *
 * Two interchangeable strategies:
 *  - token_bucket   → sustained rate with burst allowance
 *  - sliding_window → request count over a short horizon
 *
 * `rateStrategy` in the defense config picks one; the engine only sees
 * this interface.
 */

import { TokenBucketLimiter } from './token-bucket.js';
import { SlidingWindowLimiter } from './sliding-window.js';
import type { Address, DefenseConfig, Evictable, RateDecision, RateStrategy } from './types.js';

export interface RateLimiter extends Evictable {
    readonly strategy: RateStrategy;
    /** Record a request and decide. Never blocks. */
    check(address: Address, now: number): RateDecision;
    reset(address: Address): void;
    readonly size: number;
}

export function createRateLimiter(
    config: Pick<DefenseConfig, 'rateStrategy' | 'rateBase' | 'rateBurst' | 'windowSeconds' | 'windowMaxRequests'>,
): RateLimiter {
    switch (config.rateStrategy) {
        case 'token_bucket':
            return new TokenBucketLimiter({ rateBase: config.rateBase, rateBurst: config.rateBurst });
        case 'sliding_window':
            return new SlidingWindowLimiter({
                windowSeconds: config.windowSeconds,
                windowMaxRequests: config.windowMaxRequests,
            });
    }
}
