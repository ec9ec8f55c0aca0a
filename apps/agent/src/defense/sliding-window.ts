/**
 * Sliding-Window Counter
 *
 * Keeps each address's request timestamps in arrival order. Every call
 * appends `now`, trims the prefix older than the window and compares
 * what is left against `windowMaxRequests`. Denied requests stay in the
 * window, so a client that keeps hammering stays over the limit.
 */

import { MemoryStateStore, evictWhere, type StateStore } from './store.js';
import type { Address, RateDecision, WindowState } from './types.js';
import type { RateLimiter } from './rate-limiter.js';

export interface SlidingWindowConfig {
    windowSeconds: number;
    windowMaxRequests: number;
}

export class SlidingWindowLimiter implements RateLimiter {
    readonly strategy = 'sliding_window' as const;
    private config: SlidingWindowConfig;
    private windows: StateStore<WindowState>;

    constructor(config: SlidingWindowConfig, store: StateStore<WindowState> = new MemoryStateStore()) {
        this.config = { ...config };
        this.windows = store;
    }

    /** True while the address is within the limit. */
    registerAndCheck(address: Address, now: number): boolean {
        return this.check(address, now).allowed;
    }

    check(address: Address, now: number): RateDecision {
        const windowMs = this.config.windowSeconds * 1000;
        let decision: RateDecision = { allowed: true };

        this.windows.update(address, (current) => {
            const state = current ?? { timestamps: [] };
            const ts = state.timestamps;

            // keep time order even if the clock stepped back
            ts.push(ts.length > 0 ? Math.max(now, ts[ts.length - 1]) : now);
            const newest = ts[ts.length - 1];
            while (ts.length > 0 && newest - ts[0] > windowMs) ts.shift();

            if (ts.length > this.config.windowMaxRequests) {
                decision = {
                    allowed: false,
                    retryAfterSeconds: Math.max(0, ts[0] + windowMs - now) / 1000,
                };
            }
            return state;
        });

        return decision;
    }

    /** Requests currently counted in the window (read-only, no eviction). */
    count(address: Address, now: number): number {
        const state = this.windows.get(address);
        if (!state) return 0;
        const windowMs = this.config.windowSeconds * 1000;
        return state.timestamps.filter(t => now - t <= windowMs).length;
    }

    reset(address: Address): void {
        this.windows.delete(address);
    }

    /** A window whose newest entry has aged out is empty; evicting it is lossless. */
    evictIdle(now: number, idleMs: number): number {
        const horizon = Math.max(idleMs, this.config.windowSeconds * 1000);
        return evictWhere(this.windows, (state) => {
            const ts = state.timestamps;
            return ts.length === 0 || now - ts[ts.length - 1] > horizon;
        });
    }

    get size(): number {
        return this.windows.size;
    }
}
