import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { IdleSweeper } from '../defense/sweeper.js';
import { ExclusionRegistry } from '../defense/registry.js';
import { TokenBucketLimiter } from '../defense/token-bucket.js';

const A = '198.51.100.7';
const B = '203.0.113.9';
const T0 = 1_700_000_000_000;

describe('IdleSweeper', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('evicts idle limiter state and reaps expired exclusions', () => {
        const registry = new ExclusionRegistry();
        const limiter = new TokenBucketLimiter({ rateBase: 5, rateBurst: 20 });
        limiter.check(A, T0);
        limiter.check(B, T0 + 50_000);
        registry.exclude(A, { tier: 'local', expiresAt: T0 + 10_000, reason: 'test', source: 'admin' }, T0);

        const sweeper = new IdleSweeper({ idleTtlSeconds: 30, sweepIntervalSeconds: 60 }, [limiter], registry);
        expect(sweeper.sweep(T0 + 60_000)).toEqual({ evicted: 1, expired: 1 });
        expect(limiter.size).toBe(1);
        expect(registry.size).toBe(0);
    });

    it('keeps limiter state when the idle TTL is disabled', () => {
        const registry = new ExclusionRegistry();
        const limiter = new TokenBucketLimiter({ rateBase: 5, rateBurst: 20 });
        limiter.check(A, T0);

        const sweeper = new IdleSweeper({ idleTtlSeconds: null, sweepIntervalSeconds: 60 }, [limiter], registry);
        expect(sweeper.sweep(T0 + 86_400_000)).toEqual({ evicted: 0, expired: 0 });
        expect(limiter.size).toBe(1);
    });

    it('sweeps on its interval until stopped', () => {
        vi.useFakeTimers();
        const registry = new ExclusionRegistry();
        let now = T0;
        const sweeper = new IdleSweeper({ idleTtlSeconds: null, sweepIntervalSeconds: 5 }, [], registry, () => now);
        registry.exclude(A, { tier: 'local', expiresAt: T0 + 1000, reason: 'test', source: 'admin' }, T0);

        sweeper.start();
        expect(sweeper.running).toBe(true);
        now = T0 + 2000;
        vi.advanceTimersByTime(5000);
        expect(registry.size).toBe(0);

        sweeper.stop();
        expect(sweeper.running).toBe(false);
    });
});
